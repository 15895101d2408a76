import { Command } from 'commander'
import chalk from 'chalk'
import {
  SUPPORTED_TARGETS,
  resolvePlatformTokens,
} from '../../core/platform-resolver'
import { platformService } from '../../core/platform-service'
import { LauncherError } from '../../core/error-handler'
import type { PlatformTarget } from '../../types'

function currentTarget(): PlatformTarget | null {
  try {
    return platformService.getTarget()
  } catch (error) {
    if (error instanceof LauncherError) return null
    throw error
  }
}

export const platformsCommand = new Command('platforms')
  .description('List platforms with published shebe-mcp builds')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const rows = SUPPORTED_TARGETS.map((target) => ({
      ...target,
      tokens: resolvePlatformTokens(target.os, target.arch),
    }))

    if (options.json) {
      console.log(JSON.stringify(rows, null, 2))
      return
    }

    const host = currentTarget()

    console.log()
    console.log(
      chalk.gray('  ') +
        chalk.bold.white('OS'.padEnd(10)) +
        chalk.bold.white('ARCH'.padEnd(10)) +
        chalk.bold.white('ASSET SUFFIX'),
    )
    console.log(chalk.gray('  ' + '─'.repeat(40)))

    for (const row of rows) {
      const isHost = host?.os === row.os && host.arch === row.arch
      console.log(
        chalk.gray('  ') +
          chalk.cyan(row.os.padEnd(10)) +
          chalk.yellow(row.arch.padEnd(10)) +
          chalk.white(`${row.tokens.os}-${row.tokens.arch}`) +
          (isHost ? chalk.green('  (this machine)') : ''),
      )
    }
    console.log()
  })
