import { Command } from 'commander'
import chalk from 'chalk'
import { listInstalled } from '../../core/binary-provisioner'
import { exitWithError, resolveSettings } from '../helpers'
import { uiInfo } from '../ui/theme'

export const listCommand = new Command('list')
  .alias('ls')
  .description('List installed shebe-mcp versions')
  .option('--dir <path>', 'Install directory to inspect')
  .option('--json', 'Output as JSON')
  .action(async (options: { dir?: string; json?: boolean }) => {
    try {
      const settings = await resolveSettings(options)
      const installed = await listInstalled(settings.installDir)

      if (options.json) {
        console.log(JSON.stringify(installed, null, 2))
        return
      }

      if (installed.length === 0) {
        console.log(
          uiInfo('No versions installed. Install one with: shebe-launcher install'),
        )
        return
      }

      console.log()
      console.log(
        chalk.gray('  ') +
          chalk.bold.white('VERSION'.padEnd(14)) +
          chalk.bold.white('PATH'),
      )
      console.log(chalk.gray('  ' + '─'.repeat(60)))

      for (const entry of installed) {
        console.log(
          chalk.gray('  ') +
            chalk.yellow(entry.version.padEnd(14)) +
            chalk.gray(entry.binaryPath),
        )
      }
      console.log()
      console.log(chalk.gray(`  ${installed.length} version(s) installed`))
      console.log()
    } catch (error) {
      exitWithError(error)
    }
  })
