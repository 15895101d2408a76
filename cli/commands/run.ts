import { Command } from 'commander'
import { spawn } from 'child_process'
import { getServerCommand } from '../../core/server-command'
import { exitWithError, provisionWithSpinner } from '../helpers'
import { uiError } from '../ui/theme'
import type { ServerCommand } from '../../types'

type RunOptions = {
  version?: string
  dir?: string
  repo?: string
}

/**
 * Run the server with inherited stdio and mirror its exit code
 */
function spawnServer(serverCommand: ServerCommand, extraArgs: string[]): void {
  const child = spawn(
    serverCommand.command,
    [...serverCommand.args, ...extraArgs],
    {
      stdio: 'inherit',
      env: { ...process.env, ...serverCommand.env },
    },
  )

  child.on('error', (err: Error) => {
    console.error(uiError(`Failed to start shebe-mcp: ${err.message}`))
    process.exit(1)
  })

  child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
    process.exit(code ?? (signal ? 1 : 0))
  })
}

export const runCommand = new Command('run')
  .description("Provision shebe-mcp and run it on this terminal's stdio")
  .argument('[args...]', 'Arguments passed through to shebe-mcp')
  .option('--version <tag>', 'Use a specific release tag instead of the latest')
  .option('--dir <path>', 'Directory to install into')
  .option('--repo <owner/repo>', 'GitHub repository to read releases from')
  .passThroughOptions()
  .action(async (args: string[], options: RunOptions) => {
    try {
      const provisioner = await provisionWithSpinner(options)
      spawnServer(await getServerCommand(provisioner), args)
    } catch (error) {
      exitWithError(error)
    }
  })
