import { Command } from 'commander'
import { getServerCommand } from '../../core/server-command'
import { exitWithError, provisionWithSpinner } from '../helpers'

export const commandCommand = new Command('command')
  .description('Print the JSON spawn command for MCP host configuration')
  .option('--version <tag>', 'Use a specific release tag instead of the latest')
  .option('--dir <path>', 'Directory to install into')
  .option('--repo <owner/repo>', 'GitHub repository to read releases from')
  .action(async (options: { version?: string; dir?: string; repo?: string }) => {
    try {
      const provisioner = await provisionWithSpinner(options)
      const serverCommand = await getServerCommand(provisioner)
      console.log(JSON.stringify(serverCommand, null, 2))
    } catch (error) {
      exitWithError(error)
    }
  })
