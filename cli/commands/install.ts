import { Command } from 'commander'
import chalk from 'chalk'
import { exitWithError, provisionWithSpinner } from '../helpers'
import { uiSuccess } from '../ui/theme'

type InstallOptions = {
  json?: boolean
  version?: string
  dir?: string
  repo?: string
}

export const installCommand = new Command('install')
  .description('Download shebe-mcp for this platform and print its path')
  .option('--version <tag>', 'Install a specific release tag instead of the latest')
  .option('--dir <path>', 'Directory to install into')
  .option('--repo <owner/repo>', 'GitHub repository to read releases from')
  .option('--json', 'Output as JSON')
  .action(async (options: InstallOptions) => {
    try {
      const provisioner = await provisionWithSpinner(options)
      const binaryPath = provisioner.getCachedPath()

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              path: binaryPath,
              repository: provisioner.repository,
              installDir: provisioner.installDir,
            },
            null,
            2,
          ),
        )
        return
      }

      console.error(uiSuccess(`shebe-mcp ready at ${chalk.cyan(binaryPath)}`))
      console.log(binaryPath)
    } catch (error) {
      exitWithError(error)
    }
  })
