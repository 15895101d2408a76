import { Command } from 'commander'
import { removeInstalled } from '../../core/binary-provisioner'
import { logInfo } from '../../core/error-handler'
import { exitWithError, resolveSettings } from '../helpers'
import { uiInfo, uiSuccess } from '../ui/theme'

export const cleanCommand = new Command('clean')
  .description('Remove installed shebe-mcp versions')
  .option('--version <tag>', 'Remove only this release tag')
  .option('--dir <path>', 'Install directory to clean')
  .action(async (options: { version?: string; dir?: string }) => {
    try {
      const settings = await resolveSettings({ dir: options.dir })
      const removed = await removeInstalled(settings.installDir, options.version)

      if (removed.length === 0) {
        console.log(uiInfo('Nothing to remove'))
        return
      }

      logInfo('Removed installed versions', { removed })
      for (const dir of removed) {
        console.log(uiSuccess(`Removed ${dir}`))
      }
    } catch (error) {
      exitWithError(error)
    }
  })
