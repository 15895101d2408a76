import { Command } from 'commander'
import chalk from 'chalk'
import {
  CONFIG_KEYS,
  configManager,
  isConfigKey,
} from '../../core/config-manager'
import { createInvalidConfigError } from '../../core/error-handler'
import { paths } from '../../config/paths'
import { exitWithError } from '../helpers'
import { header, keyValue, uiSuccess } from '../ui/theme'
import type { ConfigKey } from '../../core/config-manager'

function parseKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw createInvalidConfigError('key', key)
  }
  return key
}

export const configCommand = new Command('config')
  .description('Manage launcher configuration')
  .addCommand(
    new Command('show')
      .description('Show effective settings')
      .option('--json', 'Output as JSON')
      .action(async (options: { json?: boolean }) => {
        try {
          const settings = await configManager.getSettings()
          const stored = await configManager.getConfig()
          const shown = {
            ...settings,
            githubToken: settings.githubToken ? '(set)' : null,
          }

          if (options.json) {
            console.log(JSON.stringify(shown, null, 2))
            return
          }

          console.log()
          console.log(header('Launcher Configuration'))
          console.log()
          console.log('  ' + keyValue('Repository', chalk.cyan(shown.repository)))
          console.log(
            '  ' + keyValue('Version', chalk.yellow(shown.version ?? 'latest')),
          )
          console.log('  ' + keyValue('Install dir', shown.installDir))
          console.log(
            '  ' + keyValue('GitHub token', shown.githubToken ?? chalk.gray('not set')),
          )
          console.log('  ' + keyValue('Config file', chalk.gray(paths.config)))
          console.log()

          if (stored.updatedAt) {
            console.log(
              chalk.gray(
                `  Last updated: ${new Date(stored.updatedAt).toLocaleString()}`,
              ),
            )
            console.log()
          }
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
  .addCommand(
    new Command('set')
      .description(`Set a value (${CONFIG_KEYS.join(', ')})`)
      .argument('<key>', 'Setting name')
      .argument('<value>', 'New value')
      .action(async (key: string, value: string) => {
        try {
          const stored = await configManager.set(parseKey(key), value)
          console.log(uiSuccess(`${key} set to ${chalk.cyan(stored)}`))
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
  .addCommand(
    new Command('unset')
      .description('Remove a value, falling back to the default')
      .argument('<key>', 'Setting name')
      .action(async (key: string) => {
        try {
          await configManager.unset(parseKey(key))
          console.log(uiSuccess(`${key} reset to default`))
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
