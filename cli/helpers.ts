import { configManager } from '../core/config-manager'
import { BinaryProvisioner } from '../core/binary-provisioner'
import { HttpArchiveFetcher } from '../core/archive-fetcher'
import { GitHubReleaseFeed } from '../core/release-feed'
import {
  ErrorCodes,
  LauncherError,
  logError,
  logLauncherError,
} from '../core/error-handler'
import { withSpinner } from './ui/spinner'
import type { LauncherSettings, ProgressCallback } from '../types'

/**
 * Flags shared by every command that provisions the binary
 */
export type ProvisionFlags = {
  version?: string
  dir?: string
  repo?: string
}

export async function resolveSettings(
  flags: ProvisionFlags,
): Promise<LauncherSettings> {
  return configManager.getSettings({
    repository: flags.repo,
    version: flags.version,
    installDir: flags.dir,
  })
}

/**
 * Wire a provisioner to the real GitHub feed and HTTP fetcher
 */
export function createProvisioner(
  settings: LauncherSettings,
  onProgress?: ProgressCallback,
): BinaryProvisioner {
  return new BinaryProvisioner({
    repository: settings.repository,
    version: settings.version,
    installDir: settings.installDir,
    releaseFeed: new GitHubReleaseFeed({ token: settings.githubToken }),
    archiveFetcher: new HttpArchiveFetcher(),
    onProgress,
  })
}

/**
 * Provision behind a spinner and return the provisioner holding the result
 */
export async function provisionWithSpinner(
  flags: ProvisionFlags,
): Promise<BinaryProvisioner> {
  const settings = await resolveSettings(flags)

  return withSpinner('Resolving shebe-mcp...', async (updateText) => {
    const provisioner = createProvisioner(settings, ({ message }) =>
      updateText(message),
    )
    await provisioner.getOrProvision()
    return provisioner
  })
}

/**
 * Log the failure and exit non-zero
 */
export function exitWithError(error: unknown): never {
  if (error instanceof LauncherError) {
    logLauncherError(error)
  } else {
    logError({
      code: ErrorCodes.UNKNOWN_ERROR,
      message: error instanceof Error ? error.message : String(error),
      severity: 'error',
    })
  }
  process.exit(1)
}
