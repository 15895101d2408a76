import { homedir } from 'os'
import { join } from 'path'
import { defaults, ENV_VARS } from './defaults'

/**
 * Get the launcher home directory.
 * SHEBE_LAUNCHER_HOME wins so tests and CI can point it at a scratch directory.
 */
function getLauncherHome(): string {
  const override = process.env[ENV_VARS.home]
  if (override) {
    return override
  }
  return join(homedir(), '.shebe-launcher')
}

export const paths = {
  // Root directory for all launcher data
  get root(): string {
    return getLauncherHome()
  },

  // Default install directory for downloaded binaries
  get bin(): string {
    return join(getLauncherHome(), 'bin')
  },

  // Global config file
  get config(): string {
    return join(getLauncherHome(), 'config.json')
  },

  // Structured log file
  get log(): string {
    return join(getLauncherHome(), 'launcher.log')
  },

  /**
   * Version-scoped directory a release is extracted into: {installDir}/shebe-{version}
   */
  getVersionDir(installDir: string, version: string): string {
    return join(installDir, `${defaults.assetPrefix}-${version}`)
  },

  /**
   * Path of the server binary inside a version directory
   */
  getBinaryPath(installDir: string, version: string): string {
    return join(this.getVersionDir(installDir, version), defaults.binaryName)
  },
}
