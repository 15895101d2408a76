import { VERSION } from './version'

export type Defaults = {
  repository: string
  binaryName: string
  assetPrefix: string
  githubApiBase: string
  userAgent: string
  metadataTimeoutMs: number
  downloadTimeoutMs: number
  releasesPerPage: number
}

/**
 * Default configuration values. repository, version and install dir can be
 * overridden through config.json, environment variables or CLI flags (see
 * config-manager); the rest are fixed.
 */
export const defaults: Defaults = {
  repository: 'rhobimd-oss/shebe',
  binaryName: 'shebe-mcp',
  assetPrefix: 'shebe',
  githubApiBase: 'https://api.github.com',
  userAgent: `shebe-mcp-launcher/${VERSION}`,
  metadataTimeoutMs: 30_000,
  downloadTimeoutMs: 5 * 60 * 1000,
  releasesPerPage: 30,
}

export const ENV_VARS = {
  home: 'SHEBE_LAUNCHER_HOME',
  repository: 'SHEBE_REPOSITORY',
  version: 'SHEBE_VERSION',
  installDir: 'SHEBE_INSTALL_DIR',
  githubToken: 'GITHUB_TOKEN',
} as const

// Release tags become directory names, so keep them to a single path segment
export const SAFE_VERSION = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/
