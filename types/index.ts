/**
 * Operating systems the launcher can be asked about.
 * Only mac and linux have published builds.
 */
export type OsKind = 'mac' | 'linux' | 'windows'

/**
 * CPU architectures the launcher can be asked about.
 * x86 (32-bit) has no published build on any OS.
 */
export type ArchKind = 'x86_64' | 'aarch64' | 'x86'

export type PlatformTarget = {
  os: OsKind
  arch: ArchKind
}

export type OsToken = 'darwin' | 'linux'
export type ArchToken = 'x86_64' | 'aarch64'

export type PlatformTokens = {
  os: OsToken
  arch: ArchToken
}

export type Asset = {
  name: string
  downloadUrl: string
}

export type Release = {
  // Tag name, e.g. "v0.5.7"
  version: string
  assets: Asset[]
}

export type ProvisionState =
  | 'uncached'
  | 'resolving'
  | 'locating'
  | 'fetching'
  | 'finalizing'
  | 'cached'
  | 'failed'

export type ProgressCallback = (progress: {
  stage: string
  message: string
}) => void

export type InstalledVersion = {
  version: string
  path: string
  binaryPath: string
}

export type ServerCommand = {
  command: string
  args: string[]
  env: Record<string, string>
}

/**
 * Persisted launcher configuration stored in <home>/config.json
 */
export type LauncherConfig = {
  repository?: string
  version?: string
  installDir?: string
  updatedAt?: string
}

/**
 * Fully merged settings (flags > env > config file > defaults)
 */
export type LauncherSettings = {
  repository: string
  version: string | null
  installDir: string
  githubToken: string | null
}
