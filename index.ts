export {
  BinaryProvisioner,
  listInstalled,
  removeInstalled,
  type BinaryProvisionerOptions,
} from './core/binary-provisioner'
export { BinaryCache } from './core/binary-cache'
export { getServerCommand } from './core/server-command'
export {
  ARCHIVE_EXTENSION,
  LIBC_SUFFIX,
  SUPPORTED_TARGETS,
  formatAssetName,
  isSupportedTarget,
  resolveAssetName,
  resolvePlatformTokens,
} from './core/platform-resolver'
export {
  PlatformService,
  platformService,
  toPlatformTarget,
} from './core/platform-service'
export {
  GitHubReleaseFeed,
  parseGitHubRelease,
  type FetchLike,
  type GitHubReleaseFeedOptions,
  type ReleaseFeed,
} from './core/release-feed'
export {
  HttpArchiveFetcher,
  type ArchiveFetcher,
  type HttpArchiveFetcherOptions,
} from './core/archive-fetcher'
export {
  filePermissions,
  makeExecutable,
  type PermissionSetter,
} from './core/file-permissions'
export {
  AssetNotFoundError,
  ErrorCodes,
  LauncherError,
  UnsupportedPlatformError,
  type ErrorCode,
} from './core/error-handler'
export { ConfigManager, configManager } from './core/config-manager'
export type * from './types'
