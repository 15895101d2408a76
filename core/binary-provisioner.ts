/**
 * Binary Provisioner
 *
 * Produces a ready-to-execute shebe-mcp path for the current host:
 *
 *   uncached -> resolving -> locating -> fetching -> finalizing -> cached
 *                    \___________\____________\___________\______-> failed
 *
 * - resolving: platform validated (before any network call), release fetched
 * - locating: resolved asset name matched exactly against the release assets
 * - fetching: archive downloaded + extracted into {installDir}/shebe-{version}
 * - finalizing: owner-execute bit set
 *
 * The resolved path is cached for the lifetime of the instance. Failures cache
 * nothing; the next call starts again from resolving.
 */

import { existsSync } from 'fs'
import { mkdir, readdir, rm } from 'fs/promises'
import { dirname, join, resolve } from 'path'
import { defaults, SAFE_VERSION } from '../config/defaults'
import { paths } from '../config/paths'
import { HttpArchiveFetcher, type ArchiveFetcher } from './archive-fetcher'
import { binaryCache, type BinaryCache } from './binary-cache'
import {
  AssetNotFoundError,
  createFeedError,
  createFetchError,
  createInvalidConfigError,
  createIoError,
  logDebug,
} from './error-handler'
import {
  filePermissions,
  isRegularFile,
  type PermissionSetter,
} from './file-permissions'
import { formatAssetName, resolvePlatformTokens } from './platform-resolver'
import { platformService } from './platform-service'
import { GitHubReleaseFeed, type ReleaseFeed } from './release-feed'
import type {
  Asset,
  InstalledVersion,
  PlatformTarget,
  ProgressCallback,
  ProvisionState,
  Release,
} from '../types'

export type BinaryProvisionerOptions = {
  /** GitHub "owner/repo" to read releases from */
  repository?: string
  /** Release tag to pin; the latest release is used when absent */
  version?: string | null
  /** Directory version folders are created in */
  installDir?: string
  /** Host platform; detected from the running process when absent */
  platform?: PlatformTarget
  releaseFeed?: ReleaseFeed
  archiveFetcher?: ArchiveFetcher
  permissions?: PermissionSetter
  /** Defaults to the process-wide cache; pass one to isolate a provisioner */
  cache?: BinaryCache
  onProgress?: ProgressCallback
}

export class BinaryProvisioner {
  readonly repository: string
  readonly installDir: string
  private readonly version: string | null
  private readonly platform: PlatformTarget | null
  private readonly releaseFeed: ReleaseFeed
  private readonly archiveFetcher: ArchiveFetcher
  private readonly permissions: PermissionSetter
  private readonly cache: BinaryCache
  private readonly onProgress?: ProgressCallback

  private state: ProvisionState = 'uncached'
  private cachedPath: string | null = null
  private inflight: Promise<string> | null = null

  constructor(options: BinaryProvisionerOptions = {}) {
    this.repository = options.repository ?? defaults.repository
    this.installDir = resolve(options.installDir ?? paths.bin)
    this.version = options.version ?? null
    this.platform = options.platform ?? null
    this.releaseFeed = options.releaseFeed ?? new GitHubReleaseFeed()
    this.archiveFetcher = options.archiveFetcher ?? new HttpArchiveFetcher()
    this.permissions = options.permissions ?? filePermissions
    this.cache = options.cache ?? binaryCache
    this.onProgress = options.onProgress
  }

  getState(): ProvisionState {
    return this.state
  }

  getCachedPath(): string | null {
    return this.cachedPath
  }

  /**
   * Return the provisioned binary path, running the full sequence on the
   * first call. Concurrent callers share the same in-flight attempt.
   */
  async getOrProvision(): Promise<string> {
    if (this.cachedPath !== null) {
      return this.cachedPath
    }
    if (this.inflight) {
      return this.inflight
    }

    this.inflight = this.provision().then(
      (binaryPath) => {
        this.cachedPath = binaryPath
        this.inflight = null
        this.transition('cached', `Using ${binaryPath}`)
        return binaryPath
      },
      (error: unknown) => {
        this.inflight = null
        this.state = 'failed'
        logDebug('Provisioning failed', {
          repository: this.repository,
          error: error instanceof Error ? error.message : String(error),
        })
        throw error
      },
    )
    return this.inflight
  }

  /**
   * Forget the session's cached path so the next call resolves the release
   * again. Files on disk are kept.
   */
  reset(): void {
    if (this.cachedPath !== null) {
      this.cache.evict(dirname(this.cachedPath))
    }
    this.cachedPath = null
    this.state = 'uncached'
  }

  private transition(state: ProvisionState, message: string): void {
    this.state = state
    logDebug(message, { state, repository: this.repository })
    this.onProgress?.({ stage: state, message })
  }

  private async provision(): Promise<string> {
    this.transition('resolving', `Resolving latest ${this.repository} release...`)

    // Rejects unsupported platforms before any network traffic
    const target = this.platform ?? platformService.getTarget()
    const tokens = resolvePlatformTokens(target.os, target.arch)

    const release = await this.fetchRelease()
    if (!SAFE_VERSION.test(release.version)) {
      throw createFeedError(`Refusing unsafe release tag "${release.version}"`, {
        repository: this.repository,
        version: release.version,
      })
    }

    this.transition(
      'locating',
      `Locating ${tokens.os}/${tokens.arch} asset in ${release.version}...`,
    )
    const assetName = formatAssetName(release.version, tokens)
    const asset = release.assets.find((a) => a.name === assetName)
    if (!asset) {
      throw new AssetNotFoundError(
        assetName,
        release.version,
        release.assets.map((a) => a.name),
      )
    }

    const versionDir = paths.getVersionDir(this.installDir, release.version)
    return this.cache.getOrCreate(versionDir, () =>
      this.install(release.version, asset),
    )
  }

  private fetchRelease(): Promise<Release> {
    return this.version
      ? this.releaseFeed.releaseByTag(this.repository, this.version)
      : this.releaseFeed.latestRelease(this.repository)
  }

  private async install(version: string, asset: Asset): Promise<string> {
    const versionDir = paths.getVersionDir(this.installDir, version)
    const binaryPath = paths.getBinaryPath(this.installDir, version)

    const installed = await isRegularFile(binaryPath)
    this.transition(
      'fetching',
      installed
        ? `Using installed ${defaults.binaryName} ${version}`
        : `Fetching ${asset.name}...`,
    )

    if (!installed) {
      try {
        await mkdir(this.installDir, { recursive: true })
      } catch (error) {
        throw createIoError(
          `Failed to create install directory ${this.installDir}`,
          { installDir: this.installDir },
          error,
        )
      }

      await this.archiveFetcher.downloadAndUnpack(
        asset.downloadUrl,
        versionDir,
        this.onProgress,
      )

      if (!(await isRegularFile(binaryPath))) {
        await rm(versionDir, { recursive: true, force: true })
        throw createFetchError(
          `Archive ${asset.name} does not contain ${defaults.binaryName}`,
          { asset: asset.name, versionDir },
        )
      }
    }

    this.transition('finalizing', `Marking ${defaults.binaryName} executable...`)
    await this.permissions.makeExecutable(binaryPath)

    return binaryPath
  }
}

/**
 * List versions installed under installDir that contain the server binary
 */
export async function listInstalled(
  installDir: string = paths.bin,
): Promise<InstalledVersion[]> {
  if (!existsSync(installDir)) {
    return []
  }

  const entries = await readdir(installDir, { withFileTypes: true })
  const prefix = `${defaults.assetPrefix}-`
  const installed: InstalledVersion[] = []

  for (const entry of entries) {
    if (!entry.isDirectory() || !entry.name.startsWith(prefix)) continue

    const version = entry.name.slice(prefix.length)
    const binaryPath = paths.getBinaryPath(installDir, version)
    if (version && (await isRegularFile(binaryPath))) {
      installed.push({
        version,
        path: join(installDir, entry.name),
        binaryPath,
      })
    }
  }

  return installed.sort((a, b) => a.version.localeCompare(b.version))
}

/**
 * Delete one installed version, or every version (and our staging leftovers)
 * when version is omitted. Returns the removed directories.
 *
 * @throws INVALID_CONFIG when version is not a single path segment
 */
export async function removeInstalled(
  installDir: string = paths.bin,
  version?: string,
  cache: BinaryCache = binaryCache,
): Promise<string[]> {
  const root = resolve(installDir)
  if (version !== undefined) {
    const versionDir = paths.getVersionDir(root, version)
    if (!SAFE_VERSION.test(version) || dirname(versionDir) !== root) {
      throw createInvalidConfigError('version', version)
    }
  }

  if (!existsSync(root)) {
    return []
  }

  let targets: string[]
  if (version !== undefined) {
    const versionDir = paths.getVersionDir(root, version)
    targets = existsSync(versionDir) ? [versionDir] : []
  } else {
    const entries = await readdir(root, { withFileTypes: true })
    targets = entries
      .filter(
        (e) =>
          e.isDirectory() &&
          (e.name.startsWith(`${defaults.assetPrefix}-`) ||
            e.name.startsWith(`temp-${defaults.assetPrefix}-`)),
      )
      .map((e) => join(root, e.name))
  }

  for (const target of targets) {
    await rm(target, { recursive: true, force: true })
    cache.evict(target)
  }
  return targets
}
