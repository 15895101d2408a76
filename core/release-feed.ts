/**
 * Release Feed
 *
 * Source of truth for published versions and their assets. The GitHub
 * implementation talks to the Releases REST API:
 *   GET {apiBase}/repos/{owner}/{repo}/releases        (latest usable release)
 *   GET {apiBase}/repos/{owner}/{repo}/releases/tags/{tag}
 *
 * Every failure (network, HTTP, malformed payload) surfaces as FEED_ERROR.
 * No retries here: the caller owns retry policy.
 */

import { defaults } from '../config/defaults'
import { createFeedError, logDebug } from './error-handler'
import type { Asset, Release } from '../types'

export type ReleaseFeed = {
  latestRelease(repository: string): Promise<Release>
  releaseByTag(repository: string, tag: string): Promise<Release>
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export type GitHubReleaseFeedOptions = {
  apiBase?: string
  token?: string | null
  userAgent?: string
  timeoutMs?: number
  perPage?: number
  fetchImpl?: FetchLike
}

// Shape of the fields we read from the GitHub API
type GitHubAsset = {
  name: string
  browser_download_url: string
}

type GitHubRelease = {
  tag_name: string
  draft?: boolean
  prerelease?: boolean
  assets: GitHubAsset[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isGitHubAsset(value: unknown): value is GitHubAsset {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.browser_download_url === 'string'
  )
}

function isGitHubRelease(value: unknown): value is GitHubRelease {
  return (
    isRecord(value) &&
    typeof value.tag_name === 'string' &&
    value.tag_name.length > 0 &&
    (value.draft === undefined || typeof value.draft === 'boolean') &&
    (value.prerelease === undefined || typeof value.prerelease === 'boolean') &&
    Array.isArray(value.assets) &&
    value.assets.every(isGitHubAsset)
  )
}

const SEMVER_TAG = /^v\d+\.\d+\.\d+$/

/**
 * Validate a GitHub release payload and convert it to a Release.
 *
 * @throws FEED_ERROR if the payload is malformed or asset names repeat
 */
export function parseGitHubRelease(data: unknown, source: string): Release {
  if (!isGitHubRelease(data)) {
    throw createFeedError(`Malformed release payload from ${source}`, {
      source,
    })
  }

  const seen = new Set<string>()
  const assets: Asset[] = []
  for (const asset of data.assets) {
    if (seen.has(asset.name)) {
      throw createFeedError(
        `Release ${data.tag_name} lists asset "${asset.name}" more than once`,
        { source, version: data.tag_name },
      )
    }
    seen.add(asset.name)
    assets.push({ name: asset.name, downloadUrl: asset.browser_download_url })
  }

  if (!SEMVER_TAG.test(data.tag_name)) {
    logDebug(`Release tag ${data.tag_name} is not v<major>.<minor>.<patch>`, {
      source,
    })
  }

  return { version: data.tag_name, assets }
}

export class GitHubReleaseFeed implements ReleaseFeed {
  private readonly apiBase: string
  private readonly token: string | null
  private readonly userAgent: string
  private readonly timeoutMs: number
  private readonly perPage: number
  private readonly fetchImpl: FetchLike

  constructor(options: GitHubReleaseFeedOptions = {}) {
    this.apiBase = (options.apiBase ?? defaults.githubApiBase).replace(/\/+$/, '')
    this.token = options.token ?? null
    this.userAgent = options.userAgent ?? defaults.userAgent
    this.timeoutMs = options.timeoutMs ?? defaults.metadataTimeoutMs
    this.perPage = options.perPage ?? defaults.releasesPerPage
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init))
  }

  /**
   * Newest release that is neither a draft nor a prerelease and has assets
   */
  async latestRelease(repository: string): Promise<Release> {
    const url = `${this.apiBase}/repos/${repository}/releases?per_page=${this.perPage}`
    const data = await this.getJson(url)

    if (!Array.isArray(data)) {
      throw createFeedError(`Expected a list of releases from ${url}`, {
        repository,
      })
    }

    for (const entry of data) {
      if (!isGitHubRelease(entry)) {
        throw createFeedError(`Malformed release payload from ${url}`, {
          repository,
        })
      }
      if (entry.draft || entry.prerelease || entry.assets.length === 0) {
        logDebug(`Skipping release ${entry.tag_name}`, {
          draft: entry.draft,
          prerelease: entry.prerelease,
          assets: entry.assets.length,
        })
        continue
      }
      return parseGitHubRelease(entry, url)
    }

    throw createFeedError(`No published release with assets found for ${repository}`, {
      repository,
    })
  }

  async releaseByTag(repository: string, tag: string): Promise<Release> {
    const url = `${this.apiBase}/repos/${repository}/releases/tags/${encodeURIComponent(tag)}`
    const release = parseGitHubRelease(await this.getJson(url), url)

    if (release.assets.length === 0) {
      throw createFeedError(`Release ${tag} of ${repository} has no assets`, {
        repository,
        tag,
      })
    }
    return release
  }

  private async getJson(url: string): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': this.userAgent,
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    let response: Response
    try {
      response = await this.fetchImpl(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))
      const message =
        err.name === 'TimeoutError' || err.name === 'AbortError'
          ? `Release feed request timed out after ${this.timeoutMs}ms`
          : `Release feed request failed: ${err.message}`
      throw createFeedError(message, { url }, err)
    }

    if (!response.ok) {
      throw createFeedError(
        `Release feed returned ${response.status} ${response.statusText} for ${url}`,
        { url, status: response.status },
      )
    }

    try {
      return await response.json()
    } catch (error) {
      throw createFeedError(`Release feed returned invalid JSON for ${url}`, { url }, error)
    }
  }
}
