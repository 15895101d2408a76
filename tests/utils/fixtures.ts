/**
 * In-process stand-ins for the network and filesystem collaborators
 */

import { mkdtempSync } from 'fs'
import { mkdir, mkdtemp, readFile, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import { setTimeout as sleep } from 'timers/promises'
import { create as tarCreate } from 'tar'
import { ENV_VARS } from '../../config/defaults'
import { createFeedError, createFetchError } from '../../core/error-handler'
import type { ArchiveFetcher } from '../../core/archive-fetcher'
import type { FetchLike, ReleaseFeed } from '../../core/release-feed'
import type { ProgressCallback, Release } from '../../types'

/**
 * Point the launcher home (config + log) at a scratch directory
 */
export function useTempHome(): string {
  const home = mkdtempSync(join(tmpdir(), 'shebe-launcher-home-'))
  process.env[ENV_VARS.home] = home
  return home
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `shebe-launcher-${prefix}-`))
}

export const DOWNLOAD_BASE = 'https://downloads.example.test'

export function makeRelease(
  version: string,
  assetNames: string[] = [
    `shebe-${version}-darwin-aarch64.tar.gz`,
    `shebe-${version}-darwin-x86_64.tar.gz`,
    `shebe-${version}-linux-x86_64-musl.tar.gz`,
  ],
): Release {
  return {
    version,
    assets: assetNames.map((name) => ({
      name,
      downloadUrl: `${DOWNLOAD_BASE}/${version}/${name}`,
    })),
  }
}

/**
 * Serves a fixed list of releases; the first one is "latest"
 */
export class FakeReleaseFeed implements ReleaseFeed {
  latestCalls = 0
  tagCalls: string[] = []
  failTimes = 0

  constructor(private readonly releases: Release[]) {}

  async latestRelease(repository: string): Promise<Release> {
    this.latestCalls++
    this.maybeFail(repository)
    const [latest] = this.releases
    if (!latest) {
      throw createFeedError(`No published release with assets found for ${repository}`)
    }
    return latest
  }

  async releaseByTag(repository: string, tag: string): Promise<Release> {
    this.tagCalls.push(tag)
    this.maybeFail(repository)
    const release = this.releases.find((r) => r.version === tag)
    if (!release) {
      throw createFeedError(`Release feed returned 404 Not Found for ${tag}`)
    }
    return release
  }

  get totalCalls(): number {
    return this.latestCalls + this.tagCalls.length
  }

  private maybeFail(repository: string): void {
    if (this.failTimes > 0) {
      this.failTimes--
      throw createFeedError(`Release feed request failed: simulated outage`, {
        repository,
      })
    }
  }
}

export const FAKE_BINARY = '#!/bin/sh\necho shebe-mcp\n'

/**
 * Writes a non-executable shebe-mcp into the destination instead of
 * downloading anything
 */
export class FakeArchiveFetcher implements ArchiveFetcher {
  calls: string[] = []
  delayMs = 0
  failTimes = 0
  binaryName = 'shebe-mcp'

  async downloadAndUnpack(
    url: string,
    destDir: string,
    onProgress?: ProgressCallback,
  ): Promise<void> {
    this.calls.push(url)
    onProgress?.({ stage: 'downloading', message: `Downloading ${url}` })
    if (this.delayMs > 0) {
      await sleep(this.delayMs)
    }
    if (this.failTimes > 0) {
      this.failTimes--
      throw createFetchError(`Download of ${url} was interrupted`, { url })
    }
    await mkdir(destDir, { recursive: true })
    await writeFile(join(destDir, this.binaryName), FAKE_BINARY, { mode: 0o644 })
  }
}

/**
 * Build a .tar.gz from a map of relative path -> contents and return its bytes
 */
export async function buildTarGz(
  workDir: string,
  files: Record<string, string | Buffer>,
): Promise<Buffer> {
  const sourceDir = join(workDir, 'source')
  const archivePath = join(workDir, 'fixture.tar.gz')

  for (const [relativePath, contents] of Object.entries(files)) {
    const filePath = join(sourceDir, relativePath)
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, contents, { mode: 0o644 })
  }

  const topLevel = [
    ...new Set(Object.keys(files).map((p) => p.split('/')[0])),
  ]
  await tarCreate({ gzip: true, file: archivePath, cwd: sourceDir }, topLevel)
  return readFile(archivePath)
}

export type FakeRoute = () => Response | Promise<Response>

/**
 * fetch stand-in answering from a URL -> handler map; anything else is a 404
 */
export function createFakeFetch(routes: Record<string, FakeRoute>): {
  fetchImpl: FetchLike
  calls: Array<{ url: string; init?: RequestInit }>
} {
  const calls: Array<{ url: string; init?: RequestInit }> = []
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init })
    const route = routes[url]
    if (!route) {
      return new Response('Not Found', { status: 404, statusText: 'Not Found' })
    }
    return route()
  }
  return { fetchImpl, calls }
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  })
}

export function bytesResponse(
  bytes: Uint8Array,
  headers: Record<string, string> = {},
): Response {
  return new Response(new Uint8Array(bytes), { status: 200, headers })
}
