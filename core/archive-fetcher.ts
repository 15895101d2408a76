/**
 * Archive Fetcher/Extractor
 *
 * Downloads a gzip-compressed tar archive and unpacks it into a destination
 * directory. Work happens in a uniquely named staging directory next to the
 * destination; only a fully extracted tree is moved into place, so a failed
 * download never leaves a half-populated destination behind.
 */

import { createWriteStream } from 'fs'
import { mkdir, readdir, rm, stat } from 'fs/promises'
import { randomUUID } from 'crypto'
import { basename, dirname, join } from 'path'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import { extract as tarExtract } from 'tar'
import { defaults } from '../config/defaults'
import { createFetchError, createIoError, logDebug } from './error-handler'
import { moveEntry } from './fs-error-utils'
import type { FetchLike } from './release-feed'
import type { ProgressCallback } from '../types'

export type ArchiveFetcher = {
  downloadAndUnpack(
    url: string,
    destDir: string,
    onProgress?: ProgressCallback,
  ): Promise<void>
}

export type HttpArchiveFetcherOptions = {
  userAgent?: string
  timeoutMs?: number
  fetchImpl?: FetchLike
}

async function withIoError<T>(
  message: string,
  context: Record<string, unknown>,
  operation: () => Promise<T>,
): Promise<T> {
  try {
    return await operation()
  } catch (error) {
    throw createIoError(message, context, error)
  }
}

/**
 * Byte count the server promised, or null when it cannot be compared against
 * what was written (no header, or a transfer encoding that fetch decoded).
 */
export function getDeclaredLength(response: Response): number | null {
  const encoding = response.headers.get('content-encoding')
  if (encoding && encoding !== 'identity') return null

  const header = response.headers.get('content-length')
  if (header === null) return null

  const length = Number(header)
  return Number.isInteger(length) && length >= 0 ? length : null
}

/**
 * Archives often wrap their payload in a single top-level directory.
 * Flatten that so the binary always lands directly in the destination.
 */
async function findPayloadRoot(extractDir: string): Promise<string> {
  const entries = await withIoError(
    `Failed to read ${extractDir}`,
    { extractDir },
    () => readdir(extractDir, { withFileTypes: true }),
  )
  if (entries.length === 0) {
    throw createFetchError('Archive contained no entries', { extractDir })
  }
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(extractDir, entries[0].name)
  }
  return extractDir
}

export class HttpArchiveFetcher implements ArchiveFetcher {
  private readonly userAgent: string
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike

  constructor(options: HttpArchiveFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? defaults.userAgent
    this.timeoutMs = options.timeoutMs ?? defaults.downloadTimeoutMs
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init))
  }

  async downloadAndUnpack(
    url: string,
    destDir: string,
    onProgress?: ProgressCallback,
  ): Promise<void> {
    const stagingDir = join(
      dirname(destDir),
      `temp-${basename(destDir)}-${randomUUID().slice(0, 8)}`,
    )
    const archiveFile = join(stagingDir, 'archive.tar.gz')
    const extractDir = join(stagingDir, 'extract')

    await withIoError(
      `Failed to create staging directory ${stagingDir}`,
      { stagingDir },
      () => mkdir(extractDir, { recursive: true }),
    )

    try {
      onProgress?.({ stage: 'downloading', message: `Downloading ${url}` })
      await this.download(url, archiveFile)

      onProgress?.({ stage: 'extracting', message: 'Extracting archive...' })
      await this.extract(archiveFile, extractDir)

      const payloadRoot = await findPayloadRoot(extractDir)
      await withIoError(
        `Failed to move extracted files into ${destDir}`,
        { destDir },
        async () => {
          await rm(destDir, { recursive: true, force: true })
          await moveEntry(payloadRoot, destDir)
        },
      )
      logDebug('Archive unpacked', { url, destDir })
    } finally {
      await rm(stagingDir, { recursive: true, force: true })
    }
  }

  private async download(url: string, archiveFile: string): Promise<void> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      let response: Response
      try {
        response = await this.fetchImpl(url, {
          headers: {
            Accept: 'application/octet-stream',
            'User-Agent': this.userAgent,
          },
          redirect: 'follow',
          signal: controller.signal,
        })
      } catch (error) {
        throw createFetchError(
          controller.signal.aborted
            ? `Download timed out after ${this.timeoutMs}ms`
            : `Download of ${url} failed`,
          { url },
          error,
        )
      }

      if (!response.ok) {
        throw createFetchError(
          `Download of ${url} failed: ${response.status} ${response.statusText}`,
          { url, status: response.status },
        )
      }

      if (!response.body) {
        throw createFetchError(
          `Download failed: response has no body (status ${response.status})`,
          { url },
        )
      }

      try {
        await pipeline(
          Readable.fromWeb(response.body),
          createWriteStream(archiveFile),
        )
      } catch (error) {
        throw createFetchError(
          controller.signal.aborted
            ? `Download timed out after ${this.timeoutMs}ms`
            : `Download of ${url} was interrupted`,
          { url },
          error,
        )
      }

      const expected = getDeclaredLength(response)
      if (expected !== null) {
        const { size } = await withIoError(
          `Failed to stat ${archiveFile}`,
          { archiveFile },
          () => stat(archiveFile),
        )
        if (size !== expected) {
          throw createFetchError(
            `Incomplete download of ${url}: received ${size} of ${expected} bytes`,
            { url, size, expected },
          )
        }
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private async extract(archiveFile: string, extractDir: string): Promise<void> {
    try {
      // strict turns tar's recoverable warnings (bad headers, short reads) into errors
      await tarExtract({ file: archiveFile, cwd: extractDir, strict: true })
    } catch (error) {
      throw createFetchError(
        'Archive is corrupt or truncated',
        { archiveFile },
        error,
      )
    }
  }
}
