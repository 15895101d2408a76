/**
 * Platform Resolver
 *
 * Maps a (version, os, arch) triple to the release asset name published for
 * it. Pure: no environment reads, no I/O. Host detection lives in
 * platform-service and is injected by the caller.
 *
 * Asset naming: shebe-{version}-{osToken}-{archToken}{suffix}.tar.gz
 * where suffix comes from LIBC_SUFFIX (linux builds are static musl builds).
 */

import { defaults } from '../config/defaults'
import { UnsupportedPlatformError } from './error-handler'
import type {
  ArchKind,
  OsKind,
  OsToken,
  PlatformTarget,
  PlatformTokens,
} from '../types'

export const ARCHIVE_EXTENSION = '.tar.gz'

// Linkage suffix per OS token. Adding a platform with a different linkage
// convention means adding a row here.
export const LIBC_SUFFIX: Record<OsToken, string> = {
  darwin: '',
  linux: '-musl',
}

export const SUPPORTED_TARGETS: readonly PlatformTarget[] = [
  { os: 'mac', arch: 'aarch64' },
  { os: 'mac', arch: 'x86_64' },
  { os: 'linux', arch: 'x86_64' },
] as const

function toOsToken(os: OsKind): OsToken | null {
  switch (os) {
    case 'mac':
      return 'darwin'
    case 'linux':
      return 'linux'
    case 'windows':
      return null
  }
}

/**
 * Validate an (os, arch) pair and return its asset tokens.
 *
 * @throws UnsupportedPlatformError with reason "os", "arch" or "arch-os-combo"
 */
export function resolvePlatformTokens(os: OsKind, arch: ArchKind): PlatformTokens {
  const osToken = toOsToken(os)
  if (!osToken) {
    throw new UnsupportedPlatformError('os', os, arch)
  }

  switch (arch) {
    case 'aarch64':
      if (osToken === 'linux') {
        throw new UnsupportedPlatformError('arch-os-combo', os, arch)
      }
      return { os: osToken, arch: 'aarch64' }
    case 'x86_64':
      return { os: osToken, arch: 'x86_64' }
    case 'x86':
      throw new UnsupportedPlatformError('arch', os, arch)
  }
}

/**
 * Apply the naming rule to already-validated tokens.
 */
export function formatAssetName(version: string, tokens: PlatformTokens): string {
  const base = `${defaults.assetPrefix}-${version}-${tokens.os}-${tokens.arch}`
  return `${base}${LIBC_SUFFIX[tokens.os]}${ARCHIVE_EXTENSION}`
}

/**
 * Compute the expected asset filename for a release version on a platform.
 *
 * @example
 * resolveAssetName('v1.2.3', { os: 'linux', arch: 'x86_64' })
 * // => 'shebe-v1.2.3-linux-x86_64-musl.tar.gz'
 */
export function resolveAssetName(version: string, target: PlatformTarget): string {
  return formatAssetName(version, resolvePlatformTokens(target.os, target.arch))
}

export function isSupportedTarget(target: PlatformTarget): boolean {
  return SUPPORTED_TARGETS.some(
    (t) => t.os === target.os && t.arch === target.arch,
  )
}
