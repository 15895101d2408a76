/**
 * Unit tests for platform-resolver module
 */

import { describe, it } from 'node:test'
import {
  SUPPORTED_TARGETS,
  formatAssetName,
  isSupportedTarget,
  resolveAssetName,
  resolvePlatformTokens,
} from '../../core/platform-resolver'
import {
  ErrorCodes,
  UnsupportedPlatformError,
} from '../../core/error-handler'
import { assert, assertDeepEqual, assertEqual } from '../utils/assertions'
import type { ArchKind, OsKind } from '../../types'

function expectUnsupported(os: OsKind, arch: ArchKind): UnsupportedPlatformError {
  try {
    resolveAssetName('v1.0.0', { os, arch })
  } catch (error) {
    assert(
      error instanceof UnsupportedPlatformError,
      `${os}/${arch} should throw UnsupportedPlatformError`,
    )
    assertEqual(error.code, ErrorCodes.UNSUPPORTED_PLATFORM, 'Error code')
    return error
  }
  throw new Error(`${os}/${arch} should not resolve`)
}

describe('resolveAssetName', () => {
  it('should name the macOS arm64 asset', () => {
    assertEqual(
      resolveAssetName('v0.5.7', { os: 'mac', arch: 'aarch64' }),
      'shebe-v0.5.7-darwin-aarch64.tar.gz',
      'mac/aarch64 asset name',
    )
  })

  it('should name the macOS x86_64 asset', () => {
    assertEqual(
      resolveAssetName('v0.5.7', { os: 'mac', arch: 'x86_64' }),
      'shebe-v0.5.7-darwin-x86_64.tar.gz',
      'mac/x86_64 asset name',
    )
  })

  it('should add the musl suffix on linux', () => {
    assertEqual(
      resolveAssetName('v1.2.3', { os: 'linux', arch: 'x86_64' }),
      'shebe-v1.2.3-linux-x86_64-musl.tar.gz',
      'linux/x86_64 asset name',
    )
  })

  it('should use the version string verbatim', () => {
    assertEqual(
      resolveAssetName('v2.0.0-rc.1', { os: 'mac', arch: 'aarch64' }),
      'shebe-v2.0.0-rc.1-darwin-aarch64.tar.gz',
      'Version is not normalized',
    )
  })

  it('should resolve every supported target', () => {
    for (const target of SUPPORTED_TARGETS) {
      const name = resolveAssetName('v0.1.0', target)
      assert(name.startsWith('shebe-v0.1.0-'), `${name} should carry the version`)
      assert(name.endsWith('.tar.gz'), `${name} should be a tarball`)
    }
  })
})

describe('unsupported platforms', () => {
  it('should reject windows for every architecture with reason os', () => {
    for (const arch of ['x86_64', 'aarch64', 'x86'] as const) {
      const error = expectUnsupported('windows', arch)
      assertEqual(error.reason, 'os', `windows/${arch} reason`)
      assertEqual(
        error.message,
        `Unsupported operating system: windows (${arch})`,
        'Message names the OS',
      )
    }
  })

  it('should reject linux on aarch64 as a combination', () => {
    const error = expectUnsupported('linux', 'aarch64')
    assertEqual(error.reason, 'arch-os-combo', 'Reason')
    assertEqual(
      error.message,
      'Unsupported platform combination: linux/aarch64',
      'Message',
    )
  })

  it('should reject 32-bit x86 with reason arch', () => {
    for (const os of ['mac', 'linux'] as const) {
      const error = expectUnsupported(os, 'x86')
      assertEqual(error.reason, 'arch', `${os}/x86 reason`)
      assertEqual(error.arch, 'x86', 'Arch carried on error')
      assertEqual(error.os, os, 'OS carried on error')
    }
  })

  it('should be fatal severity', () => {
    assertEqual(expectUnsupported('linux', 'aarch64').severity, 'fatal', 'Severity')
  })
})

describe('resolvePlatformTokens', () => {
  it('should map mac to the darwin token', () => {
    assertDeepEqual(
      resolvePlatformTokens('mac', 'x86_64'),
      { os: 'darwin', arch: 'x86_64' },
      'Tokens',
    )
  })

  it('should format names from tokens without revalidating', () => {
    assertEqual(
      formatAssetName('v9.9.9', { os: 'linux', arch: 'x86_64' }),
      'shebe-v9.9.9-linux-x86_64-musl.tar.gz',
      'Formatted name',
    )
  })
})

describe('isSupportedTarget', () => {
  it('should agree with the resolver', () => {
    assert(isSupportedTarget({ os: 'mac', arch: 'aarch64' }), 'mac/aarch64')
    assert(isSupportedTarget({ os: 'linux', arch: 'x86_64' }), 'linux/x86_64')
    assert(!isSupportedTarget({ os: 'linux', arch: 'aarch64' }), 'linux/aarch64')
    assert(!isSupportedTarget({ os: 'windows', arch: 'x86_64' }), 'windows/x86_64')
  })
})
