/**
 * Platform Service
 *
 * The single place that reads the host's OS and CPU architecture. Everything
 * downstream (resolver, provisioner) receives a PlatformTarget value instead of
 * querying the environment, so it can be exercised for any platform in tests.
 */

import { UnsupportedPlatformError } from './error-handler'
import type { ArchKind, OsKind, PlatformTarget } from '../types'

// =============================================================================
// Types
// =============================================================================

export type PlatformInfo = {
  target: PlatformTarget
  nodePlatform: NodeJS.Platform
  nodeArch: NodeJS.Architecture
}

// =============================================================================
// Node identifiers -> launcher identifiers
// =============================================================================

const OS_MAP: Partial<Record<NodeJS.Platform, OsKind>> = {
  darwin: 'mac',
  linux: 'linux',
  win32: 'windows',
}

const ARCH_MAP: Partial<Record<NodeJS.Architecture, ArchKind>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'x86',
}

/**
 * Map Node's platform/arch identifiers to a PlatformTarget.
 *
 * Platforms Node knows about but the launcher has no vocabulary for
 * (freebsd, s390x, ...) are rejected here rather than passed through.
 */
export function toPlatformTarget(
  nodePlatform: NodeJS.Platform,
  nodeArch: NodeJS.Architecture,
): PlatformTarget {
  const os = OS_MAP[nodePlatform]
  if (!os) {
    throw new UnsupportedPlatformError('os', nodePlatform, nodeArch)
  }

  const arch = ARCH_MAP[nodeArch]
  if (!arch) {
    throw new UnsupportedPlatformError('arch', os, nodeArch)
  }

  return { os, arch }
}

// =============================================================================
// Service
// =============================================================================

export class PlatformService {
  private cachedPlatformInfo: PlatformInfo | null = null

  constructor(
    private readonly nodePlatform: NodeJS.Platform = process.platform,
    private readonly nodeArch: NodeJS.Architecture = process.arch,
  ) {}

  /**
   * Detected once, then served from memory
   */
  getPlatformInfo(): PlatformInfo {
    if (this.cachedPlatformInfo) return this.cachedPlatformInfo

    this.cachedPlatformInfo = {
      target: toPlatformTarget(this.nodePlatform, this.nodeArch),
      nodePlatform: this.nodePlatform,
      nodeArch: this.nodeArch,
    }
    return this.cachedPlatformInfo
  }

  getTarget(): PlatformTarget {
    return this.getPlatformInfo().target
  }
}

export const platformService = new PlatformService()
