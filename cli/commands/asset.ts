import { Command } from 'commander'
import { resolveAssetName } from '../../core/platform-resolver'
import { platformService } from '../../core/platform-service'
import { createInvalidConfigError } from '../../core/error-handler'
import { exitWithError } from '../helpers'
import type { ArchKind, OsKind } from '../../types'

const OS_KINDS: readonly OsKind[] = ['mac', 'linux', 'windows']
const ARCH_KINDS: readonly ArchKind[] = ['x86_64', 'aarch64', 'x86']

function parseOs(value: string): OsKind {
  const os = OS_KINDS.find((k) => k === value)
  if (!os) throw createInvalidConfigError('os', value)
  return os
}

function parseArch(value: string): ArchKind {
  const arch = ARCH_KINDS.find((k) => k === value)
  if (!arch) throw createInvalidConfigError('arch', value)
  return arch
}

export const assetCommand = new Command('asset')
  .description('Print the release asset name for a version and platform')
  .argument('<version>', 'Release tag, e.g. v0.5.7')
  .option('--os <os>', `Target OS (${OS_KINDS.join(', ')})`)
  .option('--arch <arch>', `Target architecture (${ARCH_KINDS.join(', ')})`)
  .action((version: string, options: { os?: string; arch?: string }) => {
    try {
      const host =
        options.os && options.arch ? null : platformService.getTarget()
      const os = options.os ? parseOs(options.os) : host?.os
      const arch = options.arch ? parseArch(options.arch) : host?.arch
      if (!os || !arch) {
        throw createInvalidConfigError('platform', `${os}/${arch}`)
      }
      console.log(resolveAssetName(version, { os, arch }))
    } catch (error) {
      exitWithError(error)
    }
  })
