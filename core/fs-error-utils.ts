/**
 * Filesystem Error Utilities
 *
 * Shared error detection and file operation functions for filesystem operations.
 */

import { rename, cp, rm } from 'fs/promises'
import { logDebug } from './error-handler'

/**
 * Check if an error is a filesystem error that should trigger cp fallback
 * - EXDEV: cross-device link (rename across filesystems)
 * - EPERM: permission error (Windows filesystem operations)
 * - ENOTEMPTY: directory not empty (target exists with content)
 */
export function isRenameFallbackError(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  const code = 'code' in error ? error.code : undefined
  return (
    typeof code === 'string' && ['EXDEV', 'EPERM', 'ENOTEMPTY'].includes(code)
  )
}

/**
 * Move a file or directory from source to destination.
 * Uses rename(), with fallback to cp() + rm() for cross-device moves,
 * permission issues, or non-empty target directories.
 */
export async function moveEntry(
  sourcePath: string,
  destPath: string,
): Promise<void> {
  try {
    await rename(sourcePath, destPath)
  } catch (error) {
    if (!isRenameFallbackError(error)) {
      throw error
    }
    await cp(sourcePath, destPath, { recursive: true, force: true })
    // The destination exists at this point; a leftover source is only noise
    try {
      await rm(sourcePath, { recursive: true, force: true })
    } catch (cleanupError) {
      logDebug('Failed to clean up source after copy', {
        sourcePath,
        destPath,
        error:
          cleanupError instanceof Error
            ? cleanupError.message
            : String(cleanupError),
      })
    }
  }
}
