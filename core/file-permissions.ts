/**
 * Permission Setter
 *
 * Ensures the owner-execute bit is set on a provisioned binary. Safe to call
 * repeatedly: an already executable file keeps its mode.
 */

import type { Stats } from 'fs'
import { chmod, stat } from 'fs/promises'
import { createIoError } from './error-handler'

export type PermissionSetter = {
  makeExecutable(filePath: string): Promise<void>
}

const OWNER_EXECUTE = 0o100

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile()
  } catch {
    return false
  }
}

export async function makeExecutable(filePath: string): Promise<void> {
  let fileStat: Stats
  try {
    fileStat = await stat(filePath)
  } catch (error) {
    throw createIoError(`Cannot stat ${filePath}`, { filePath }, error)
  }

  if (!fileStat.isFile()) {
    throw createIoError(`Not a regular file: ${filePath}`, { filePath })
  }

  const mode = fileStat.mode & 0o7777
  if (mode & OWNER_EXECUTE) return

  try {
    await chmod(filePath, mode | OWNER_EXECUTE)
  } catch (error) {
    throw createIoError(`Failed to make ${filePath} executable`, { filePath }, error)
  }
}

export const filePermissions: PermissionSetter = { makeExecutable }
