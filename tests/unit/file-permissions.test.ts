/**
 * Unit tests for file-permissions module
 */

import { describe, it, before } from 'node:test'
import { chmod, mkdir, stat, writeFile } from 'fs/promises'
import { join } from 'path'
import { ErrorCodes } from '../../core/error-handler'
import { isRegularFile, makeExecutable } from '../../core/file-permissions'
import { makeTempDir, useTempHome } from '../utils/fixtures'
import { assert, assertEqual, assertRejectsWithCode } from '../utils/assertions'

const isWindows = process.platform === 'win32'

before(() => {
  useTempHome()
})

describe('makeExecutable', { skip: isWindows }, () => {
  it('should add the owner execute bit to a plain file', async () => {
    const dir = await makeTempDir('perm')
    const file = join(dir, 'shebe-mcp')
    await writeFile(file, 'bin')
    await chmod(file, 0o644)

    await makeExecutable(file)

    assertEqual((await stat(file)).mode & 0o777, 0o744, 'Mode after chmod')
  })

  it('should keep extra bits already present', async () => {
    const dir = await makeTempDir('perm')
    const file = join(dir, 'shebe-mcp')
    await writeFile(file, 'bin')
    await chmod(file, 0o664)

    await makeExecutable(file)

    assertEqual((await stat(file)).mode & 0o777, 0o764, 'Group write kept')
  })

  it('should leave group and other bits alone', async () => {
    const dir = await makeTempDir('perm')
    const file = join(dir, 'shebe-mcp')
    await writeFile(file, 'bin')
    await chmod(file, 0o700)

    await makeExecutable(file)

    assertEqual((await stat(file)).mode & 0o777, 0o700, 'Owner-only mode kept')
  })

  it('should be idempotent', async () => {
    const dir = await makeTempDir('perm')
    const file = join(dir, 'shebe-mcp')
    await writeFile(file, 'bin')
    await chmod(file, 0o755)

    await makeExecutable(file)
    await makeExecutable(file)

    assertEqual((await stat(file)).mode & 0o777, 0o755, 'Mode unchanged')
  })

  it('should fail for a missing file', async () => {
    const dir = await makeTempDir('perm')
    const error = await assertRejectsWithCode(
      () => makeExecutable(join(dir, 'missing')),
      ErrorCodes.IO_ERROR,
      'Missing file',
    )
    assertEqual(error.context?.errno, 'ENOENT', 'errno')
  })

  it('should refuse directories', async () => {
    const dir = await makeTempDir('perm')
    const sub = join(dir, 'shebe-mcp')
    await mkdir(sub)

    const error = await assertRejectsWithCode(
      () => makeExecutable(sub),
      ErrorCodes.IO_ERROR,
      'Directory',
    )
    assertEqual(error.message, `Not a regular file: ${sub}`, 'Message')
  })
})

describe('isRegularFile', () => {
  it('should distinguish files from directories and missing paths', async () => {
    const dir = await makeTempDir('perm')
    const file = join(dir, 'f')
    await writeFile(file, '')

    assert(await isRegularFile(file), 'File')
    assert(!(await isRegularFile(dir)), 'Directory')
    assert(!(await isRegularFile(join(dir, 'nope'))), 'Missing')
  })
})
