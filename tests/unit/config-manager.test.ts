/**
 * Unit tests for config-manager module
 */

import { describe, it, beforeEach } from 'node:test'
import { existsSync } from 'fs'
import { readFile, writeFile } from 'fs/promises'
import { resolve } from 'path'
import { paths } from '../../config/paths'
import { ErrorCodes } from '../../core/error-handler'
import {
  ConfigManager,
  isConfigKey,
  validateConfigValue,
} from '../../core/config-manager'
import { useTempHome } from '../utils/fixtures'
import {
  assert,
  assertDeepEqual,
  assertEqual,
  assertRejectsWithCode,
  assertThrowsWithCode,
} from '../utils/assertions'

beforeEach(() => {
  useTempHome()
})

describe('ConfigManager', () => {
  describe('load', () => {
    it('should return cached config on subsequent calls', async () => {
      const configManager = new ConfigManager()
      const config1 = await configManager.load()
      const config2 = await configManager.load()

      assertEqual(config1, config2, 'Should return cached config')
    })

    it('should start empty without writing a file', async () => {
      const config = await new ConfigManager().load()

      assertDeepEqual(config, {}, 'Empty config')
      assert(!existsSync(paths.config), 'No file written')
    })

    it('should reset a corrupted file', async () => {
      await writeFile(paths.config, '{ not json')

      const config = await new ConfigManager().load()

      assertEqual(config.repository, undefined, 'No repository')
      const rewritten: unknown = JSON.parse(await readFile(paths.config, 'utf8'))
      assert(typeof rewritten === 'object' && rewritten !== null, 'File rewritten')
      assert('updatedAt' in rewritten, 'Rewritten with timestamp')
    })

    it('should drop unknown and non-string fields', async () => {
      await writeFile(
        paths.config,
        JSON.stringify({ repository: 'example-org/shebe', version: 7, extra: 'x' }),
      )

      const config = await new ConfigManager().load()

      assertDeepEqual(config, { repository: 'example-org/shebe' }, 'Parsed config')
    })
  })

  describe('set / unset', () => {
    it('should persist values', async () => {
      await new ConfigManager().set('version', 'v0.2.0')

      const reloaded = await new ConfigManager().load()
      assertEqual(reloaded.version, 'v0.2.0', 'Persisted version')
    })

    it('should reject an invalid repository', async () => {
      await assertRejectsWithCode(
        () => new ConfigManager().set('repository', 'not a repo'),
        ErrorCodes.INVALID_CONFIG,
        'Invalid repository',
      )
    })

    it('should remove values', async () => {
      const manager = new ConfigManager()
      await manager.set('repository', 'example-org/shebe')
      await manager.unset('repository')

      assertEqual(await new ConfigManager().get('repository'), undefined, 'Removed')
    })
  })

  describe('getSettings', () => {
    it('should fall back to defaults', async () => {
      const settings = await new ConfigManager().getSettings({}, {})

      assertDeepEqual(
        settings,
        {
          repository: 'rhobimd-oss/shebe',
          version: null,
          installDir: paths.bin,
          githubToken: null,
        },
        'Defaults',
      )
    })

    it('should prefer flags over env over file', async () => {
      const manager = new ConfigManager()
      await manager.set('repository', 'file-org/shebe')
      await manager.set('version', 'v0.1.0')
      await manager.set('installDir', '/tmp/from-file')

      const settings = await manager.getSettings(
        { version: 'v0.3.0' },
        {
          SHEBE_REPOSITORY: 'env-org/shebe',
          SHEBE_VERSION: 'v0.2.0',
          GITHUB_TOKEN: 'test-token',
        },
      )

      assertEqual(settings.repository, 'env-org/shebe', 'Env beats file')
      assertEqual(settings.version, 'v0.3.0', 'Flag beats env')
      assertEqual(settings.installDir, resolve('/tmp/from-file'), 'File beats default')
      assertEqual(settings.githubToken, 'test-token', 'Token from env')
    })

    it('should validate environment values', async () => {
      await assertRejectsWithCode(
        () => new ConfigManager().getSettings({}, { SHEBE_VERSION: '../x' }),
        ErrorCodes.INVALID_CONFIG,
        'Invalid env version',
      )
    })
  })
})

describe('validateConfigValue', () => {
  it('should resolve install dirs to absolute paths', () => {
    assertEqual(validateConfigValue('installDir', 'bin'), resolve('bin'), 'Resolved')
  })

  it('should reject blank install dirs', () => {
    assertThrowsWithCode(
      () => validateConfigValue('installDir', '  '),
      ErrorCodes.INVALID_CONFIG,
      'Blank dir',
    )
  })

  it('should recognise config keys', () => {
    assert(isConfigKey('installDir'), 'installDir')
    assert(!isConfigKey('binaries'), 'binaries')
  })
})
