import { existsSync } from 'fs'
import { readFile, writeFile, mkdir } from 'fs/promises'
import { dirname, resolve } from 'path'
import { defaults, ENV_VARS, SAFE_VERSION } from '../config/defaults'
import { paths } from '../config/paths'
import { createInvalidConfigError, logDebug, logWarning } from './error-handler'
import type { LauncherConfig, LauncherSettings } from '../types'

export const CONFIG_KEYS = ['repository', 'version', 'installDir'] as const

export type ConfigKey = (typeof CONFIG_KEYS)[number]

export type SettingsOverrides = {
  repository?: string
  version?: string
  installDir?: string
}

const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Keep only the known string fields of a parsed config file
 */
function parseConfig(data: unknown): LauncherConfig | null {
  if (!isRecord(data)) return null

  const config: LauncherConfig = {}
  for (const key of [...CONFIG_KEYS, 'updatedAt'] as const) {
    const value = data[key]
    if (typeof value === 'string' && value.length > 0) {
      config[key] = value
    }
  }
  return config
}

/**
 * @throws INVALID_CONFIG when the value cannot be used for key
 */
export function validateConfigValue(key: ConfigKey, value: string): string {
  const trimmed = value.trim()
  switch (key) {
    case 'repository':
      if (!REPOSITORY_PATTERN.test(trimmed)) {
        throw createInvalidConfigError(key, value)
      }
      return trimmed
    case 'version':
      if (!SAFE_VERSION.test(trimmed)) {
        throw createInvalidConfigError(key, value)
      }
      return trimmed
    case 'installDir':
      if (!trimmed) {
        throw createInvalidConfigError(key, value)
      }
      return resolve(trimmed)
  }
}

export class ConfigManager {
  private config: LauncherConfig | null = null

  /**
   * Load config from disk, returning an empty config if it doesn't exist
   */
  async load(): Promise<LauncherConfig> {
    if (this.config) {
      return this.config
    }

    const configPath = paths.config

    if (!existsSync(configPath)) {
      this.config = {}
      return this.config
    }

    try {
      const content = await readFile(configPath, 'utf8')
      const parsed = parseConfig(JSON.parse(content))
      if (!parsed) {
        throw new Error('Config root is not an object')
      }
      this.config = parsed
      return this.config
    } catch (error) {
      // If config is corrupted, reset to default
      logWarning('Config file corrupted, resetting to default', {
        configPath,
        error: error instanceof Error ? error.message : String(error),
      })
      this.config = {}
      await this.save()
      return this.config
    }
  }

  /**
   * Save config to disk
   */
  async save(): Promise<void> {
    const configPath = paths.config

    await mkdir(dirname(configPath), { recursive: true })

    if (this.config) {
      this.config.updatedAt = new Date().toISOString()
      await writeFile(configPath, JSON.stringify(this.config, null, 2))
    }
  }

  async get(key: ConfigKey): Promise<string | undefined> {
    const config = await this.load()
    return config[key]
  }

  async set(key: ConfigKey, value: string): Promise<string> {
    const validated = validateConfigValue(key, value)
    const config = await this.load()
    config[key] = validated
    await this.save()
    logDebug('Config updated', { key, value: validated })
    return validated
  }

  async unset(key: ConfigKey): Promise<void> {
    const config = await this.load()
    delete config[key]
    await this.save()
  }

  async getConfig(): Promise<LauncherConfig> {
    return this.load()
  }

  /**
   * Merge settings: flags > environment > config file > defaults
   */
  async getSettings(
    overrides: SettingsOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
  ): Promise<LauncherSettings> {
    const config = await this.load()

    const pick = (key: ConfigKey, envName: string): string | undefined => {
      const flag = overrides[key]
      if (flag) return validateConfigValue(key, flag)
      const fromEnv = env[envName]
      if (fromEnv) return validateConfigValue(key, fromEnv)
      return config[key]
    }

    return {
      repository: pick('repository', ENV_VARS.repository) ?? defaults.repository,
      version: pick('version', ENV_VARS.version) ?? null,
      installDir: pick('installDir', ENV_VARS.installDir) ?? paths.bin,
      githubToken: env[ENV_VARS.githubToken] || null,
    }
  }

  /**
   * Drop the in-memory copy so the next load re-reads the file
   */
  reset(): void {
    this.config = null
  }
}

export const configManager = new ConfigManager()
