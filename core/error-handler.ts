/**
 * Error Handler
 *
 * Centralized error taxonomy and logging.
 * - The provisioning core throws LauncherError and never exits the process
 * - CLI commands log the error and choose the exit code
 * - All entries are appended to <home>/launcher.log for debugging
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import chalk from 'chalk'
import { paths } from '../config/paths'
import type { ArchKind, OsKind } from '../types'

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info'

export type LauncherErrorInfo = {
  code: string
  message: string
  severity: ErrorSeverity
  suggestion?: string
  context?: Record<string, unknown>
}

export const ErrorCodes = {
  // Platform errors
  UNSUPPORTED_PLATFORM: 'UNSUPPORTED_PLATFORM',

  // Release errors
  ASSET_NOT_FOUND: 'ASSET_NOT_FOUND',
  FEED_ERROR: 'FEED_ERROR',

  // Download / extraction errors
  FETCH_ERROR: 'FETCH_ERROR',

  // Filesystem errors
  IO_ERROR: 'IO_ERROR',

  // Configuration errors
  INVALID_CONFIG: 'INVALID_CONFIG',

  // General errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export class LauncherError extends Error {
  public readonly code: string
  public readonly severity: ErrorSeverity
  public readonly suggestion?: string
  public readonly context?: Record<string, unknown>

  constructor(
    code: string,
    message: string,
    severity: ErrorSeverity = 'error',
    suggestion?: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'LauncherError'
    this.code = code
    this.severity = severity
    this.suggestion = suggestion
    this.context = context

    Error.captureStackTrace(this, new.target)
  }

  /**
   * Create LauncherError from an unknown error
   */
  static from(
    error: unknown,
    code: string = ErrorCodes.UNKNOWN_ERROR,
    suggestion?: string,
  ): LauncherError {
    if (error instanceof LauncherError) {
      return error
    }

    const message = error instanceof Error ? error.message : String(error)

    return new LauncherError(code, message, 'error', suggestion, {
      originalError: error instanceof Error ? error.stack : undefined,
    })
  }
}

export type UnsupportedPlatformReason = 'os' | 'arch' | 'arch-os-combo'

/**
 * The requested (os, arch) pair has no published build.
 */
export class UnsupportedPlatformError extends LauncherError {
  public readonly reason: UnsupportedPlatformReason
  public readonly os: string
  public readonly arch: string

  constructor(reason: UnsupportedPlatformReason, os: OsKind | string, arch: ArchKind | string) {
    super(
      ErrorCodes.UNSUPPORTED_PLATFORM,
      describeUnsupported(reason, os, arch),
      'fatal',
      'shebe publishes binaries for darwin/aarch64, darwin/x86_64 and linux/x86_64',
      { reason, os, arch },
    )
    this.name = 'UnsupportedPlatformError'
    this.reason = reason
    this.os = os
    this.arch = arch
  }
}

function describeUnsupported(
  reason: UnsupportedPlatformReason,
  os: string,
  arch: string,
): string {
  switch (reason) {
    case 'os':
      return `Unsupported operating system: ${os} (${arch})`
    case 'arch':
      return `Unsupported architecture: ${arch} (${os})`
    case 'arch-os-combo':
      return `Unsupported platform combination: ${os}/${arch}`
  }
}

/**
 * The resolved asset name is absent from the release. This points at a naming
 * mismatch between the resolver and the published release, so it is not retried.
 */
export class AssetNotFoundError extends LauncherError {
  public readonly assetName: string
  public readonly availableAssets: string[]

  constructor(assetName: string, version: string, availableAssets: string[]) {
    const available =
      availableAssets.length > 0 ? availableAssets.join(', ') : '(none)'
    super(
      ErrorCodes.ASSET_NOT_FOUND,
      `No release asset matching "${assetName}" in ${version}. Available: ${available}`,
      'fatal',
      'Pin a different release with --version, or report the packaging mismatch upstream',
      { assetName, version, availableAssets },
    )
    this.name = 'AssetNotFoundError'
    this.assetName = assetName
    this.availableAssets = availableAssets
  }
}

function causeMessage(cause: unknown): string | undefined {
  if (cause === undefined) return undefined
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Release feed unreachable or returned something unusable
 */
export function createFeedError(
  message: string,
  context?: Record<string, unknown>,
  cause?: unknown,
): LauncherError {
  return new LauncherError(
    ErrorCodes.FEED_ERROR,
    message,
    'error',
    'Check your network connection or set GITHUB_TOKEN if you are rate limited',
    { ...context, cause: causeMessage(cause) },
  )
}

/**
 * Download interrupted or archive corrupt/truncated
 */
export function createFetchError(
  message: string,
  context?: Record<string, unknown>,
  cause?: unknown,
): LauncherError {
  return new LauncherError(
    ErrorCodes.FETCH_ERROR,
    message,
    'error',
    'Retry the command; the partial download was discarded',
    { ...context, cause: causeMessage(cause) },
  )
}

/**
 * Filesystem failure while staging, moving or chmod-ing the binary
 */
export function createIoError(
  message: string,
  context?: Record<string, unknown>,
  cause?: unknown,
): LauncherError {
  const code =
    cause instanceof Error && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : undefined
  return new LauncherError(
    ErrorCodes.IO_ERROR,
    message,
    'error',
    code === 'EACCES' || code === 'EPERM'
      ? 'Check permissions on the install directory or pass --dir'
      : undefined,
    { ...context, cause: causeMessage(cause), errno: code },
  )
}

export function createInvalidConfigError(
  key: string,
  value: string,
): LauncherError {
  return new LauncherError(
    ErrorCodes.INVALID_CONFIG,
    `Invalid value for ${key}: "${value}"`,
    'error',
    'Run "shebe-launcher config show" to see current settings',
    { key, value },
  )
}

/**
 * Ensure the log directory exists
 */
function ensureLogDirectory(): void {
  const logDir = dirname(paths.log)
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true })
  }
}

/**
 * Append a structured log entry to the log file
 */
function appendToLogFile(entry: LauncherErrorInfo): void {
  try {
    ensureLogDirectory()
    const logEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    }
    appendFileSync(paths.log, JSON.stringify(logEntry) + '\n')
  } catch {
    // Logging must never fail the operation being logged
  }
}

/**
 * Format severity for console output
 */
function formatSeverity(severity: ErrorSeverity): string {
  switch (severity) {
    case 'fatal':
      return chalk.red.bold('[FATAL]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'warning':
      return chalk.yellow('[WARN]')
    case 'info':
      return chalk.blue('[INFO]')
  }
}

/**
 * Log an error to stderr and the log file
 */
export function logError(error: LauncherErrorInfo): void {
  const prefix = formatSeverity(error.severity)
  console.error(`${prefix} [${error.code}] ${error.message}`)

  if (error.suggestion) {
    console.error(chalk.yellow(`  Suggestion: ${error.suggestion}`))
  }

  appendToLogFile(error)
}

/**
 * Log a LauncherError instance
 */
export function logLauncherError(error: LauncherError): void {
  logError({
    code: error.code,
    message: error.message,
    severity: error.severity,
    suggestion: error.suggestion,
    context: error.context,
  })
}

/**
 * Log a warning (non-blocking, yellow output)
 */
export function logWarning(
  message: string,
  context?: Record<string, unknown>,
): void {
  console.warn(chalk.yellow(`  ⚠ ${message}`))

  appendToLogFile({
    code: 'WARNING',
    message,
    severity: 'warning',
    context,
  })
}

/**
 * Log an info message (file only)
 */
export function logInfo(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'INFO',
    message,
    severity: 'info',
    context,
  })
}

/**
 * Log a debug message (file only)
 */
export function logDebug(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'DEBUG',
    message,
    severity: 'info',
    context,
  })
}
