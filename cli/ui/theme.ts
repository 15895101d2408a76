import chalk from 'chalk'

/**
 * Color theme for the launcher CLI
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,

  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,

  bold: chalk.bold,
  dim: chalk.dim,

  version: chalk.yellow,
  path: chalk.gray,
  command: chalk.cyan,

  icons: {
    success: chalk.green('✔'),
    error: chalk.red('✖'),
    warning: chalk.yellow('⚠'),
    info: chalk.blue('ℹ'),
    arrow: chalk.cyan('→'),
    bullet: chalk.gray('•'),
  },
}

/**
 * Format a header box
 */
export function header(text: string): string {
  const line = '─'.repeat(text.length + 4)
  return `
${chalk.cyan('┌' + line + '┐')}
${chalk.cyan('│')}  ${chalk.bold(text)}  ${chalk.cyan('│')}
${chalk.cyan('└' + line + '┘')}
`.trim()
}

export function uiSuccess(message: string): string {
  return `${theme.icons.success} ${message}`
}

export function uiError(message: string): string {
  return `${theme.icons.error} ${chalk.red(message)}`
}

export function uiWarning(message: string): string {
  return `${theme.icons.warning} ${chalk.yellow(message)}`
}

export function uiInfo(message: string): string {
  return `${theme.icons.info} ${message}`
}

/**
 * Format a key-value pair
 */
export function keyValue(key: string, value: string): string {
  return `${chalk.gray(key + ':')} ${value}`
}
