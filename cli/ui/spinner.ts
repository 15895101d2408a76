import ora, { type Ora } from 'ora'

/**
 * Create a spinner with consistent styling. Spinners write to stderr so
 * stdout stays clean for --json and path output.
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
    stream: process.stderr,
  })
}

/**
 * Run an async operation with a spinner
 */
export async function withSpinner<T>(
  text: string,
  operation: (updateText: (message: string) => void) => Promise<T>,
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation((message: string) => {
      spinner.text = message
    })
    spinner.succeed()
    return result
  } catch (error) {
    spinner.fail(error instanceof Error ? error.message : String(error))
    throw error
  }
}
