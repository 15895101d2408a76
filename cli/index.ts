import { program } from 'commander'
import { VERSION } from '../config/version'
import { installCommand } from './commands/install'
import { commandCommand } from './commands/command'
import { runCommand } from './commands/run'
import { assetCommand } from './commands/asset'
import { platformsCommand } from './commands/platforms'
import { listCommand } from './commands/list'
import { cleanCommand } from './commands/clean'
import { configCommand } from './commands/config'

export async function run(): Promise<void> {
  program
    .name('shebe-launcher')
    .description('Download and run the shebe-mcp server for this platform')
    .version(VERSION, '-v, --version', 'output the version number')
    // Keeps subcommand --version flags from reaching the program's own
    .enablePositionalOptions()

  program.addCommand(installCommand)
  program.addCommand(commandCommand)
  program.addCommand(runCommand)
  program.addCommand(assetCommand)
  program.addCommand(platformsCommand)
  program.addCommand(listCommand)
  program.addCommand(cleanCommand)
  program.addCommand(configCommand)

  await program.parseAsync()
}
