/**
 * The `dsh` command tree
 */

import { Command } from 'commander';

import { DataSafeHavenError, errorMessage } from '../utils/errors.js';
import { getLogger, setConsoleLevel, showConsoleLevel } from '../utils/logger.js';
import { getVersion } from '../utils/version.js';
import { type CommandServices, defaultServices } from './common.js';
import { registerConfigCommands } from './config.js';
import { registerContextCommands } from './context.js';
import { registerShmCommands } from './shm.js';
import { registerSreCommands } from './sre.js';
import { registerUsersCommands } from './users.js';

interface GlobalOptions {
  verbose?: boolean;
  showLevel?: boolean;
}

export function createProgram(services: Partial<CommandServices> = {}): Command {
  const resolved: CommandServices = { ...defaultServices, ...services };
  const program = new Command();

  program
    .name('dsh')
    .description('Deploy and administer Data Safe Haven management and research environments on Azure')
    .version(getVersion())
    .option('-v, --verbose', 'Show debug messages on the console')
    .option('--show-level', 'Prefix console messages with their level')
    .hook('preAction', (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      if (options.verbose) setConsoleLevel('debug');
      if (options.showLevel) showConsoleLevel();
    });

  registerContextCommands(program, resolved);
  registerConfigCommands(program, resolved);
  registerShmCommands(program, resolved);
  registerSreCommands(program, resolved);
  registerUsersCommands(program, resolved);

  return program;
}

/**
 * Run a command line, logging any failure and setting a non-zero exit code
 */
export async function runProgram(argv: string[], program: Command = createProgram()): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (e) {
    const logger = getLogger();
    if (e instanceof DataSafeHavenError) {
      for (const line of e.message.split('\n')) {
        logger.critical(line);
      }
    } else {
      logger.critical(`Unexpected error: ${errorMessage(e)}`);
    }
    process.exitCode = 1;
  }
}
