// Program construction and execution, shared by the bin entry and tests

import { Command } from 'commander';
import version from '../version.js';
import { ConfigService } from '../services/config/config-service.js';
import {
  COMMAND_NAME,
  createValidationService,
  registerValidateCommand,
  type CliIo,
  type ServiceFactory
} from './commands/validate.js';
import { handleError } from './utils/error-handler.js';

export interface RunOptions {
  io: CliIo;
  config?: ConfigService;
  createService?: ServiceFactory;
}

export function createProgram(options: RunOptions): Command {
  const { io } = options;
  const program = new Command();

  program
    .name(COMMAND_NAME)
    .description('Validate an XML against an XSD SCHEMA.')
    .version(version)
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr
    });

  registerValidateCommand(program, {
    io,
    config: options.config ?? new ConfigService(),
    createService: options.createService ?? createValidationService
  });

  return program;
}

/**
 * Parse user arguments (without node and script path), run the command
 * and return the process exit code
 */
export async function runCli(args: string[], options: RunOptions): Promise<number> {
  const program = createProgram(options);
  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    return handleError(error, options.io.stderr);
  }
}
