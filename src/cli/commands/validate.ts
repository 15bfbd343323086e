// Validate command - check an XML document against an XSD schema

import { Command } from 'commander';
import type { ColorSupportLevel } from 'chalk';
import { ResolutionError } from '../../core/errors.js';
import { Logger, LogLevel, parseLogLevel } from '../../core/logger.js';
import type { AppConfig } from '../../core/schemas.js';
import { ConfigService } from '../../services/config/config-service.js';
import { FtpFetcher } from '../../services/resolver/ftp-fetcher.js';
import { HttpFetcher } from '../../services/resolver/http-fetcher.js';
import { ResourceResolver } from '../../services/resolver/resource-resolver.js';
import { createPalette, formatReport, formatResolutionError, renderLines } from '../../services/report/reporter.js';
import { ValidationService } from '../../services/validation/validation-service.js';

/**
 * Where the command writes, and what the terminal supports
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  colorLevel: ColorSupportLevel;
}

export type ServiceFactory = (config: AppConfig, logger: Logger) => ValidationService;

export interface ValidateCommandDeps {
  io: CliIo;
  config: ConfigService;
  createService: ServiceFactory;
}

interface ValidateOptions {
  verbose?: boolean;
}

export const COMMAND_NAME = 'xml-validate';

/**
 * Default wiring: real fetchers, resolver and libxml2 validator
 */
export const createValidationService: ServiceFactory = (config, logger) => {
  const resolver = new ResourceResolver({
    logger,
    http: new HttpFetcher({ headers: config.http.headers, logger }),
    ftp: new FtpFetcher({ credentials: config.ftp, logger })
  });
  return new ValidationService({ resolver, logger });
};

function usageError(command: Command, message: string): never {
  command.error(
    `Usage: ${COMMAND_NAME} [OPTIONS] XML_FILE SCHEMA_FILE\n` +
    `Try '${COMMAND_NAME} --help' for help.\n\n` +
    `Error: ${message}`,
    { exitCode: 2, code: 'xml-validate.usage' }
  );
}

/**
 * Positional arguments are declared optional so that a missing or extra
 * one is reported in this tool's own words.
 */
function checkArguments(command: Command, xmlFile: string | undefined, schemaFile: string | undefined): [string, string] {
  if (xmlFile === undefined) {
    usageError(command, "Missing argument 'XML_FILE'.");
  }
  if (schemaFile === undefined) {
    usageError(command, "Missing argument 'SCHEMA_FILE'.");
  }
  const extra = command.args.slice(2);
  if (extra.length === 1) {
    usageError(command, `Got unexpected extra argument (${extra[0]})`);
  }
  if (extra.length > 1) {
    usageError(command, `Got unexpected extra arguments (${extra.join(' ')})`);
  }
  return [xmlFile, schemaFile];
}

export function registerValidateCommand(program: Command, deps: ValidateCommandDeps): void {
  const { io } = deps;

  program
    .usage('[OPTIONS] XML_FILE SCHEMA_FILE')
    .argument('[XML_FILE]', 'XML document: path, file:// URI, http(s):// or ftp:// URL')
    .argument('[SCHEMA_FILE]', 'XSD schema: path, file:// URI, http(s):// or ftp:// URL')
    .option('-v, --verbose', 'Verbose printout for XML validation errors.')
    .allowExcessArguments(true)
    .action(async (xmlArg: string | undefined, schemaArg: string | undefined, options: ValidateOptions, command: Command) => {
      const [xmlFile, schemaFile] = checkArguments(command, xmlArg, schemaArg);
      const verbose = options.verbose === true;

      const config = await deps.config.load();
      const logger = new Logger({
        level: parseLogLevel(config.logLevel) ?? LogLevel.WARN,
        write: line => io.stderr(`${line}\n`)
      });
      const palette = createPalette(config.color, io.colorLevel);
      const service = deps.createService(config, logger);

      try {
        const run = await service.validate(xmlFile, schemaFile);
        logger.info('Validation finished', { status: run.outcome.status });
        io.stdout(renderLines(formatReport(run.outcome, run.subject, verbose), palette));
      } catch (error) {
        if (!(error instanceof ResolutionError)) {
          throw error;
        }
        logger.debug('Argument could not be resolved', { code: error.code, argument: error.argument });
        io.stdout(renderLines(formatResolutionError(error), palette));
      }
    });
}
