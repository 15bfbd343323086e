// Public API of xml-validate

export * from './models/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/schemas.js';
export { classifySource, stripFileScheme, shortenFileName } from './core/validation.js';
export * from './services/index.js';
export { runCli, createProgram, type RunOptions } from './cli/run.js';
export type { CliIo, ServiceFactory } from './cli/commands/validate.js';
