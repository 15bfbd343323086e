// Zod schemas for configuration validation

import { z } from 'zod';

/**
 * Log level names accepted in configuration
 */
export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Colour mode: follow terminal detection, or force on/off
 */
export const ColorModeSchema = z.enum(['auto', 'always', 'never']);

/**
 * FTP login settings, anonymous by default
 */
export const FtpConfigSchema = z.object({
  user: z.string().min(1).default('anonymous'),
  password: z.string().default('anonymous@'),
  port: z.number().int().min(1).max(65535).default(21)
}).strict();

/**
 * HTTP request settings
 */
export const HttpConfigSchema = z.object({
  headers: z.record(z.string()).default({})
}).strict();

/**
 * Full configuration schema
 */
export const AppConfigSchema = z.object({
  logLevel: LogLevelNameSchema.default('warn'),
  color: ColorModeSchema.default('auto'),
  ftp: FtpConfigSchema.default({}),
  http: HttpConfigSchema.default({})
}).strict();

export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
export type ColorMode = z.infer<typeof ColorModeSchema>;
export type FtpConfig = z.infer<typeof FtpConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
/** Shape accepted before defaults are applied */
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('\n');
}
