/**
 * Configuration Service
 *
 * Loads process-startup configuration from an optional YAML file
 * ($XML_VALIDATE_CONFIG, else .xml-validate.yaml in the working directory)
 * and applies environment overrides on top of it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { AppConfigSchema, formatIssues, type AppConfig } from '../../core/schemas.js';
import { ConfigError } from '../../core/errors.js';

export const DEFAULT_CONFIG_FILE = '.xml-validate.yaml';

export interface ConfigServiceOptions {
  /** Explicit config file; wins over the environment */
  configPath?: string;
  /** Working directory used to find the default config file */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigService {
  private readonly configPath: string;
  private readonly explicitPath: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private cachedConfig: AppConfig | null = null;

  constructor(options: ConfigServiceOptions = {}) {
    this.env = options.env ?? process.env;
    const fromEnv = this.env.XML_VALIDATE_CONFIG;
    const chosen = options.configPath ?? (fromEnv ? fromEnv : undefined);
    this.explicitPath = chosen !== undefined;
    this.configPath = path.resolve(options.cwd ?? process.cwd(), chosen ?? DEFAULT_CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration, with caching
   */
  async load(): Promise<AppConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    const raw = await this.readFile();
    const merged = this.applyEnvironment(raw);
    const result = AppConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration in ${this.configPath}\n${formatIssues(result.error)}`, {
        path: this.configPath
      });
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  private async readFile(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error) && !this.explicitPath) {
        return {};
      }
      throw new ConfigError(`Cannot read configuration file ${this.configPath}: ${describe(error)}`, {
        path: this.configPath
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigError(`Invalid YAML in ${this.configPath}: ${describe(error)}`, { path: this.configPath });
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`Configuration in ${this.configPath} must be a mapping`, { path: this.configPath });
    }
    return { ...parsed };
  }

  private applyEnvironment(raw: Record<string, unknown>): Record<string, unknown> {
    const merged = { ...raw };
    const level = this.env.XML_VALIDATE_LOG_LEVEL;
    if (level) {
      merged.logLevel = level.toLowerCase();
    }
    if (this.env.NO_COLOR) {
      merged.color = 'never';
    }
    return merged;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
