// Resource resolver: turns an XML_FILE / SCHEMA_FILE argument into content

import * as fs from 'fs/promises';
import * as path from 'path';
import { PathNotFoundError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { classifySource } from '../../core/validation.js';
import type { ArgumentLabel, ResolvedResource } from '../../models/types.js';
import { HttpFetcher } from './http-fetcher.js';
import { FtpFetcher } from './ftp-fetcher.js';

export interface ResourceResolverOptions {
  http?: HttpFetcher;
  ftp?: FtpFetcher;
  /** Base for relative local paths (default: process.cwd()) */
  cwd?: string;
  logger?: Logger;
}

export class ResourceResolver {
  private readonly http: HttpFetcher;
  private readonly ftp: FtpFetcher;
  private readonly cwd: string;
  private readonly logger: Logger;

  constructor(options: ResourceResolverOptions = {}) {
    this.logger = options.logger ?? Logger.getInstance();
    this.http = options.http ?? new HttpFetcher({ logger: this.logger });
    this.ftp = options.ftp ?? new FtpFetcher({ logger: this.logger });
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Resolve an argument into a local absolute path or a fetched body.
   *
   * @param label - which positional argument this is, quoted in errors
   * @throws ResolutionError subclasses, whose message is the text to print
   */
  async resolve(argument: string, label: ArgumentLabel): Promise<ResolvedResource> {
    const source = classifySource(argument);
    this.logger.debug('Resolving argument', { label, argument, kind: source.kind });

    switch (source.kind) {
      case 'local-path':
      case 'file-uri': {
        const absolute = await this.requireFile(source.path, label, argument);
        return { argument, source, content: { type: 'path', path: absolute } };
      }
      case 'http-url': {
        const text = await this.http.fetchText(source.url);
        return { argument, source, content: { type: 'text', text, location: source.url } };
      }
      case 'ftp-url': {
        const text = await this.ftp.fetchText(source);
        return { argument, source, content: { type: 'text', text, location: source.url } };
      }
    }
  }

  /**
   * Text of a resolved resource; local files are read as UTF-8
   */
  async readText(resource: ResolvedResource): Promise<string> {
    if (resource.content.type === 'text') {
      return resource.content.text;
    }
    return fs.readFile(resource.content.path, 'utf-8');
  }

  private async requireFile(filePath: string, label: ArgumentLabel, argument: string): Promise<string> {
    const absolute = path.resolve(this.cwd, filePath);
    try {
      const stats = await fs.stat(absolute);
      if (stats.isFile()) {
        return absolute;
      }
    } catch (error) {
      this.logger.debug('stat failed', { path: absolute, error: error instanceof Error ? error.message : String(error) });
    }
    throw new PathNotFoundError(label, filePath, argument);
  }
}

/**
 * Where a resolved resource lives: its absolute path or its URL
 */
export function resourceLocation(resource: ResolvedResource): string {
  return resource.content.type === 'path' ? resource.content.path : resource.content.location;
}
