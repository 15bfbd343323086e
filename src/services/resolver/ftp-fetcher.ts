// FTP retrieval of XML documents and schemas

import { Writable } from 'stream';
import { Client } from 'basic-ftp';
import { FtpTransferError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import type { FtpConfig } from '../../core/schemas.js';

/**
 * The part of basic-ftp's Client the fetcher drives
 */
export interface FtpClientLike {
  connect(host: string, port?: number): Promise<unknown>;
  login(user: string, password: string): Promise<unknown>;
  send(command: string): Promise<unknown>;
  downloadTo(destination: Writable, fromRemotePath: string): Promise<unknown>;
  close(): void;
}

export type FtpClientFactory = () => FtpClientLike;

export interface FtpTarget {
  url: string;
  host: string;
  port?: number;
  path: string;
}

export interface FtpFetcherOptions {
  /** Defaults to a basic-ftp Client with its timeout disabled */
  createClient?: FtpClientFactory;
  credentials?: Partial<FtpConfig>;
  logger?: Logger;
}

const DEFAULT_CREDENTIALS: FtpConfig = {
  user: 'anonymous',
  password: 'anonymous@',
  port: 21
};

export class FtpFetcher {
  private readonly createClient: FtpClientFactory;
  private readonly credentials: FtpConfig;
  private readonly logger: Logger;

  constructor(options: FtpFetcherOptions = {}) {
    this.createClient = options.createClient ?? (() => new Client(0));
    this.credentials = { ...DEFAULT_CREDENTIALS, ...options.credentials };
    this.logger = options.logger ?? Logger.getInstance();
  }

  /**
   * Log in, retrieve the file in binary mode and decode it as UTF-8.
   * The connection is closed on every path out.
   */
  async fetchText(target: FtpTarget): Promise<string> {
    if (!target.host) {
      throw new FtpTransferError('Invalid FTP URL', target.url);
    }

    const port = target.port ?? this.credentials.port;
    const client = this.createClient();
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      }
    });

    try {
      this.logger.debug('FTP connect', { host: target.host, port });
      await client.connect(target.host, port);
      await client.login(this.credentials.user, this.credentials.password);
      await client.send('TYPE I');
      this.logger.debug('FTP RETR', { path: target.path });
      await client.downloadTo(sink, target.path);
    } catch (error) {
      throw new FtpTransferError(error instanceof Error ? error.message : String(error), target.url);
    } finally {
      client.close();
    }

    return decodeUtf8(Buffer.concat(chunks), target.url);
  }
}

function decodeUtf8(bytes: Buffer, url: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new FtpTransferError('Retrieved content is not valid UTF-8', url);
  }
}
