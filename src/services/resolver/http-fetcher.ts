// HTTP(S) retrieval of XML documents and schemas

import { ContentTypeError, HttpRequestError, HttpStatusError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';

/**
 * The subset of the global fetch the fetcher relies on
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * A 2xx body is accepted when its Content-Type contains one of these
 */
const ACCEPTED_CONTENT_TYPES = ['text/plain', 'xml'];

export interface HttpFetcherOptions {
  fetch?: FetchLike;
  /** Extra request headers, sent with every GET */
  headers?: Record<string, string>;
  logger?: Logger;
}

export class HttpFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: HttpFetcherOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = options.headers ?? {};
    this.logger = options.logger ?? Logger.getInstance();
  }

  /**
   * GET the URL and return its body text.
   *
   * Fails on a non-2xx status, and on a 2xx whose content type is
   * neither XML nor plain text.
   */
  async fetchText(url: string): Promise<string> {
    this.logger.debug('HTTP GET', { url });

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: this.headers, redirect: 'follow' });
    } catch (error) {
      throw new HttpRequestError(describeFetchFailure(error), url);
    }

    const finalUrl = response.url || url;
    this.logger.debug('HTTP response', { url: finalUrl, status: response.status });

    if (!response.ok) {
      // Drain the body so the connection is released
      await response.arrayBuffer();
      throw new HttpStatusError(response.status, response.statusText, finalUrl);
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!ACCEPTED_CONTENT_TYPES.some(accepted => contentType.includes(accepted))) {
      await response.arrayBuffer();
      throw new ContentTypeError(finalUrl, contentType);
    }

    return response.text();
  }
}

function describeFetchFailure(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}
