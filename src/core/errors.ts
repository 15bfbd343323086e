// Domain-specific error types for xml-validate

/**
 * Base error class for all tool errors
 */
export abstract class ValidatorToolError extends Error {
  abstract readonly code: string;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Failure to turn an XML_FILE / SCHEMA_FILE argument into content.
 * The message is the exact text printed to the user.
 */
export abstract class ResolutionError extends ValidatorToolError {
  constructor(message: string, public readonly argument: string, context?: Record<string, unknown>) {
    super(message, { ...context, argument });
  }
}

/**
 * Local path (or file:// URI) that does not name an existing file
 */
export class PathNotFoundError extends ResolutionError {
  readonly code = 'PATH_NOT_FOUND';

  constructor(label: string, filePath: string, argument: string) {
    super(`Error: Invalid value for ${label}\nPath ${filePath} does not exist.\n`, argument, { label, path: filePath });
  }
}

/**
 * Non-2xx HTTP response
 */
export class HttpStatusError extends ResolutionError {
  readonly code = 'HTTP_ERROR';

  constructor(public readonly status: number, reason: string, url: string) {
    super(`${status} ${httpErrorKind(status)}: ${reason} for url: ${url}\nMake sure the URL is correct.\n`, url, { status });
  }
}

/**
 * HTTP request that never produced a response (DNS, refused connection, TLS)
 */
export class HttpRequestError extends ResolutionError {
  readonly code = 'HTTP_REQUEST_ERROR';

  constructor(detail: string, url: string) {
    super(`${detail} (${url})\nMake sure the URL is correct.\n`, url);
  }
}

/**
 * 2xx HTTP response whose content type is neither XML nor plain text
 */
export class ContentTypeError extends ResolutionError {
  readonly code = 'CONTENT_TYPE_ERROR';

  constructor(url: string, public readonly contentType: string) {
    super(`Error: Content of the URL (${url})\nis not in XML format. Make sure the URL is correct.\n`, url, { contentType });
  }
}

/**
 * FTP protocol or transfer failure
 */
export class FtpTransferError extends ResolutionError {
  readonly code = 'FTP_ERROR';

  constructor(detail: string, url: string) {
    super(`${detail} (${url})\nMake sure the URL is correct.\n`, url);
  }
}

/**
 * Invalid configuration file or environment
 */
export class ConfigError extends ValidatorToolError {
  readonly code = 'CONFIG_ERROR';
}

function httpErrorKind(status: number): string {
  if (status >= 400 && status < 500) return 'Client Error';
  if (status >= 500 && status < 600) return 'Server Error';
  return 'HTTP Error';
}
