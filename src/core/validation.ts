// Argument classification utilities

import * as path from 'path';
import type { ClassifiedSource } from '../models/types.js';

/**
 * A URL scheme followed by ':'. Single letters are left out so that
 * Windows drive paths (C:\data\a.xml) stay local paths.
 */
const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]+):/;

const FILE_PREFIX = 'file://';

/**
 * Classify an XML_FILE / SCHEMA_FILE argument without touching the
 * filesystem or the network. Schemes other than file, http(s) and ftp
 * are not URLs to this tool: the argument is taken as a local path
 * (notes:v2.xml is a file name).
 */
export function classifySource(argument: string): ClassifiedSource {
  const match = SCHEME_PATTERN.exec(argument);
  if (!match) {
    return { kind: 'local-path', path: argument };
  }

  const scheme = match[1].toLowerCase();
  switch (scheme) {
    case 'file':
      return { kind: 'file-uri', path: stripFileScheme(argument) };
    case 'http':
    case 'https':
      return { kind: 'http-url', url: argument };
    case 'ftp':
      return classifyFtp(argument);
    default:
      return { kind: 'local-path', path: argument };
  }
}

/**
 * Drop the file:// (or bare file:) prefix, leaving a filesystem path
 */
export function stripFileScheme(argument: string): string {
  if (argument.toLowerCase().startsWith(FILE_PREFIX)) {
    return argument.slice(FILE_PREFIX.length);
  }
  return argument.slice('file:'.length);
}

function classifyFtp(argument: string): ClassifiedSource {
  if (!URL.canParse(argument)) {
    return { kind: 'ftp-url', url: argument, host: '', path: '' };
  }
  const url = new URL(argument);
  return {
    kind: 'ftp-url',
    url: argument,
    host: url.hostname,
    port: url.port ? Number(url.port) : undefined,
    path: decodePath(url.pathname)
  };
}

/**
 * Percent-decode a URL path; a malformed escape (a%zz.xml) keeps the raw path
 */
function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch (error) {
    if (error instanceof URIError) {
      return pathname;
    }
    throw error;
  }
}

/**
 * Shortened display form of a local file: its base name
 */
export function shortenFileName(filePath: string): string {
  return path.basename(filePath);
}
