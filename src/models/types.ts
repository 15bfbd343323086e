// Core type definitions for xml-validate

/**
 * Positional argument labels, used in resolution error messages
 */
export type ArgumentLabel = 'XML_FILE' | 'SCHEMA_FILE';

/**
 * Where an argument points
 */
export type SourceKind = 'local-path' | 'file-uri' | 'http-url' | 'ftp-url';

/**
 * Result of classifying an argument before anything is read or fetched
 */
export type ClassifiedSource =
  | { kind: 'local-path'; path: string }
  | { kind: 'file-uri'; path: string }
  | { kind: 'http-url'; url: string }
  | { kind: 'ftp-url'; url: string; host: string; port?: number; path: string };

/**
 * Content an argument resolved to: a local file, or a body held in memory
 */
export type ResolvedContent =
  | { type: 'path'; path: string }
  | { type: 'text'; text: string; location: string };

export interface ResolvedResource {
  /** The argument exactly as given on the command line */
  argument: string;
  source: ClassifiedSource;
  content: ResolvedContent;
}

/**
 * A schema document pulled in through include/import/redefine
 */
export interface SchemaFile {
  /** Flat name in the engine's virtual filesystem */
  fileName: string;
  contents: string;
}

/**
 * The four ways a validation run can end
 */
export type ValidationOutcome =
  | { status: 'valid' }
  | { status: 'invalid'; detail: string }
  | { status: 'malformed'; detail: string }
  | { status: 'error'; detail: string };

export type ValidationStatus = ValidationOutcome['status'];

/**
 * What the report names: a remote URL or a shortened local file name
 */
export type ReportSubject =
  | { kind: 'url'; url: string }
  | { kind: 'file'; name: string };

export type LineStyle = 'success' | 'failure' | 'emphasis';

/**
 * One line of terminal output; a newline is written after the text
 */
export interface ReportLine {
  text: string;
  style?: LineStyle;
}
