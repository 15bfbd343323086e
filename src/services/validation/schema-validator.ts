// XML Schema validation through libxml2 (xmllint-wasm)

import { XMLValidator } from 'fast-xml-parser';
import { validateXML } from 'xmllint-wasm';
import { Logger } from '../../core/logger.js';
import type { SchemaFile, ValidationOutcome } from '../../models/types.js';

/**
 * A document as the engine sees it: a name in its virtual filesystem
 * and the text stored under that name
 */
export interface EngineDocument {
  fileName: string;
  contents: string;
}

export interface EngineRequest {
  xml: EngineDocument;
  schema: EngineDocument;
  preload: SchemaFile[];
}

export interface EngineResult {
  valid: boolean;
  /** Raw xmllint diagnostics, one per entry */
  messages: string[];
}

export type EngineRunner = (request: EngineRequest) => Promise<EngineResult>;

/**
 * Default engine: xmllint --schema, compiled to WebAssembly
 */
export const runXmllint: EngineRunner = async ({ xml, schema, preload }) => {
  const result = await validateXML({
    xml: [xml],
    schema: [schema],
    preload: preload.map(file => ({ fileName: file.fileName, contents: file.contents }))
  });
  return {
    valid: result.valid,
    messages: result.errors.map(error => error.rawMessage)
  };
};

const VALIDITY_ERROR = 'Schemas validity error';
/** libxml2 failing on its own, e.g. on constructs its schema walker cannot handle */
const INTERNAL_ERROR = 'Internal error';
const SCHEMA_ERRORS = ['Schemas parser error', 'failed to compile', 'Schemas error'];
const PARSER_ERROR = 'parser error';

export interface Diagnostic {
  line?: number;
  reason: string;
}

/**
 * Split an xmllint diagnostic ("doc.xml:4: element age: Schemas validity
 * error : Element 'age': ...") into its line number and reason text
 */
export function parseDiagnostic(raw: string): Diagnostic {
  const text = raw.trim();
  const lineMatch = /:(\d+):/.exec(text);
  const marker = text.indexOf('error : ');
  const reason = marker >= 0 ? text.slice(marker + 'error : '.length).trim() : text;
  return lineMatch ? { line: Number(lineMatch[1]), reason } : { reason };
}

/**
 * Detail text for a document that does not conform to its schema
 */
export function formatInvalidDetail(fileName: string, messages: string[]): string {
  const blocks = messages.map(message => {
    const diagnostic = parseDiagnostic(message);
    return diagnostic.line === undefined
      ? `Reason: ${diagnostic.reason}`
      : `Reason: ${diagnostic.reason}\nLine: ${diagnostic.line}`;
  });
  return [`failed validating ${fileName}:`, ...blocks].join('\n\n');
}

/**
 * Map engine diagnostics of a failed run onto an outcome
 */
export function classifyDiagnostics(fileName: string, messages: string[]): ValidationOutcome {
  if (messages.some(message => message.includes(INTERNAL_ERROR))) {
    return { status: 'error', detail: messages.join('\n') };
  }

  const validity = messages.filter(message => message.includes(VALIDITY_ERROR));
  if (validity.length > 0) {
    return { status: 'invalid', detail: formatInvalidDetail(fileName, validity) };
  }

  if (messages.some(message => SCHEMA_ERRORS.some(marker => message.includes(marker)))) {
    return { status: 'error', detail: messages.join('\n') };
  }

  const parseFailure = messages.find(message => message.includes(PARSER_ERROR));
  if (parseFailure !== undefined) {
    return { status: 'malformed', detail: parseDiagnostic(parseFailure).reason };
  }

  return { status: 'error', detail: messages.length > 0 ? messages.join('\n') : 'Validation failed without diagnostics' };
}

export interface SchemaValidatorOptions {
  engine?: EngineRunner;
  logger?: Logger;
}

export class SchemaValidator {
  private readonly engine: EngineRunner;
  private readonly logger: Logger;

  constructor(options: SchemaValidatorOptions = {}) {
    this.engine = options.engine ?? runXmllint;
    this.logger = options.logger ?? Logger.getInstance();
  }

  /**
   * Well-formedness check of each document, in order. Returns the
   * malformed outcome for the first failure, null when all parse.
   */
  checkWellFormed(documents: EngineDocument[]): ValidationOutcome | null {
    for (const document of documents) {
      const result = XMLValidator.validate(document.contents);
      if (result !== true) {
        const { msg, line, col } = result.err;
        this.logger.debug('Document is not well-formed', { fileName: document.fileName, line, col });
        return { status: 'malformed', detail: `${msg}: line ${line}, column ${col}` };
      }
    }
    return null;
  }

  /**
   * Validate the XML against the schema. Never throws: engine failures
   * become the 'error' outcome.
   */
  async validate(request: EngineRequest): Promise<ValidationOutcome> {
    let result: EngineResult;
    try {
      result = await this.engine(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug('Validation engine threw', { message });
      const outcome = classifyDiagnostics(request.xml.fileName, message.split('\n').filter(line => line.trim()));
      return outcome.status === 'malformed' || outcome.status === 'invalid'
        ? outcome
        : { status: 'error', detail: message };
    }

    this.logger.debug('Validation engine finished', { valid: result.valid, diagnostics: result.messages.length });
    if (result.valid) {
      return { status: 'valid' };
    }
    return classifyDiagnostics(request.xml.fileName, result.messages);
  }
}

/**
 * Remove a leading byte order mark
 */
export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

const DOCTYPE_SUBSET = /<!DOCTYPE\s[^[>]*\[([\s\S]*?)\]\s*>/;
const ENTITY_DECLARATION = /<!ENTITY\s+([A-Za-z_][\w.-]*)\s+(["'])([\s\S]*?)\2\s*>/g;
const MAX_EXPANSION_PASSES = 8;

/**
 * Replace references to general entities declared in the internal DTD
 * subset with their replacement text. libxml2's schema validator cannot
 * walk entity reference nodes. The DOCTYPE itself is kept; external and
 * parameter entities are left alone.
 */
export function expandInternalEntities(text: string): string {
  const doctype = DOCTYPE_SUBSET.exec(text);
  if (!doctype) {
    return text;
  }

  const entities = new Map<string, string>();
  for (const [, name, , value] of doctype[1].matchAll(ENTITY_DECLARATION)) {
    if (!entities.has(name)) {
      entities.set(name, value);
    }
  }
  if (entities.size === 0) {
    return text;
  }

  const bodyStart = doctype.index + doctype[0].length;
  let body = text.slice(bodyStart);
  for (let pass = 0; pass < MAX_EXPANSION_PASSES; pass++) {
    const expanded = body.replace(/&([A-Za-z_][\w.-]*);/g, (reference: string, name: string) =>
      entities.get(name) ?? reference
    );
    if (expanded === body) break;
    body = expanded;
  }
  return text.slice(0, bodyStart) + body;
}
