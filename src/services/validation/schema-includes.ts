// Discovery and loading of schema documents referenced by include/import/redefine

import * as path from 'path';
import { XMLParser } from 'fast-xml-parser';
import { Logger } from '../../core/logger.js';
import type { SchemaFile } from '../../models/types.js';
import { ResourceResolver } from '../resolver/resource-resolver.js';

const REFERENCE_ELEMENTS = new Set(['include', 'import', 'redefine', 'override']);

const ABSOLUTE_URL = /^[A-Za-z][A-Za-z0-9+.-]+:/;

/** Opening tag of a reference element, with any namespace prefix */
const REFERENCE_TAG = /<(?:[A-Za-z_][\w.-]*:)?(?:include|import|redefine|override)\b[^>]*>/g;

const LOCATION_ATTRIBUTE = /(\bschemaLocation\s*=\s*)(["'])([^"']*)\2/;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@',
  removeNSPrefix: true
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * schemaLocation values of the top-level include/import/redefine/override
 * elements, in document order per element kind
 */
export function findSchemaLocations(schemaText: string): string[] {
  const document: unknown = parser.parse(schemaText);
  if (!isRecord(document) || !isRecord(document.schema)) {
    return [];
  }

  const root = document.schema;
  const locations: string[] = [];
  for (const element of REFERENCE_ELEMENTS) {
    const value = root[element];
    if (value === undefined) continue;
    const entries: unknown[] = Array.isArray(value) ? value : [value];
    for (const entry of entries) {
      if (isRecord(entry) && typeof entry['@schemaLocation'] === 'string') {
        const location = entry['@schemaLocation'].trim();
        if (location) locations.push(location);
      }
    }
  }
  return locations;
}

/**
 * Point the schemaLocation of each reference element at the name given
 * for it in renames (keyed by the original location). Other text is
 * left untouched.
 */
export function rewriteSchemaLocations(schemaText: string, renames: ReadonlyMap<string, string>): string {
  if (renames.size === 0) {
    return schemaText;
  }
  return schemaText.replace(REFERENCE_TAG, tag =>
    tag.replace(LOCATION_ATTRIBUTE, (attribute: string, prefix: string, quote: string, value: string) => {
      const name = renames.get(value.trim());
      return name === undefined ? attribute : `${prefix}${quote}${name}${quote}`;
    })
  );
}

/**
 * A name for the engine's virtual filesystem, which has no directories:
 * the base name, numbered when another schema already has it
 * (types.xsd, types-2.xsd, ...)
 */
export function uniqueFileName(baseName: string, taken: ReadonlySet<string>): string {
  const base = baseName || 'schema.xsd';
  if (!taken.has(base)) {
    return base;
  }
  const extension = path.posix.extname(base);
  const stem = base.slice(0, base.length - extension.length);
  let counter = 2;
  while (taken.has(`${stem}-${counter}${extension}`)) {
    counter++;
  }
  return `${stem}-${counter}${extension}`;
}

function baseNameOf(location: string, remote: boolean): string {
  if (remote) {
    return path.posix.basename(new URL(location).pathname);
  }
  return path.basename(location);
}

interface PendingSchema {
  text: string;
  /** Absolute path or URL the schema came from */
  location: string;
  fileName: string;
}

export interface SchemaRoot {
  text: string;
  location: string;
  remote: boolean;
  fileName: string;
}

/**
 * The root schema as the engine should see it, and the documents it
 * pulls in, all with schemaLocation pointing at their engine names
 */
export interface SchemaSet {
  root: string;
  includes: SchemaFile[];
}

/**
 * Loads every schema document reachable from a root schema through
 * relative schemaLocation references, each one once.
 */
export class SchemaIncludeLoader {
  private readonly logger: Logger;

  constructor(private readonly resolver: ResourceResolver, logger?: Logger) {
    this.logger = logger ?? Logger.getInstance();
  }

  async load(root: SchemaRoot): Promise<SchemaSet> {
    const names = new Map<string, string>([[root.location, root.fileName]]);
    const taken = new Set<string>([root.fileName]);
    const includes: SchemaFile[] = [];
    let rootText = root.text;

    const queue: PendingSchema[] = [{ text: root.text, location: root.location, fileName: root.fileName }];
    for (let current = queue.shift(); current; current = queue.shift()) {
      const renames = new Map<string, string>();

      for (const reference of findSchemaLocations(current.text)) {
        if (ABSOLUTE_URL.test(reference)) {
          this.logger.debug('Skipping absolute schema reference', { reference });
          continue;
        }

        const target = root.remote
          ? new URL(reference, current.location).href
          : path.resolve(path.dirname(current.location), reference);

        let fileName = names.get(target);
        if (fileName === undefined) {
          fileName = uniqueFileName(baseNameOf(target, root.remote), taken);
          names.set(target, fileName);
          taken.add(fileName);
          this.logger.debug('Loading referenced schema', { reference, target, fileName });

          const resource = await this.resolver.resolve(target, 'SCHEMA_FILE');
          const text = await this.resolver.readText(resource);
          queue.push({ text, location: target, fileName });
        }
        renames.set(reference, fileName);
      }

      const text = rewriteSchemaLocations(current.text, renames);
      if (current.location === root.location) {
        rootText = text;
      } else {
        includes.push({ fileName: current.fileName, contents: text });
      }
    }

    return { root: rootText, includes };
  }
}
