/**
 * Validation Service
 *
 * Resolves the XML and schema arguments, loads the schema documents they
 * reference and runs the schema validator. Resolution failures surface as
 * ResolutionError; every other way a run can end is a ValidationOutcome.
 */

import * as path from 'path';
import { Logger } from '../../core/logger.js';
import { shortenFileName } from '../../core/validation.js';
import type { ReportSubject, ResolvedResource, ValidationOutcome } from '../../models/types.js';
import { ResourceResolver, resourceLocation } from '../resolver/resource-resolver.js';
import { SchemaIncludeLoader } from './schema-includes.js';
import { SchemaValidator, expandInternalEntities, stripBom, type EngineDocument } from './schema-validator.js';

export interface ValidationRun {
  outcome: ValidationOutcome;
  subject: ReportSubject;
}

export interface ValidationServiceOptions {
  resolver?: ResourceResolver;
  validator?: SchemaValidator;
  logger?: Logger;
}

export class ValidationService {
  private readonly resolver: ResourceResolver;
  private readonly validator: SchemaValidator;
  private readonly includes: SchemaIncludeLoader;
  private readonly logger: Logger;

  constructor(options: ValidationServiceOptions = {}) {
    this.logger = options.logger ?? Logger.getInstance();
    this.resolver = options.resolver ?? new ResourceResolver({ logger: this.logger });
    this.validator = options.validator ?? new SchemaValidator({ logger: this.logger });
    this.includes = new SchemaIncludeLoader(this.resolver, this.logger);
  }

  /**
   * Validate the document named by xmlArgument against the schema named
   * by schemaArgument.
   *
   * @throws ResolutionError when either argument cannot be resolved
   */
  async validate(xmlArgument: string, schemaArgument: string): Promise<ValidationRun> {
    const xmlResource = await this.resolver.resolve(xmlArgument, 'XML_FILE');
    const schemaResource = await this.resolver.resolve(schemaArgument, 'SCHEMA_FILE');
    const subject = reportSubject(xmlResource);

    const schema: EngineDocument = {
      fileName: engineFileName(schemaResource, 'schema.xsd'),
      contents: stripBom(await this.resolver.readText(schemaResource))
    };
    const xml: EngineDocument = {
      fileName: engineFileName(xmlResource, 'document.xml'),
      contents: stripBom(await this.resolver.readText(xmlResource))
    };

    const malformed = this.validator.checkWellFormed([xml, schema]);
    if (malformed) {
      return { outcome: malformed, subject };
    }

    const schemaSet = await this.includes.load({
      text: schema.contents,
      location: resourceLocation(schemaResource),
      remote: schemaResource.content.type === 'text',
      fileName: schema.fileName
    });
    const preload = schemaSet.includes;
    schema.contents = schemaSet.root;
    this.logger.debug('Schema documents loaded', { count: preload.length + 1 });

    const taken = new Set([schema.fileName, ...preload.map(file => file.fileName)]);
    while (taken.has(xml.fileName)) {
      xml.fileName = `document-${xml.fileName}`;
    }
    xml.contents = expandInternalEntities(xml.contents);

    const outcome = await this.validator.validate({ xml, schema, preload });
    return { outcome, subject };
  }
}

/**
 * Remote documents are named by their URL, local ones by their file name
 */
export function reportSubject(resource: ResolvedResource): ReportSubject {
  if (resource.content.type === 'text') {
    return { kind: 'url', url: resource.argument };
  }
  return { kind: 'file', name: shortenFileName(resource.content.path) };
}

function engineFileName(resource: ResolvedResource, fallback: string): string {
  if (resource.content.type === 'path') {
    return path.basename(resource.content.path);
  }
  const { location } = resource.content;
  const pathname = URL.canParse(location) ? new URL(location).pathname : location;
  const name = path.posix.basename(pathname);
  return name || fallback;
}
