import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'url';
import * as path from 'path';
import {
  SchemaIncludeLoader,
  findSchemaLocations,
  rewriteSchemaLocations,
  uniqueFileName
} from './schema-includes.js';
import { ResourceResolver } from '../resolver/resource-resolver.js';
import { HttpFetcher } from '../resolver/http-fetcher.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { PathNotFoundError } from '../../core/errors.js';

const silent = new Logger({ level: LogLevel.SILENT });
const schemasDir = fileURLToPath(new URL('../../../fixtures/schemas/', import.meta.url));

function schema(body: string): string {
  return `<?xml version="1.0"?>\n<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">${body}</xs:schema>`;
}

async function loadLocal(relative: string) {
  const resolver = new ResourceResolver({ logger: silent });
  const location = path.join(schemasDir, relative);
  const text = await resolver.readText(await resolver.resolve(location, 'SCHEMA_FILE'));
  const loader = new SchemaIncludeLoader(resolver, silent);
  return loader.load({ text, location, remote: false, fileName: path.basename(location) });
}

describe('findSchemaLocations', () => {
  it('should collect include, import and redefine locations', () => {
    const text = schema(
      '<xs:include schemaLocation="common.xsd"/>' +
      '<xs:import namespace="urn:x" schemaLocation="types/x.xsd"/>' +
      '<xs:import namespace="urn:no-location"/>' +
      '<xs:redefine schemaLocation="base.xsd"></xs:redefine>'
    );
    expect(findSchemaLocations(text)).toEqual(['common.xsd', 'types/x.xsd', 'base.xsd']);
  });

  it('should work with any namespace prefix', () => {
    const text = '<xsd:schema xmlns:xsd="http://www.w3.org/2001/XMLSchema"><xsd:include schemaLocation="a.xsd"/></xsd:schema>';
    expect(findSchemaLocations(text)).toEqual(['a.xsd']);
  });

  it('should return nothing for a schema without references', () => {
    expect(findSchemaLocations(schema('<xs:element name="NOTE"/>'))).toEqual([]);
  });
});

describe('rewriteSchemaLocations', () => {
  it('should point reference elements at their new names', () => {
    const text = schema(
      '<xs:include schemaLocation="types.xsd"/>' +
      "<xs:import namespace=\"urn:x\" schemaLocation='../common/types.xsd'/>"
    );
    const renames = new Map([['types.xsd', 'types-2.xsd'], ['../common/types.xsd', 'types.xsd']]);
    expect(rewriteSchemaLocations(text, renames)).toBe(schema(
      '<xs:include schemaLocation="types-2.xsd"/>' +
      "<xs:import namespace=\"urn:x\" schemaLocation='types.xsd'/>"
    ));
  });

  it('should leave other elements and unknown locations alone', () => {
    const text = schema(
      '<xs:include schemaLocation="http://example.com/x.xsd"/>' +
      '<xs:annotation><xs:appinfo><ref schemaLocation="types.xsd"/></xs:appinfo></xs:annotation>'
    );
    expect(rewriteSchemaLocations(text, new Map([['types.xsd', 'other.xsd']]))).toBe(text);
  });
});

describe('uniqueFileName', () => {
  it('should keep a free base name', () => {
    expect(uniqueFileName('types.xsd', new Set(['main.xsd']))).toBe('types.xsd');
  });

  it('should number a base name that is taken', () => {
    expect(uniqueFileName('types.xsd', new Set(['types.xsd']))).toBe('types-2.xsd');
    expect(uniqueFileName('types.xsd', new Set(['types.xsd', 'types-2.xsd']))).toBe('types-3.xsd');
  });

  it('should name a URL without a file name', () => {
    expect(uniqueFileName('', new Set())).toBe('schema.xsd');
  });
});

describe('SchemaIncludeLoader', () => {
  it('should load local includes relative to the schema file', async () => {
    const { root, includes } = await loadLocal('person.xsd');
    expect(root).toContain('<xs:include schemaLocation="common.xsd"/>');
    expect(includes).toHaveLength(1);
    expect(includes[0].fileName).toBe('common.xsd');
    expect(includes[0].contents).toContain('name="PersonType"');
  });

  it('should flatten includes from subdirectories and sibling directories', async () => {
    const { root, includes } = await loadLocal('catalog/main/catalog.xsd');

    expect(root).toContain('<xs:include schemaLocation="item.xsd"/>');
    expect(root).toContain('<xs:include schemaLocation="types.xsd"/>');
    expect(includes.map(file => file.fileName)).toEqual(['item.xsd', 'types.xsd', 'types-2.xsd']);

    const [item, common, quantities] = includes;
    expect(item.contents).toContain('<xs:include schemaLocation="types-2.xsd"/>');
    expect(item.contents).toContain('<xs:include schemaLocation="types.xsd"/>');
    expect(common.contents).toContain('name="CodeType"');
    expect(quantities.contents).toContain('name="QuantityType"');
  });

  it('should fetch remote includes relative to the schema URL, each once', async () => {
    const bodies: Record<string, string> = {
      'http://example.com/schemas/a.xsd': schema('<xs:include schemaLocation="sub/b.xsd"/>'),
      'http://example.com/schemas/sub/b.xsd': schema('<xs:include schemaLocation="../a.xsd"/><xs:include schemaLocation="b.xsd"/>')
    };
    const http = new HttpFetcher({ logger: silent });
    const fetchText = vi.spyOn(http, 'fetchText').mockImplementation(async (url: string) => bodies[url]);
    const loader = new SchemaIncludeLoader(new ResourceResolver({ http, logger: silent }), silent);

    const { includes } = await loader.load({
      text: schema('<xs:include schemaLocation="a.xsd"/>'),
      location: 'http://example.com/schemas/main.xsd',
      remote: true,
      fileName: 'main.xsd'
    });

    expect(includes).toEqual([
      { fileName: 'a.xsd', contents: schema('<xs:include schemaLocation="b.xsd"/>') },
      { fileName: 'b.xsd', contents: schema('<xs:include schemaLocation="a.xsd"/><xs:include schemaLocation="b.xsd"/>') }
    ]);
    expect(fetchText).toHaveBeenCalledTimes(2);
  });

  it('should skip absolute URL references', async () => {
    const resolver = new ResourceResolver({ logger: silent });
    const resolve = vi.spyOn(resolver, 'resolve');
    const loader = new SchemaIncludeLoader(resolver, silent);
    const text = schema('<xs:import namespace="urn:x" schemaLocation="http://www.w3.org/2001/xml.xsd"/>');

    const result = await loader.load({
      text,
      location: path.join(schemasDir, 'main.xsd'),
      remote: false,
      fileName: 'main.xsd'
    });
    expect(result).toEqual({ root: text, includes: [] });
    expect(resolve).not.toHaveBeenCalled();
  });

  it('should surface a missing include as a resolution error', async () => {
    const loader = new SchemaIncludeLoader(new ResourceResolver({ logger: silent }), silent);
    await expect(loader.load({
      text: schema('<xs:include schemaLocation="missing.xsd"/>'),
      location: path.join(schemasDir, 'main.xsd'),
      remote: false,
      fileName: 'main.xsd'
    })).rejects.toBeInstanceOf(PathNotFoundError);
  });
});
