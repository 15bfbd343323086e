// Tests for argument classification

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { classifySource, shortenFileName, stripFileScheme } from './validation.js';

describe('classifySource', () => {
  it('should treat a plain relative path as a local path', () => {
    expect(classifySource('xml/SAMPLE.xml')).toEqual({ kind: 'local-path', path: 'xml/SAMPLE.xml' });
  });

  it('should treat an absolute path as a local path', () => {
    expect(classifySource('/data/SAMPLE.xml')).toEqual({ kind: 'local-path', path: '/data/SAMPLE.xml' });
  });

  it('should keep Windows drive paths local', () => {
    expect(classifySource('C:\\data\\SAMPLE.xml')).toEqual({ kind: 'local-path', path: 'C:\\data\\SAMPLE.xml' });
  });

  it('should strip file:// from file URIs', () => {
    expect(classifySource('file:///tmp/SAMPLE.xml')).toEqual({ kind: 'file-uri', path: '/tmp/SAMPLE.xml' });
  });

  it('should classify http and https URLs', () => {
    expect(classifySource('http://example.com/a.xml')).toEqual({ kind: 'http-url', url: 'http://example.com/a.xml' });
    expect(classifySource('HTTPS://example.com/a.xml')).toEqual({ kind: 'http-url', url: 'HTTPS://example.com/a.xml' });
  });

  it('should split ftp URLs into host, port and path', () => {
    expect(classifySource('ftp://ftp.local.server/test_files/schema.xsd')).toEqual({
      kind: 'ftp-url',
      url: 'ftp://ftp.local.server/test_files/schema.xsd',
      host: 'ftp.local.server',
      port: undefined,
      path: '/test_files/schema.xsd'
    });
    expect(classifySource('ftp://ftp.local.server:2121/a%20b.xsd')).toEqual({
      kind: 'ftp-url',
      url: 'ftp://ftp.local.server:2121/a%20b.xsd',
      host: 'ftp.local.server',
      port: 2121,
      path: '/a b.xsd'
    });
  });

  it('should keep a percent escape that does not decode as it is', () => {
    expect(classifySource('ftp://127.0.0.1/a%zz.xml')).toEqual({
      kind: 'ftp-url',
      url: 'ftp://127.0.0.1/a%zz.xml',
      host: '127.0.0.1',
      port: undefined,
      path: '/a%zz.xml'
    });
  });

  it('should take other schemes as local paths', () => {
    expect(classifySource('notes:v2.xml')).toEqual({ kind: 'local-path', path: 'notes:v2.xml' });
    expect(classifySource('gopher://example.com/a.xml')).toEqual({ kind: 'local-path', path: 'gopher://example.com/a.xml' });
  });

  it('should classify any string without a colon as a local path', () => {
    fc.assert(
      fc.property(fc.string().filter(s => !s.includes(':')), (argument) => {
        expect(classifySource(argument)).toEqual({ kind: 'local-path', path: argument });
      })
    );
  });
});

describe('stripFileScheme', () => {
  it('should leave a relative remainder relative', () => {
    expect(stripFileScheme('file://schemas/a.xsd')).toBe('schemas/a.xsd');
  });

  it('should handle the bare file: form', () => {
    expect(stripFileScheme('file:schemas/a.xsd')).toBe('schemas/a.xsd');
  });
});

describe('shortenFileName', () => {
  it('should return the base name', () => {
    expect(shortenFileName('/home/curator/submissions/SAMPLE.xml')).toBe('SAMPLE.xml');
  });
});
