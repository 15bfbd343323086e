// Tests for configuration schemas

import { describe, it, expect } from 'vitest';
import { AppConfigSchema, formatIssues } from './schemas.js';

describe('AppConfigSchema', () => {
  it('should fill every default from an empty object', () => {
    expect(AppConfigSchema.parse({})).toEqual({
      logLevel: 'warn',
      color: 'auto',
      ftp: { user: 'anonymous', password: 'anonymous@', port: 21 },
      http: { headers: {} }
    });
  });

  it('should keep provided values and default the rest', () => {
    const config = AppConfigSchema.parse({ ftp: { port: 2121 }, http: { headers: { 'User-Agent': 'curation-bot' } } });
    expect(config.ftp).toEqual({ user: 'anonymous', password: 'anonymous@', port: 2121 });
    expect(config.http.headers).toEqual({ 'User-Agent': 'curation-bot' });
  });

  it('should reject an unknown log level', () => {
    expect(AppConfigSchema.safeParse({ logLevel: 'loud' }).success).toBe(false);
  });

  it('should reject unknown keys', () => {
    expect(AppConfigSchema.safeParse({ timeout: 10 }).success).toBe(false);
  });

  it('should reject an out of range port', () => {
    expect(AppConfigSchema.safeParse({ ftp: { port: 70000 } }).success).toBe(false);
  });
});

describe('formatIssues', () => {
  it('should prefix each issue with its path', () => {
    const result = AppConfigSchema.safeParse({ ftp: { port: 'twenty-one' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toBe('ftp.port: Expected number, received string');
    }
  });
});
