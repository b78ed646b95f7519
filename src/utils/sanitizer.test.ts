import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  validatePathWithinDir,
  validateFileWithinDir,
  escapeShellArg,
  maskSensitiveData,
  describeError,
} from './sanitizer';

describe('validatePathWithinDir', () => {
  it('accepts path within directory', () => {
    expect(validatePathWithinDir('/app/data/file.txt', '/app/data')).toBe(path.resolve('/app/data/file.txt'));
  });

  it('rejects path traversal', () => {
    expect(() => validatePathWithinDir('/app/data/../secret', '/app/data')).toThrow('Path traversal detected');
  });

  it('rejects sibling directories sharing a prefix', () => {
    expect(() => validatePathWithinDir('/app/data-evil/file', '/app/data')).toThrow('Path traversal detected');
  });

  it('accepts exact directory match', () => {
    expect(validatePathWithinDir('/app/data', '/app/data')).toBe(path.resolve('/app/data'));
  });
});

describe('validateFileWithinDir', () => {
  it('rejects the directory itself', () => {
    expect(() => validateFileWithinDir('/app/data/', '/app/data')).toThrow('Path traversal detected');
  });

  it('accepts files inside', () => {
    expect(validateFileWithinDir('/app/data/x.zip', '/app/data')).toBe(path.resolve('/app/data/x.zip'));
  });
});

describe('escapeShellArg', () => {
  it('wraps in single quotes', () => {
    expect(escapeShellArg('pom.xml')).toBe("'pom.xml'");
  });

  it('escapes single quotes', () => {
    expect(escapeShellArg("it's")).toBe("'it'\\''s'");
  });
});

describe('maskSensitiveData', () => {
  it('masks GitHub tokens', () => {
    expect(maskSensitiveData('ghp_1234567890abcdef')).toBe('[REDACTED]');
  });

  it('masks password fields', () => {
    expect(maskSensitiveData('password=placeholder')).toBe('[REDACTED]');
  });

  it('preserves non-sensitive data', () => {
    expect(maskSensitiveData('unzip: cannot find zipfile')).toBe('unzip: cannot find zipfile');
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
