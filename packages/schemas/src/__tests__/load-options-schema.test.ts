import { describe, it, expect } from 'vitest';
import { DotEnvLoaderConfigSchema, LoadOptionsSchema } from '../index.js';

describe('LoadOptionsSchema', () => {
  it('should fill in defaults for an empty object', () => {
    const result = LoadOptionsSchema.parse({});

    expect(result).toEqual({ overrideKeys: false, encoding: 'utf-8' });
  });

  it('should keep explicit values', () => {
    const result = LoadOptionsSchema.parse({
      overrideKeys: true,
      encoding: 'latin1',
    });

    expect(result).toEqual({ overrideKeys: true, encoding: 'latin1' });
  });

  it('should reject a non-boolean override flag', () => {
    expect(() => LoadOptionsSchema.parse({ overrideKeys: 'yes' })).toThrow();
  });

  it('should reject an unsupported encoding', () => {
    expect(() => LoadOptionsSchema.parse({ encoding: 'base64' })).toThrow();
  });

  it('should reject unknown properties', () => {
    expect(() => LoadOptionsSchema.parse({ override: true })).toThrow();
  });
});

describe('DotEnvLoaderConfigSchema', () => {
  it('should default the file path to .env', () => {
    const result = DotEnvLoaderConfigSchema.parse({});

    expect(result.defaultPath).toBe('.env');
    expect(result.baseDir).toBeUndefined();
  });

  it('should reject an empty base directory', () => {
    expect(() => DotEnvLoaderConfigSchema.parse({ baseDir: '' })).toThrow();
  });
});
