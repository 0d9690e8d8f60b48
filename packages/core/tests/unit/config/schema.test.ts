import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('validateConfig', () => {
  it('fills every default from an empty object', () => {
    expect(validateConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('accepts custom price entries', () => {
    const config = validateConfig({
      rootModel: 'local-llama',
      pricing: { 'local-llama': { provider: 'openai', inputPer1M: 0, outputPer1M: 0 } },
    });
    expect(config.pricing['local-llama']?.provider).toBe('openai');
  });

  it('limits recursion depth to one level', () => {
    expect(validateConfig({ maxRecursionDepth: 0 }).maxRecursionDepth).toBe(0);
    expect(() => validateConfig({ maxRecursionDepth: 2 })).toThrow(ConfigError);
  });

  it('caps retry attempts at five', () => {
    expect(() => validateConfig({ retry: { maxAttempts: 6 } })).toThrow(ConfigError);
  });

  it('rejects unknown top-level keys', () => {
    expect(() => validateConfig({ rootModle: 'gpt-4o' })).toThrow(ConfigError);
  });

  it('reports the failing field', () => {
    try {
      validateConfig({ maxOutputTokens: 0 });
      expect.unreachable('validateConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.field).toBe('maxOutputTokens');
        expect(err.message).toMatch(/^Invalid configuration: maxOutputTokens: /);
      }
    }
  });

  it('rejects an unknown model variant', () => {
    expect(() => validateConfig({ modelVariant: 'llama' })).toThrow(ConfigError);
  });
});
