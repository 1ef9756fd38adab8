import { describe, it, expect } from 'vitest';
import { maskEmail, maskSecrets, safeStringify } from '../logging/formatting.js';
import { serializeError } from '../logging/error-serializer.js';
import { getLogger, resolveLogLevel } from '../logging/logger.js';
import { ConfigurationError, EngagespotErrorCode } from '../errors/errors.js';

describe('maskSecrets', () => {
  it('redacts the credential headers', () => {
    expect(
      maskSecrets({ 'X-ENGAGESPOT-API-KEY': 'test-key', 'X-ENGAGESPOT-API-SECRET': 'test-secret', method: 'POST' })
    ).toEqual({ 'X-ENGAGESPOT-API-KEY': '[REDACTED]', 'X-ENGAGESPOT-API-SECRET': '[REDACTED]', method: 'POST' });
  });

  it('redacts nested keys', () => {
    expect(maskSecrets({ config: { apiSecret: 'test-secret', baseUrl: 'https://api.example.com' } })).toEqual({
      config: { apiSecret: '[REDACTED]', baseUrl: 'https://api.example.com' },
    });
  });

  it('masks email addresses inside string values', () => {
    expect(maskSecrets({ url: 'https://api.engagespot.co/v3/users/jane.doe@example.com' })).toEqual({
      url: 'https://api.engagespot.co/v3/users/ja***@e***.com',
    });
  });
});

describe('maskEmail', () => {
  it('keeps a hint of short local parts', () => {
    expect(maskEmail('ab@x.io')).toBe('a***@x***.io');
  });

  it('returns a placeholder for text without a local part', () => {
    expect(maskEmail('@example.com')).toBe('[EMAIL]');
  });
});

describe('safeStringify', () => {
  it('truncates long output', () => {
    expect(safeStringify({ value: 'x'.repeat(50) }, 20)).toBe('{"value":"xxxxxxxxxx...[TRUNCATED]');
  });

  it('survives circular structures', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(safeStringify(circular)).toBe('[CIRCULAR_OR_INVALID_JSON]');
  });
});

describe('serializeError', () => {
  it('keeps the code of transport errors', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });

    expect(serializeError(error)).toMatchObject({
      name: 'Error',
      message: 'connect ECONNREFUSED 127.0.0.1:443',
      code: 'ECONNREFUSED',
    });
  });

  it('keeps details and code of library errors', () => {
    expect(serializeError(ConfigurationError.invalidHeaderValue('X-ENGAGESPOT-API-KEY'))).toMatchObject({
      name: 'ConfigurationError',
      code: EngagespotErrorCode.INVALID_HEADER_VALUE,
      details: { header: 'X-ENGAGESPOT-API-KEY' },
    });
  });

  it('follows the cause chain', () => {
    const error = new Error('outer', { cause: new Error('inner') });
    expect(serializeError(error).cause?.message).toBe('inner');
  });

  it('handles strings, objects and primitives', () => {
    expect(serializeError('boom')).toEqual({ message: 'boom' });
    expect(serializeError({ error: 'bad' })).toEqual({ message: 'bad' });
    expect(serializeError(42)).toEqual({ message: '42' });
  });
});

describe('resolveLogLevel', () => {
  it('defaults to warn whatever the environment', () => {
    expect(resolveLogLevel({})).toBe('warn');
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('warn');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('warn');
  });

  it('uses LOG_LEVEL when set', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug');
  });
});

describe('getLogger', () => {
  it('returns the same logger for the same module', () => {
    expect(getLogger('engagespot-client')).toBe(getLogger('engagespot-client'));
  });
});

describe('ConfigurationError', () => {
  it('serializes to JSON with its code and details', () => {
    expect(ConfigurationError.invalidHeaderValue('X-ENGAGESPOT-API-SECRET').toJSON()).toMatchObject({
      name: 'ConfigurationError',
      message: 'Invalid value for header X-ENGAGESPOT-API-SECRET: contains characters not allowed in an HTTP header',
      code: 'INVALID_HEADER_VALUE',
      details: { header: 'X-ENGAGESPOT-API-SECRET' },
    });
  });
});
