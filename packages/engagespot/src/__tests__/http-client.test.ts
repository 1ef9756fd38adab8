import { describe, it, expect } from 'vitest';
import { createMockAdapter } from '@engagespot-node/test-utils';
import { API_KEY_HEADER, API_SECRET_HEADER, createHttpClient } from '../client/http-client.js';
import { ConfigurationError } from '../errors/errors.js';

describe('createHttpClient', () => {
  it('sets the credentials as default headers', () => {
    const client = createHttpClient('test-key', 'test-secret');

    expect(client.defaults.headers[API_KEY_HEADER]).toBe('test-key');
    expect(client.defaults.headers[API_SECRET_HEADER]).toBe('test-secret');
    expect(client.defaults.headers['Content-Type']).toBe('application/json');
  });

  it('accepts tabs and spaces in header values', () => {
    expect(() => createHttpClient('key with spaces', 'secret\twith\ttabs')).not.toThrow();
  });

  it('rejects control characters and non-ASCII text', () => {
    expect(() => createHttpClient('key\n', 'test-secret')).toThrow(ConfigurationError);
    expect(() => createHttpClient('test-key', 'secret\u0000')).toThrow(ConfigurationError);
    expect(() => createHttpClient('clé', 'test-secret')).toThrow(ConfigurationError);
  });

  it('passes request bodies through unchanged', async () => {
    const mock = createMockAdapter();
    const client = createHttpClient('test-key', 'test-secret', { adapter: mock.adapter });

    await client.post('https://api.example.com/echo', '{"x":1}');

    expect(mock.requests[0]?.data).toBe('{"x":1}');
  });

  it('keeps JSON response bodies as text', async () => {
    const mock = createMockAdapter({ status: 200, data: '{"a":1}' });
    const client = createHttpClient('test-key', 'test-secret', { adapter: mock.adapter });

    const response = await client.get('https://api.example.com/item');

    expect(response.data).toBe('{"a":1}');
  });

  it('resolves instead of throwing on error statuses', async () => {
    const mock = createMockAdapter({ status: 503, data: 'unavailable' });
    const client = createHttpClient('test-key', 'test-secret', { adapter: mock.adapter });

    const response = await client.get('https://api.example.com/item');

    expect(response.status).toBe(503);
    expect(response.data).toBe('unavailable');
  });
});

describe('createMockAdapter', () => {
  it('rejects like the built-in adapters when validateStatus says no', async () => {
    const mock = createMockAdapter({ status: 503, data: 'unavailable' });
    const client = createHttpClient('test-key', 'test-secret', { adapter: mock.adapter });

    await expect(
      client.get('https://api.example.com/item', { validateStatus: status => status < 500 })
    ).rejects.toThrow('Request failed with status code 503');
  });
});
