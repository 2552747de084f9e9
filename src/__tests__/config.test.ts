/**
 * Unit tests for client configuration parsing.
 */

import { loadConfigFromEnv, parseClientConfig } from '../config';
import { ConfigurationError } from '../errors';

describe('parseClientConfig', () => {
  it('should apply defaults', () => {
    expect(parseClientConfig({ baseUrl: 'https://api.example.com' })).toEqual({
      ok: true,
      value: {
        baseUrl: 'https://api.example.com',
        timeoutMs: 30000,
        headers: {},
        debug: false,
      },
    });
  });

  it('should reject a base URL that is not a URL', () => {
    const result = parseClientConfig({ baseUrl: 'api.example.com' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.message).toMatch(/^Invalid client config: baseUrl: /);
    }
  });

  it('should reject a non-positive timeout', () => {
    const result = parseClientConfig({ baseUrl: 'https://api.example.com', timeoutMs: 0 });
    expect(result.ok).toBe(false);
  });
});

describe('loadConfigFromEnv', () => {
  it('should read every variable', () => {
    const result = loadConfigFromEnv({
      API_BASE_URL: 'https://api.example.com',
      API_KEY: 'test-secret',
      API_TIMEOUT_MS: '5000',
      API_DEBUG: 'true',
    });

    expect(result).toEqual({
      ok: true,
      value: {
        baseUrl: 'https://api.example.com',
        apiKey: 'test-secret',
        timeoutMs: 5000,
        headers: {},
        debug: true,
      },
    });
  });

  it('should treat an empty API_KEY as absent', () => {
    const result = loadConfigFromEnv({ API_BASE_URL: 'https://api.example.com', API_KEY: '' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.apiKey).toBeUndefined();
    }
  });

  it('should require API_BASE_URL', () => {
    const result = loadConfigFromEnv({});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('API_BASE_URL is not set');
    }
  });

  it('should reject a timeout that is not an integer', () => {
    const result = loadConfigFromEnv({
      API_BASE_URL: 'https://api.example.com',
      API_TIMEOUT_MS: 'soon',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('API_TIMEOUT_MS must be an integer, got "soon"');
    }
  });
});
