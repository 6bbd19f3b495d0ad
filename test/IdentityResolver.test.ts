import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError, ResolutionError } from '../src/lib/errors.js';
import { IdentityResolver, deriveHostId } from '../src/lib/IdentityResolver.js';
import { memoryLogger, mockFetchError, mockJsonResponse } from './helpers.js';

const API = { apiBase: 'https://webmaster.test/v4', token: 'test-token' };

describe('deriveHostId', () => {
  it('should use port 443 for https sites', () => {
    expect(deriveHostId('https://example.com')).toBe('https:example.com:443');
  });

  it('should use port 80 for http sites', () => {
    expect(deriveHostId('http://example.org')).toBe('http:example.org:80');
  });

  it('should ignore the path and trailing slash', () => {
    expect(deriveHostId('https://shop.example.com/catalog/')).toBe(
      'https:shop.example.com:443'
    );
  });

  it('should not read the port from the URL', () => {
    expect(deriveHostId('http://example.org:8080')).toBe(
      'http:example.org:8080:80'
    );
  });

  it('should keep the authority as written', () => {
    expect(deriveHostId('HTTPS://Example.com/')).toBe('https:Example.com:443');
    expect(deriveHostId('https://user@example.com')).toBe('https:user@example.com:443');
  });

  it('should reject a value without a scheme', () => {
    expect(() => deriveHostId('example.com')).toThrow(ConfigurationError);
  });

  it('should reject a URL without an authority', () => {
    expect(() => deriveHostId('mailto:admin@example.com')).toThrow(
      'Invalid site URL: mailto:admin@example.com'
    );
  });
});

describe('IdentityResolver', () => {
  beforeEach(() => {
    vi.spyOn(global, 'fetch').mockImplementation(() =>
      Promise.resolve(mockJsonResponse({ user_id: 12345 }))
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fetch the user id with the OAuth header', async () => {
    const { logger } = memoryLogger();
    const resolver = new IdentityResolver(API, 'https://example.com', logger);

    const accountId = await resolver.resolveAccountId();

    expect(accountId).toBe('12345');
    expect(global.fetch).toHaveBeenCalledWith(
      'https://webmaster.test/v4/user',
      expect.objectContaining({
        method: 'GET',
        headers: { Authorization: 'OAuth test-token' },
      })
    );
  });

  it('should resolve a frozen identity', async () => {
    const { logger, lines } = memoryLogger();
    const resolver = new IdentityResolver(API, 'https://example.com', logger);

    const identity = await resolver.resolve();

    expect(identity).toEqual({ accountId: '12345', hostId: 'https:example.com:443' });
    expect(Object.isFrozen(identity)).toBe(true);
    expect(lines).toEqual([
      '2024-05-01T10:00:00.000Z - INFO - Host ID: https:example.com:443',
      '2024-05-01T10:00:00.000Z - INFO - User ID: 12345',
    ]);
  });

  it('should fail when the response has no user_id', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValueOnce(
      mockJsonResponse({ login: 'someone' })
    );
    const resolver = new IdentityResolver(API, 'https://example.com', memoryLogger().logger);

    await expect(resolver.resolveAccountId()).rejects.toThrow(
      'Webmaster user response has no user_id: {"login":"someone"}'
    );
  });

  it('should fail with a ResolutionError on HTTP errors', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValueOnce(
      mockJsonResponse({ error_code: 'INVALID_OAUTH_TOKEN' }, 401)
    );
    const resolver = new IdentityResolver(API, 'https://example.com', memoryLogger().logger);

    const error = await resolver.resolveAccountId().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toHaveProperty(
      'message',
      'Failed to fetch the Webmaster user id: {"error_code":"INVALID_OAUTH_TOKEN"}'
    );
  });

  it('should fail with a ResolutionError on network errors', async () => {
    vi.spyOn(global, 'fetch').mockRejectedValueOnce(mockFetchError('fetch failed'));
    const resolver = new IdentityResolver(API, 'https://example.com', memoryLogger().logger);

    await expect(resolver.resolveAccountId()).rejects.toBeInstanceOf(ResolutionError);
  });

  it('should not call the API when the site URL is invalid', async () => {
    const resolver = new IdentityResolver(API, 'not a url', memoryLogger().logger);

    await expect(resolver.resolve()).rejects.toBeInstanceOf(ConfigurationError);
    expect(global.fetch).not.toHaveBeenCalled();
  });
});
