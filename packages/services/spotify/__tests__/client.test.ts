// ABOUTME: Tests for SpotifyClient - URL building, auth header, query filtering and error surfacing.

import { describe, it, expect, vi } from 'vitest';
import { AuthenticationError, HttpError, TimeoutError } from '@catalog/shared';
import { SpotifyAuth } from '../src/auth';
import { SpotifyClient } from '../src/client';
import {
  TEST_CREDENTIALS,
  createTestClient,
  lastResourceUrl,
  mockFetchResponse,
  setupFetchMock,
  tokenHandler,
} from './utils/mocks';

describe('SpotifyClient', () => {
  describe('get', () => {
    it('joins base URL and endpoint and attaches the bearer header', async () => {
      const mockFetch = setupFetchMock([
        tokenHandler('test-token'),
        { pattern: /api\.spotify\.com\/v1\/tracks\/abc/, response: { id: 'abc' } },
      ]);
      const client = createTestClient();

      const result = await client.get<{ id: string }>('tracks/abc');

      expect(result).toEqual({ id: 'abc' });
      const [url, init] = mockFetch.mock.calls[1];
      expect(url).toBe('https://api.spotify.com/v1/tracks/abc');
      expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-token');
    });

    it('tolerates a leading slash on the endpoint', async () => {
      const mockFetch = setupFetchMock([tokenHandler(), { pattern: /v1\/tracks\/abc/, response: {} }]);

      await createTestClient().get('/tracks/abc');

      expect(lastResourceUrl(mockFetch).pathname).toBe('/v1/tracks/abc');
    });

    it('filters absent params and joins lists', async () => {
      const mockFetch = setupFetchMock([tokenHandler(), { pattern: /v1\/tracks/, response: {} }]);

      await createTestClient().get('tracks', {
        ids: ['a', 'b'],
        market: 'SE',
        limit: 10,
        explicit: false,
        locale: undefined,
        country: null,
      });

      const url = lastResourceUrl(mockFetch);
      expect(url.searchParams.get('ids')).toBe('a,b');
      expect(url.searchParams.get('market')).toBe('SE');
      expect(url.searchParams.get('limit')).toBe('10');
      expect(url.searchParams.get('explicit')).toBe('false');
      expect([...url.searchParams.keys()]).toEqual(['ids', 'market', 'limit', 'explicit']);
    });

    it('uses a custom API base', async () => {
      const mockFetch = setupFetchMock([tokenHandler(), { pattern: 'catalog.test', response: {} }]);
      const client = new SpotifyClient(new SpotifyAuth({ ...TEST_CREDENTIALS }), {
        apiBase: 'https://catalog.test/v9/',
      });

      await client.get('albums/x');

      expect(mockFetch.mock.calls[1][0]).toBe('https://catalog.test/v9/albums/x');
    });

    it('throws HttpError with status and endpoint on non-2xx', async () => {
      setupFetchMock([
        tokenHandler(),
        { pattern: /v1\/tracks\/abc/, response: { error: 'boom' }, options: { status: 500, statusText: 'Server Error' } },
      ]);

      const attempt = createTestClient().get('tracks/abc');

      await expect(attempt).rejects.toBeInstanceOf(HttpError);
      await expect(attempt).rejects.toMatchObject({
        status: 500,
        endpoint: 'tracks/abc',
        statusText: 'Server Error',
        code: 'HTTP_ERROR',
        message: 'Spotify API error: 500 Server Error (tracks/abc)',
        details: { endpoint: 'tracks/abc', body: '{"error":"boom"}' },
      });
    });

    it('makes no resource request when the token exchange fails', async () => {
      const mockFetch = setupFetchMock([tokenHandler('unused', 401), { pattern: /v1\/tracks/, response: {} }]);

      await expect(createTestClient().get('tracks/abc')).rejects.toBeInstanceOf(AuthenticationError);

      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('throws TimeoutError when the request exceeds the timeout', async () => {
      const mockFetch = vi.fn((input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        if (input.toString().includes('accounts.spotify.com')) {
          return Promise.resolve(mockFetchResponse({ access_token: 'test-token' }));
        }
        return new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const aborted = new Error('The operation was aborted');
            aborted.name = 'AbortError';
            reject(aborted);
          });
        });
      });
      vi.stubGlobal('fetch', mockFetch);

      const client = new SpotifyClient(new SpotifyAuth({ ...TEST_CREDENTIALS }), { timeout: 20 });

      await expect(client.get('tracks/slow')).rejects.toMatchObject({
        name: 'TimeoutError',
        timeoutMs: 20,
        url: 'https://api.spotify.com/v1/tracks/slow',
      });
      await expect(client.get('tracks/slow')).rejects.toBeInstanceOf(TimeoutError);
    });
  });

  describe('buildUrl', () => {
    it('leaves the URL bare when no params survive', () => {
      const client = createTestClient();
      expect(client.buildUrl('tracks/abc', { market: undefined })).toBe('https://api.spotify.com/v1/tracks/abc');
    });
  });
});
