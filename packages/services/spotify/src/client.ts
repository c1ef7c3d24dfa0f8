// ABOUTME: Request dispatcher for the Spotify Web API.
// ABOUTME: Every resource accessor funnels its GET through here.

import { SPOTIFY_CONFIG } from '@catalog/config';
import {
  HttpError,
  fetchWithTimeout,
  withQuery,
  type QueryParams,
  type TimeoutPreset,
} from '@catalog/shared';
import type { SpotifyAuth } from './auth';

export interface SpotifyClientConfig {
  apiBase?: string;
  timeout?: number | TimeoutPreset;
}

export class SpotifyClient {
  private readonly apiBase: string;
  private readonly timeout: number | TimeoutPreset;

  constructor(
    private auth: SpotifyAuth,
    config: SpotifyClientConfig = {}
  ) {
    this.apiBase = (config.apiBase ?? SPOTIFY_CONFIG.apiBase).replace(/\/+$/, '');
    this.timeout = config.timeout ?? SPOTIFY_CONFIG.timeout;
  }

  buildUrl(endpoint: string, params?: QueryParams): string {
    return withQuery(`${this.apiBase}/${endpoint.replace(/^\/+/, '')}`, params);
  }

  /**
   * GET `endpoint` (relative to the API base) and return the decoded JSON body.
   *
   * @throws HttpError when the response is not 2xx
   * @throws AuthenticationError when the first token exchange fails
   */
  async get<T>(endpoint: string, params?: QueryParams): Promise<T> {
    const path = endpoint.replace(/^\/+/, '');
    const url = this.buildUrl(path, params);
    const { Authorization } = await this.auth.getAuthHeader();

    const response = await fetchWithTimeout(url, {
      headers: { Authorization },
      timeout: this.timeout,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      console.error(
        `${SPOTIFY_CONFIG.logTag} Request failed: ${response.status} ${response.statusText} for ${path}`
      );
      throw new HttpError('Spotify', path, response.status, response.statusText, body);
    }

    return (await response.json()) as T;
  }
}
