// ABOUTME: Spotify client-credentials token exchange.
// ABOUTME: Exchanges once per instance and memoizes the bearer header; no expiry tracking.

import { SPOTIFY_CONFIG, type SpotifyCredentials } from '@catalog/config';
import {
  AuthenticationError,
  ValidationError,
  fetchWithTimeout,
  type AuthHeader,
  type TimeoutPreset,
} from '@catalog/shared';

export interface SpotifyAuthConfig extends SpotifyCredentials {
  tokenUrl?: string;
  timeout?: number | TimeoutPreset;
}

interface TokenResponse {
  access_token?: unknown;
  token_type?: string;
  expires_in?: number;
}

export class SpotifyAuth {
  private readonly credentials: SpotifyCredentials;
  private readonly tokenUrl: string;
  private readonly timeout: number | TimeoutPreset;
  private header: AuthHeader | null = null;
  // Shared by concurrent first callers so only one exchange is in flight
  private pending: Promise<AuthHeader> | null = null;

  constructor(config: SpotifyAuthConfig) {
    if (!config.clientId || !config.clientSecret) {
      throw new ValidationError('Spotify client ID and client secret are required');
    }
    this.credentials = Object.freeze({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
    });
    this.tokenUrl = config.tokenUrl ?? SPOTIFY_CONFIG.tokenUrl;
    this.timeout = config.timeout ?? SPOTIFY_CONFIG.timeout;
  }

  /** First 8 chars of the client ID, safe to log */
  get clientIdPrefix(): string {
    return this.credentials.clientId.substring(0, 8);
  }

  hasToken(): boolean {
    return this.header !== null;
  }

  /**
   * Bearer header for resource requests. The first call exchanges the
   * credentials; later calls return the memoized header without a request.
   * A failed exchange is not memoized.
   */
  async getAuthHeader(): Promise<AuthHeader> {
    if (this.header) {
      return this.header;
    }

    if (!this.pending) {
      this.pending = this.exchangeCredentials();
    }
    const attempt = this.pending;

    try {
      this.header = await attempt;
      return this.header;
    } catch (error) {
      if (this.pending === attempt) {
        this.pending = null;
      }
      throw error;
    }
  }

  async getAccessToken(): Promise<string> {
    const { Authorization } = await this.getAuthHeader();
    return Authorization.slice('Bearer '.length);
  }

  private async exchangeCredentials(): Promise<AuthHeader> {
    console.log(`${SPOTIFY_CONFIG.logTag} Requesting token for app ${this.clientIdPrefix}...`);

    const { clientId, clientSecret } = this.credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    const response = await fetchWithTimeout(this.tokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${basic}`,
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      timeout: this.timeout,
    });

    if (!response.ok) {
      const error = await response.text().catch(() => '');
      console.error(`${SPOTIFY_CONFIG.logTag} Token request failed: ${response.status} ${error}`);
      throw new AuthenticationError('Spotify', response.status, error);
    }

    const data = (await response.json()) as TokenResponse;

    if (typeof data.access_token !== 'string' || !data.access_token) {
      throw new AuthenticationError('Spotify', response.status, 'Token response missing access_token');
    }

    return { Authorization: `Bearer ${data.access_token}` };
  }
}
