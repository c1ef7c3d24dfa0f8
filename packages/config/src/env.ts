// Credential loading from the process environment

import { ValidationError } from '@catalog/shared';

export interface SpotifyCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
}

export type EnvSource = Record<string, string | undefined>;

export const CREDENTIAL_ENV_VARS = {
  clientId: 'SPOTIFY_CLIENT_ID',
  clientSecret: 'SPOTIFY_CLIENT_SECRET',
} as const;

/**
 * Read client credentials from environment variables.
 * Values are trimmed; blank counts as missing.
 */
export function loadSpotifyCredentials(env: EnvSource = process.env): SpotifyCredentials {
  const clientId = (env[CREDENTIAL_ENV_VARS.clientId] ?? '').trim();
  const clientSecret = (env[CREDENTIAL_ENV_VARS.clientSecret] ?? '').trim();

  const missing: string[] = [];
  if (!clientId) missing.push(CREDENTIAL_ENV_VARS.clientId);
  if (!clientSecret) missing.push(CREDENTIAL_ENV_VARS.clientSecret);

  if (missing.length > 0) {
    throw new ValidationError(`Set ${missing.join(' and ')} in your environment`, { missing });
  }

  return { clientId, clientSecret };
}
