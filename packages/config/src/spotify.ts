// Centralized Spotify Web API configuration

export const SPOTIFY_CONFIG = {
  apiBase: 'https://api.spotify.com/v1',
  tokenUrl: 'https://accounts.spotify.com/api/token',
  /** Timeout preset applied to token exchange and catalog requests */
  timeout: 'fast',
  /** Prefix used in log lines */
  logTag: '[Spotify]',
} as const;

export interface ResourceDefinition {
  /** Path under the API base, without leading slash */
  path: string;
  /** Singular noun used in validation messages */
  label: string;
  /** Maximum IDs accepted by the multi-ID endpoint, when one exists */
  batchLimit?: number;
}

/**
 * Endpoint templates and batch ceilings for every catalog resource.
 * Ceilings mirror the remote API's limits and are enforced before dispatch.
 */
export const SPOTIFY_RESOURCES = {
  tracks: { path: 'tracks', label: 'track', batchLimit: 100 },
  audioFeatures: { path: 'audio-features', label: 'track', batchLimit: 100 },
  audioAnalysis: { path: 'audio-analysis', label: 'track' },
  recommendations: { path: 'recommendations', label: 'recommendation' },
  artists: { path: 'artists', label: 'artist', batchLimit: 100 },
  albums: { path: 'albums', label: 'album', batchLimit: 20 },
  playlists: { path: 'playlists', label: 'playlist' },
  categories: { path: 'browse/categories', label: 'category' },
  featuredPlaylists: { path: 'browse/featured-playlists', label: 'playlist' },
  newReleases: { path: 'browse/new-releases', label: 'album' },
} as const satisfies Record<string, ResourceDefinition>;

export type ResourceName = keyof typeof SPOTIFY_RESOURCES;

/** Largest `limit` accepted by the browse endpoints */
export const BROWSE_LIMIT_MAX = 50;

export const RECOMMENDATION_LIMITS = {
  /** Combined artist, genre and track seeds */
  maxSeeds: 5,
  minLimit: 1,
  maxLimit: 100,
  defaultLimit: 20,
} as const;
