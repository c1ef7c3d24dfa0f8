// Shapes shared by every Spotify catalog object

export interface SpotifyImage {
  url: string;
  height: number | null;
  width: number | null;
}

export interface ExternalUrls {
  spotify: string;
}

/**
 * Offset-based page returned by list endpoints. `next`/`previous` are full
 * URLs; this client passes `limit`/`offset` through and never follows them.
 */
export interface SpotifyPaging<T> {
  href: string;
  items: T[];
  limit: number;
  next: string | null;
  offset: number;
  previous: string | null;
  total: number;
}

export interface SpotifyRestrictions {
  reason: string;
}
