// Option shapes accepted by the resource accessors.
// Every field is optional and omitted from the query string when unset.

import type { AlbumGroup } from '@catalog/shared';

export interface MarketOptions {
  /** ISO 3166-1 alpha-2 country code, or `from_token` */
  market?: string;
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface LocaleOptions {
  country?: string;
  /** e.g. `sv_SE` */
  locale?: string;
}

export interface ArtistAlbumsOptions extends MarketOptions, PageOptions {
  includeGroups?: AlbumGroup[];
}

export interface AlbumTracksOptions extends MarketOptions, PageOptions {}

export interface NewReleasesOptions extends PageOptions {
  country?: string;
}

export interface PlaylistOptions extends MarketOptions {
  /** Field filter, e.g. `name,tracks.items(track(name))` */
  fields?: string;
}

export interface PlaylistItemsOptions extends PlaylistOptions, PageOptions {}

export interface CategoryPlaylistsOptions extends PageOptions {
  country?: string;
}

export interface FeaturedPlaylistsOptions extends LocaleOptions, PageOptions {
  /** ISO 8601 timestamp, e.g. `2014-10-23T09:00:00` */
  timestamp?: string;
}

export interface CategoriesOptions extends LocaleOptions, PageOptions {}

export interface RecommendationOptions extends MarketOptions {
  seedArtists?: string[];
  seedGenres?: string[];
  seedTracks?: string[];
  limit?: number;
  /**
   * Tunable track attributes passed through as query parameters,
   * e.g. `{ min_energy: 0.4, target_tempo: 120 }`.
   */
  tunables?: Record<string, number | string>;
}
