// Types for album objects returned by the catalog API

import type { ExternalUrls, SpotifyImage, SpotifyPaging, SpotifyRestrictions } from './common';
import type { SpotifySimpleArtist } from './artist';
import type { SpotifySimpleTrack } from './track';

export type AlbumType = 'album' | 'single' | 'compilation';

export interface SpotifySimpleAlbum {
  id: string;
  name: string;
  album_type: AlbumType;
  total_tracks: number;
  available_markets?: string[];
  release_date: string;
  release_date_precision: 'year' | 'month' | 'day';
  images: SpotifyImage[];
  artists: SpotifySimpleArtist[];
  restrictions?: SpotifyRestrictions;
  type: 'album';
  uri: string;
  href: string;
  external_urls: ExternalUrls;
  /** Present only on artist-album listings */
  album_group?: 'album' | 'single' | 'compilation' | 'appears_on';
}

export interface SpotifyAlbum extends SpotifySimpleAlbum {
  tracks: SpotifyPaging<SpotifySimpleTrack>;
  copyrights: Array<{ text: string; type: string }>;
  external_ids: { upc?: string; ean?: string; isrc?: string };
  genres: string[];
  label: string;
  popularity: number;
}

export interface SpotifyAlbumsResponse {
  albums: Array<SpotifyAlbum | null>;
}

export interface SpotifyNewReleasesResponse {
  albums: SpotifyPaging<SpotifySimpleAlbum>;
}
