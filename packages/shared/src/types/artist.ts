// Types for artist objects returned by the catalog API

import type { ExternalUrls, SpotifyImage } from './common';
import type { SpotifyTrack } from './track';

export interface SpotifySimpleArtist {
  id: string;
  name: string;
  type: 'artist';
  uri: string;
  href: string;
  external_urls: ExternalUrls;
}

export interface SpotifyArtist extends SpotifySimpleArtist {
  followers: { href: string | null; total: number };
  genres: string[];
  images: SpotifyImage[];
  popularity: number;
}

export interface SpotifyArtistsResponse {
  artists: Array<SpotifyArtist | null>;
}

export interface SpotifyTopTracksResponse {
  tracks: SpotifyTrack[];
}

export type AlbumGroup = 'album' | 'single' | 'appears_on' | 'compilation';
