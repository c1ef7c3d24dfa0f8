// Types for tracks, audio features, audio analysis and recommendations

import type { ExternalUrls, SpotifyRestrictions } from './common';
import type { SpotifySimpleAlbum } from './album';
import type { SpotifySimpleArtist } from './artist';

export interface SpotifySimpleTrack {
  id: string;
  name: string;
  artists: SpotifySimpleArtist[];
  available_markets?: string[];
  disc_number: number;
  duration_ms: number;
  explicit: boolean;
  is_playable?: boolean;
  restrictions?: SpotifyRestrictions;
  preview_url: string | null;
  track_number: number;
  is_local: boolean;
  type: 'track';
  uri: string;
  href: string;
  external_urls: ExternalUrls;
}

export interface SpotifyTrack extends SpotifySimpleTrack {
  album: SpotifySimpleAlbum;
  external_ids: { isrc?: string; ean?: string; upc?: string };
  popularity: number;
}

export interface SpotifyTracksResponse {
  tracks: Array<SpotifyTrack | null>;
}

export interface SpotifyAudioFeatures {
  id: string;
  acousticness: number;
  analysis_url: string;
  danceability: number;
  duration_ms: number;
  energy: number;
  instrumentalness: number;
  key: number;
  liveness: number;
  loudness: number;
  mode: number;
  speechiness: number;
  tempo: number;
  time_signature: number;
  track_href: string;
  type: 'audio_features';
  uri: string;
  valence: number;
}

export interface SpotifyAudioFeaturesResponse {
  audio_features: Array<SpotifyAudioFeatures | null>;
}

interface AnalysisInterval {
  start: number;
  duration: number;
  confidence: number;
}

/**
 * Only the top-level shape is typed; segment and section objects carry many
 * more fields than callers usually read.
 */
export interface SpotifyAudioAnalysis {
  meta: Record<string, unknown>;
  track: Record<string, unknown> & { duration: number; tempo: number; key: number; mode: number };
  bars: AnalysisInterval[];
  beats: AnalysisInterval[];
  tatums: AnalysisInterval[];
  sections: Array<AnalysisInterval & Record<string, unknown>>;
  segments: Array<AnalysisInterval & Record<string, unknown>>;
}

export interface RecommendationSeed {
  id: string;
  type: 'artist' | 'track' | 'genre' | 'ARTIST' | 'TRACK' | 'GENRE';
  href: string | null;
  initialPoolSize: number;
  afterFilteringSize: number;
  afterRelinkingSize: number;
}

export interface SpotifyRecommendations {
  seeds: RecommendationSeed[];
  tracks: SpotifyTrack[];
}
