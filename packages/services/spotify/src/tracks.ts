// ABOUTME: Spotify track operations - tracks, audio features, audio analysis, recommendations.
// ABOUTME: Multi-ID lookups are capped at 100 IDs before any request is made.

import { RECOMMENDATION_LIMITS } from '@catalog/config';
import {
  ValidationError,
  type SpotifyAudioAnalysis,
  type SpotifyAudioFeatures,
  type SpotifyAudioFeaturesResponse,
  type SpotifyRecommendations,
  type SpotifyTrack,
  type SpotifyTracksResponse,
} from '@catalog/shared';
import type { SpotifyClient } from './client';
import type { MarketOptions, RecommendationOptions } from './options';
import { CatalogResource, assertLimit } from './resource';

export class SpotifyTracks {
  private readonly tracks: CatalogResource;
  private readonly audioFeatures: CatalogResource;
  private readonly audioAnalysis: CatalogResource;
  private readonly recommendations: CatalogResource;

  constructor(client: SpotifyClient) {
    this.tracks = new CatalogResource(client, 'tracks');
    this.audioFeatures = new CatalogResource(client, 'audioFeatures');
    this.audioAnalysis = new CatalogResource(client, 'audioAnalysis');
    this.recommendations = new CatalogResource(client, 'recommendations');
  }

  async getTrack(trackId: string, options: MarketOptions = {}): Promise<SpotifyTrack> {
    return this.tracks.getOne<SpotifyTrack>(trackId, { market: options.market });
  }

  async getTracks(trackIds: string[], options: MarketOptions = {}): Promise<SpotifyTracksResponse> {
    return this.tracks.getMany<SpotifyTracksResponse>(trackIds, { market: options.market });
  }

  async getAudioFeatures(trackId: string): Promise<SpotifyAudioFeatures> {
    return this.audioFeatures.getOne<SpotifyAudioFeatures>(trackId);
  }

  async getAudioFeaturesForTracks(trackIds: string[]): Promise<SpotifyAudioFeaturesResponse> {
    return this.audioFeatures.getMany<SpotifyAudioFeaturesResponse>(trackIds);
  }

  async getAudioAnalysis(trackId: string): Promise<SpotifyAudioAnalysis> {
    return this.audioAnalysis.getOne<SpotifyAudioAnalysis>(trackId);
  }

  /**
   * Tracks generated from up to five seeds (artists, genres and tracks combined).
   * Named options take precedence over a tunable with the same key.
   */
  async getRecommendations(options: RecommendationOptions): Promise<SpotifyRecommendations> {
    const { seedArtists = [], seedGenres = [], seedTracks = [], market, tunables = {} } = options;
    const limit = options.limit ?? RECOMMENDATION_LIMITS.defaultLimit;

    const seedCount = seedArtists.length + seedGenres.length + seedTracks.length;
    if (seedCount === 0) {
      throw new ValidationError('At least one seed artist, genre or track is required');
    }
    if (seedCount > RECOMMENDATION_LIMITS.maxSeeds) {
      throw new ValidationError(
        `Exceeded maximum of ${RECOMMENDATION_LIMITS.maxSeeds} seeds per request (got ${seedCount})`,
        { limit: RECOMMENDATION_LIMITS.maxSeeds, count: seedCount }
      );
    }
    assertLimit(limit, RECOMMENDATION_LIMITS.maxLimit, RECOMMENDATION_LIMITS.minLimit);

    return this.recommendations.list<SpotifyRecommendations>({
      ...tunables,
      limit,
      market,
      seed_artists: seedArtists,
      seed_genres: seedGenres,
      seed_tracks: seedTracks,
    });
  }
}
