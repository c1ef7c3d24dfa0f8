// Spotify service - consolidated catalog client for the Spotify Web API

import type { TimeoutPreset } from '@catalog/shared';
import { SpotifyAuth } from './auth';
import { SpotifyClient } from './client';
import { SpotifyTracks } from './tracks';
import { SpotifyArtists } from './artists';
import { SpotifyAlbums } from './albums';
import { SpotifyPlaylists } from './playlists';
import { SpotifyGenres } from './genres';
import type {
  AlbumTracksOptions,
  ArtistAlbumsOptions,
  CategoryPlaylistsOptions,
  MarketOptions,
  PlaylistItemsOptions,
  PlaylistOptions,
  RecommendationOptions,
} from './options';

export { SpotifyAuth } from './auth';
export type { SpotifyAuthConfig } from './auth';

export { SpotifyClient } from './client';
export type { SpotifyClientConfig } from './client';

export { CatalogResource, assertBatch, assertId, assertLimit } from './resource';

export { SpotifyTracks } from './tracks';
export { SpotifyArtists } from './artists';
export { SpotifyAlbums } from './albums';
export { SpotifyPlaylists } from './playlists';
export { SpotifyGenres } from './genres';

export type {
  AlbumTracksOptions,
  ArtistAlbumsOptions,
  CategoriesOptions,
  CategoryPlaylistsOptions,
  FeaturedPlaylistsOptions,
  LocaleOptions,
  MarketOptions,
  NewReleasesOptions,
  PageOptions,
  PlaylistItemsOptions,
  PlaylistOptions,
  RecommendationOptions,
} from './options';

export interface SpotifyServiceConfig {
  clientId: string;
  clientSecret: string;
  apiBase?: string;
  tokenUrl?: string;
  timeout?: number | TimeoutPreset;
}

// Convenience class that combines all Spotify functionality.
// All accessors share one token cache, so a service instance performs at most
// one successful token exchange.
export class SpotifyService {
  public readonly auth: SpotifyAuth;
  public readonly client: SpotifyClient;
  public readonly tracks: SpotifyTracks;
  public readonly artists: SpotifyArtists;
  public readonly albums: SpotifyAlbums;
  public readonly playlists: SpotifyPlaylists;
  public readonly genres: SpotifyGenres;

  constructor(config: SpotifyServiceConfig) {
    this.auth = new SpotifyAuth({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      tokenUrl: config.tokenUrl,
      timeout: config.timeout,
    });
    this.client = new SpotifyClient(this.auth, {
      apiBase: config.apiBase,
      timeout: config.timeout,
    });

    this.tracks = new SpotifyTracks(this.client);
    this.artists = new SpotifyArtists(this.client);
    this.albums = new SpotifyAlbums(this.client);
    this.playlists = new SpotifyPlaylists(this.client);
    this.genres = new SpotifyGenres(this.client);
  }

  /** First 8 chars of client ID for logging/debugging */
  get clientIdPrefix(): string {
    return this.auth.clientIdPrefix;
  }

  // Convenience methods
  async getTrack(id: string, options?: MarketOptions) {
    return this.tracks.getTrack(id, options);
  }

  async getTracks(ids: string[], options?: MarketOptions) {
    return this.tracks.getTracks(ids, options);
  }

  async getAudioFeatures(id: string) {
    return this.tracks.getAudioFeatures(id);
  }

  async getRecommendations(options: RecommendationOptions) {
    return this.tracks.getRecommendations(options);
  }

  async getArtist(id: string) {
    return this.artists.getArtist(id);
  }

  async getArtists(ids: string[]) {
    return this.artists.getArtists(ids);
  }

  async getArtistAlbums(artistId: string, options?: ArtistAlbumsOptions) {
    return this.artists.getArtistAlbums(artistId, options);
  }

  async getAlbum(id: string, options?: MarketOptions) {
    return this.albums.getAlbum(id, options);
  }

  async getAlbums(ids: string[], options?: MarketOptions) {
    return this.albums.getAlbums(ids, options);
  }

  async getAlbumTracks(albumId: string, options?: AlbumTracksOptions) {
    return this.albums.getAlbumTracks(albumId, options);
  }

  async getPlaylist(id: string, options?: PlaylistOptions) {
    return this.playlists.getPlaylist(id, options);
  }

  async getPlaylistItems(id: string, options?: PlaylistItemsOptions) {
    return this.playlists.getPlaylistItems(id, options);
  }

  async getCategoryPlaylists(categoryId: string, options?: CategoryPlaylistsOptions) {
    return this.playlists.getCategoryPlaylists(categoryId, options);
  }

  async getRecommendationGenres() {
    return this.genres.getRecommendationGenres();
  }
}
