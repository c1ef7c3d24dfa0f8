// ABOUTME: Spotify artist operations - details, albums, top tracks and related artists.

import type {
  SpotifyArtist,
  SpotifyArtistsResponse,
  SpotifyPaging,
  SpotifySimpleAlbum,
  SpotifyTopTracksResponse,
} from '@catalog/shared';
import type { SpotifyClient } from './client';
import type { ArtistAlbumsOptions, MarketOptions } from './options';
import { CatalogResource } from './resource';

export class SpotifyArtists {
  private readonly artists: CatalogResource;

  constructor(client: SpotifyClient) {
    this.artists = new CatalogResource(client, 'artists');
  }

  async getArtist(artistId: string): Promise<SpotifyArtist> {
    return this.artists.getOne<SpotifyArtist>(artistId);
  }

  async getArtists(artistIds: string[]): Promise<SpotifyArtistsResponse> {
    return this.artists.getMany<SpotifyArtistsResponse>(artistIds);
  }

  async getArtistAlbums(
    artistId: string,
    options: ArtistAlbumsOptions = {}
  ): Promise<SpotifyPaging<SpotifySimpleAlbum>> {
    return this.artists.getChild<SpotifyPaging<SpotifySimpleAlbum>>(artistId, 'albums', {
      include_groups: options.includeGroups,
      market: options.market,
      limit: options.limit,
      offset: options.offset,
    });
  }

  async getArtistTopTracks(
    artistId: string,
    options: MarketOptions = {}
  ): Promise<SpotifyTopTracksResponse> {
    return this.artists.getChild<SpotifyTopTracksResponse>(artistId, 'top-tracks', {
      market: options.market,
    });
  }

  async getRelatedArtists(artistId: string): Promise<{ artists: SpotifyArtist[] }> {
    return this.artists.getChild<{ artists: SpotifyArtist[] }>(artistId, 'related-artists');
  }
}
