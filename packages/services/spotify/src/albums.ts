// ABOUTME: Spotify album operations - album details, track lists and new releases.
// ABOUTME: Multi-album lookups are capped at 20 IDs.

import { BROWSE_LIMIT_MAX } from '@catalog/config';
import type {
  SpotifyAlbum,
  SpotifyAlbumsResponse,
  SpotifyNewReleasesResponse,
  SpotifyPaging,
  SpotifySimpleTrack,
} from '@catalog/shared';
import type { SpotifyClient } from './client';
import type { AlbumTracksOptions, MarketOptions, NewReleasesOptions } from './options';
import { CatalogResource, assertLimit } from './resource';

export class SpotifyAlbums {
  private readonly albums: CatalogResource;
  private readonly newReleases: CatalogResource;

  constructor(client: SpotifyClient) {
    this.albums = new CatalogResource(client, 'albums');
    this.newReleases = new CatalogResource(client, 'newReleases');
  }

  async getAlbum(albumId: string, options: MarketOptions = {}): Promise<SpotifyAlbum> {
    return this.albums.getOne<SpotifyAlbum>(albumId, { market: options.market });
  }

  async getAlbums(albumIds: string[], options: MarketOptions = {}): Promise<SpotifyAlbumsResponse> {
    return this.albums.getMany<SpotifyAlbumsResponse>(albumIds, { market: options.market });
  }

  async getAlbumTracks(
    albumId: string,
    options: AlbumTracksOptions = {}
  ): Promise<SpotifyPaging<SpotifySimpleTrack>> {
    return this.albums.getChild<SpotifyPaging<SpotifySimpleTrack>>(albumId, 'tracks', {
      market: options.market,
      limit: options.limit,
      offset: options.offset,
    });
  }

  async getNewReleases(options: NewReleasesOptions = {}): Promise<SpotifyNewReleasesResponse> {
    assertLimit(options.limit, BROWSE_LIMIT_MAX);
    return this.newReleases.list<SpotifyNewReleasesResponse>({
      country: options.country,
      limit: options.limit,
      offset: options.offset,
    });
  }
}
