// ABOUTME: Spotify playlist operations - playlist details, items, category and featured lists.

import { BROWSE_LIMIT_MAX } from '@catalog/config';
import type {
  SpotifyPaging,
  SpotifyPlaylist,
  SpotifyPlaylistItem,
  SpotifyPlaylistsPage,
} from '@catalog/shared';
import type { SpotifyClient } from './client';
import type {
  CategoryPlaylistsOptions,
  FeaturedPlaylistsOptions,
  PlaylistItemsOptions,
  PlaylistOptions,
} from './options';
import { CatalogResource, assertLimit } from './resource';

export class SpotifyPlaylists {
  private readonly playlists: CatalogResource;
  private readonly categories: CatalogResource;
  private readonly featured: CatalogResource;

  constructor(client: SpotifyClient) {
    this.playlists = new CatalogResource(client, 'playlists');
    this.categories = new CatalogResource(client, 'categories');
    this.featured = new CatalogResource(client, 'featuredPlaylists');
  }

  async getPlaylist(playlistId: string, options: PlaylistOptions = {}): Promise<SpotifyPlaylist> {
    return this.playlists.getOne<SpotifyPlaylist>(playlistId, {
      market: options.market,
      fields: options.fields,
    });
  }

  async getPlaylistItems(
    playlistId: string,
    options: PlaylistItemsOptions = {}
  ): Promise<SpotifyPaging<SpotifyPlaylistItem>> {
    return this.playlists.getChild<SpotifyPaging<SpotifyPlaylistItem>>(playlistId, 'tracks', {
      market: options.market,
      fields: options.fields,
      limit: options.limit,
      offset: options.offset,
    });
  }

  async getCategoryPlaylists(
    categoryId: string,
    options: CategoryPlaylistsOptions = {}
  ): Promise<SpotifyPlaylistsPage> {
    assertLimit(options.limit, BROWSE_LIMIT_MAX);
    return this.categories.getChild<SpotifyPlaylistsPage>(categoryId, 'playlists', {
      country: options.country,
      limit: options.limit,
      offset: options.offset,
    });
  }

  async getFeaturedPlaylists(options: FeaturedPlaylistsOptions = {}): Promise<SpotifyPlaylistsPage> {
    assertLimit(options.limit, BROWSE_LIMIT_MAX);
    return this.featured.list<SpotifyPlaylistsPage>({
      country: options.country,
      locale: options.locale,
      timestamp: options.timestamp,
      limit: options.limit,
      offset: options.offset,
    });
  }
}
