// ABOUTME: Spotify genre operations - recommendation genre seeds and browse categories.

import { BROWSE_LIMIT_MAX } from '@catalog/config';
import type { SpotifyCategoriesResponse, SpotifyCategory, SpotifyGenreSeeds } from '@catalog/shared';
import type { SpotifyClient } from './client';
import type { CategoriesOptions, LocaleOptions } from './options';
import { CatalogResource, assertLimit } from './resource';

export class SpotifyGenres {
  private readonly recommendations: CatalogResource;
  private readonly categories: CatalogResource;

  constructor(client: SpotifyClient) {
    this.recommendations = new CatalogResource(client, 'recommendations');
    this.categories = new CatalogResource(client, 'categories');
  }

  /** Genre names accepted as `seedGenres` by getRecommendations */
  async getRecommendationGenres(): Promise<SpotifyGenreSeeds> {
    return this.recommendations.getSubresource<SpotifyGenreSeeds>('available-genre-seeds');
  }

  async getCategories(options: CategoriesOptions = {}): Promise<SpotifyCategoriesResponse> {
    assertLimit(options.limit, BROWSE_LIMIT_MAX);
    return this.categories.list<SpotifyCategoriesResponse>({
      country: options.country,
      locale: options.locale,
      limit: options.limit,
      offset: options.offset,
    });
  }

  async getCategory(categoryId: string, options: LocaleOptions = {}): Promise<SpotifyCategory> {
    return this.categories.getOne<SpotifyCategory>(categoryId, {
      country: options.country,
      locale: options.locale,
    });
  }
}
