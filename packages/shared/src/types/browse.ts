// Types for browse categories and recommendation genre seeds

import type { SpotifyImage, SpotifyPaging } from './common';

export interface SpotifyCategory {
  id: string;
  name: string;
  href: string;
  icons: SpotifyImage[];
}

export interface SpotifyCategoriesResponse {
  categories: SpotifyPaging<SpotifyCategory>;
}

export interface SpotifyGenreSeeds {
  genres: string[];
}
