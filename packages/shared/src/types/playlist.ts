// Types for playlists and playlist items

import type { ExternalUrls, SpotifyImage, SpotifyPaging } from './common';
import type { SpotifyTrack } from './track';

export interface SpotifyPlaylistOwner {
  id: string;
  display_name: string | null;
  type: 'user';
  uri: string;
  href: string;
  external_urls: ExternalUrls;
}

export interface SpotifyPlaylistItem {
  added_at: string | null;
  added_by: { id: string } | null;
  is_local: boolean;
  /** Null when the item is unavailable; episodes share the slot */
  track: SpotifyTrack | (Record<string, unknown> & { type: 'episode' }) | null;
}

export interface SpotifySimplePlaylist {
  id: string;
  name: string;
  description: string | null;
  collaborative: boolean;
  images: SpotifyImage[] | null;
  owner: SpotifyPlaylistOwner;
  public: boolean | null;
  snapshot_id: string;
  tracks: { href: string; total: number };
  type: 'playlist';
  uri: string;
  href: string;
  external_urls: ExternalUrls;
}

export interface SpotifyPlaylist extends Omit<SpotifySimplePlaylist, 'tracks'> {
  followers: { href: string | null; total: number };
  tracks: SpotifyPaging<SpotifyPlaylistItem>;
}

export interface SpotifyPlaylistsPage {
  message?: string;
  playlists: SpotifyPaging<SpotifySimplePlaylist | null>;
}
