// Catalog fixtures - trimmed responses with made-up IDs

const artistRef = {
  id: 'artist0001',
  name: 'The Placeholders',
  type: 'artist',
  uri: 'spotify:artist:artist0001',
  href: 'https://api.spotify.com/v1/artists/artist0001',
  external_urls: { spotify: 'https://open.spotify.com/artist/artist0001' },
};

const albumRef = {
  id: 'album0001',
  name: 'Test Pressing',
  album_type: 'album',
  total_tracks: 2,
  release_date: '2021-03-05',
  release_date_precision: 'day',
  images: [{ url: 'https://i.scdn.co/image/album0001', height: 640, width: 640 }],
  artists: [artistRef],
  type: 'album',
  uri: 'spotify:album:album0001',
  href: 'https://api.spotify.com/v1/albums/album0001',
  external_urls: { spotify: 'https://open.spotify.com/album/album0001' },
};

const track = {
  id: 'track0001',
  name: 'First Light',
  artists: [artistRef],
  album: albumRef,
  disc_number: 1,
  duration_ms: 215000,
  explicit: false,
  external_ids: { isrc: 'XX0000000001' },
  popularity: 41,
  preview_url: null,
  track_number: 1,
  is_local: false,
  type: 'track',
  uri: 'spotify:track:track0001',
  href: 'https://api.spotify.com/v1/tracks/track0001',
  external_urls: { spotify: 'https://open.spotify.com/track/track0001' },
};

export const spotifyFixtures = {
  track,

  audioFeatures: {
    id: 'track0001',
    acousticness: 0.12,
    analysis_url: 'https://api.spotify.com/v1/audio-analysis/track0001',
    danceability: 0.66,
    duration_ms: 215000,
    energy: 0.71,
    instrumentalness: 0.0,
    key: 5,
    liveness: 0.09,
    loudness: -6.2,
    mode: 1,
    speechiness: 0.04,
    tempo: 118.0,
    time_signature: 4,
    track_href: 'https://api.spotify.com/v1/tracks/track0001',
    type: 'audio_features',
    uri: 'spotify:track:track0001',
    valence: 0.53,
  },

  artist: {
    ...artistRef,
    followers: { href: null, total: 1200 },
    genres: ['indie pop'],
    images: [],
    popularity: 38,
  },

  album: {
    ...albumRef,
    tracks: {
      href: 'https://api.spotify.com/v1/albums/album0001/tracks',
      items: [],
      limit: 50,
      next: null,
      offset: 0,
      previous: null,
      total: 2,
    },
    copyrights: [{ text: '2021 Placeholder Records', type: 'C' }],
    external_ids: { upc: '000000000001' },
    genres: [],
    label: 'Placeholder Records',
    popularity: 35,
  },

  playlist: {
    id: 'playlist0001',
    name: 'Morning Tests',
    description: 'Songs for green builds',
    collaborative: false,
    images: null,
    owner: {
      id: 'user0001',
      display_name: 'Tester',
      type: 'user',
      uri: 'spotify:user:user0001',
      href: 'https://api.spotify.com/v1/users/user0001',
      external_urls: { spotify: 'https://open.spotify.com/user/user0001' },
    },
    public: true,
    snapshot_id: 'snapshot1',
    followers: { href: null, total: 3 },
    tracks: {
      href: 'https://api.spotify.com/v1/playlists/playlist0001/tracks',
      items: [{ added_at: '2024-01-01T00:00:00Z', added_by: { id: 'user0001' }, is_local: false, track }],
      limit: 100,
      next: null,
      offset: 0,
      previous: null,
      total: 1,
    },
    type: 'playlist',
    uri: 'spotify:playlist:playlist0001',
    href: 'https://api.spotify.com/v1/playlists/playlist0001',
    external_urls: { spotify: 'https://open.spotify.com/playlist/playlist0001' },
  },

  emptyPage: {
    href: 'https://api.spotify.com/v1/browse/categories',
    items: [],
    limit: 20,
    next: null,
    offset: 0,
    previous: null,
    total: 0,
  },

  genreSeeds: { genres: ['acoustic', 'ambient', 'rock'] },
};
