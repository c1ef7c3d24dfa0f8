// Centralized type exports for the Spotify catalog objects

export * from './common';
export * from './album';
export * from './artist';
export * from './browse';
export * from './playlist';
export * from './track';

/**
 * Query parameters accepted by the request dispatcher. `undefined` and `null`
 * values are dropped; arrays are joined with commas.
 */
export type QueryValue = string | number | boolean | readonly string[] | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export type AuthHeader = {
  Authorization: string;
};
