// ABOUTME: Generic catalog accessor driven by the resource table in @catalog/config.
// ABOUTME: Validates IDs and batch ceilings before handing requests to SpotifyClient.

import { SPOTIFY_RESOURCES, type ResourceDefinition, type ResourceName } from '@catalog/config';
import { ValidationError, type QueryParams } from '@catalog/shared';
import type { SpotifyClient } from './client';

export function assertId(id: string, label: string): void {
  if (typeof id !== 'string' || id.trim() === '') {
    throw new ValidationError(`A ${label} ID is required`);
  }
}

export function assertBatch(ids: readonly string[], definition: ResourceDefinition): void {
  if (ids.length === 0) {
    throw new ValidationError(`At least one ${definition.label} ID is required`);
  }
  if (definition.batchLimit !== undefined && ids.length > definition.batchLimit) {
    throw new ValidationError(
      `Exceeded maximum of ${definition.batchLimit} ${definition.label} IDs per request (got ${ids.length})`,
      { limit: definition.batchLimit, count: ids.length }
    );
  }
  ids.forEach((id) => assertId(id, definition.label));
}

/**
 * Reject a `limit` outside 1..max. An absent limit is left to the API default.
 */
export function assertLimit(limit: number | undefined, max: number, min: number = 1): void {
  if (limit === undefined) return;
  if (!Number.isInteger(limit) || limit < min || limit > max) {
    throw new ValidationError(`limit must be an integer between ${min} and ${max} (got ${limit})`, {
      limit,
      min,
      max,
    });
  }
}

export class CatalogResource {
  readonly definition: ResourceDefinition;

  constructor(
    private client: SpotifyClient,
    name: ResourceName
  ) {
    this.definition = SPOTIFY_RESOURCES[name];
  }

  /** GET `{path}` */
  async list<T>(params?: QueryParams): Promise<T> {
    return this.client.get<T>(this.definition.path, params);
  }

  /** GET `{path}/{id}` */
  async getOne<T>(id: string, params?: QueryParams): Promise<T> {
    assertId(id, this.definition.label);
    return this.client.get<T>(`${this.definition.path}/${encodeURIComponent(id)}`, params);
  }

  /** GET `{path}?ids=a,b,c`, enforcing the resource's batch ceiling */
  async getMany<T>(ids: readonly string[], params: QueryParams = {}): Promise<T> {
    assertBatch(ids, this.definition);
    return this.client.get<T>(this.definition.path, { ...params, ids });
  }

  /** GET `{path}/{id}/{child}` */
  async getChild<T>(id: string, child: string, params?: QueryParams): Promise<T> {
    assertId(id, this.definition.label);
    return this.client.get<T>(`${this.definition.path}/${encodeURIComponent(id)}/${child}`, params);
  }

  /** GET `{path}/{subpath}` for fixed sub-endpoints such as genre seeds */
  async getSubresource<T>(subpath: string, params?: QueryParams): Promise<T> {
    return this.client.get<T>(`${this.definition.path}/${subpath}`, params);
  }
}
