import {
  prepareAlbumIds,
  prepareNumericIds,
  validateChoice,
  ValidationError,
  type NumericIds,
} from '../../lib/validation.js';
import type { QueryValue } from '../../types/http.js';
import type { JsonObject } from '../../types/token.js';
import { QobuzResourceApi } from './resource.js';

export const FAVORITE_TYPES = ['albums', 'artists', 'articles', 'awards', 'labels', 'tracks'] as const;

export type SaveItems = {
  albumIds?: string | readonly string[];
  artistIds?: NumericIds;
  trackIds?: NumericIds;
};

export type GetMySavedOptions = {
  itemType?: string;
  limit?: number;
  offset?: number;
};

/**
 * 收藏；讀取端點屬於 user 層級，寫入後會清除相關快取
 */
export class FavoritesApi extends QobuzResourceApi {
  readonly getMySaved = this.cached(
    'user',
    'getMySaved',
    async (options: GetMySavedOptions = {}) => {
      this.client.requireAuthentication('favorites.getMySaved');

      const query: Record<string, QueryValue> = { ...this.page(options) };
      if (options.itemType !== undefined) {
        query.type = validateChoice('item type', options.itemType, FAVORITE_TYPES);
      }
      return this.client.request({ method: 'GET', endpoint: 'favorite/getUserFavorites', query });
    }
  );

  readonly getMySavedIds = this.cached('user', 'getMySavedIds', async () => {
    this.client.requireAuthentication('favorites.getMySavedIds');
    return this.client.request({ method: 'GET', endpoint: 'favorite/getUserFavoriteIds' });
  });

  async save(items: SaveItems): Promise<JsonObject> {
    this.client.requireAuthentication('favorites.save');
    return this.mutate('favorite/create', items);
  }

  async removeSaved(items: SaveItems): Promise<JsonObject> {
    this.client.requireAuthentication('favorites.removeSaved');
    return this.mutate('favorite/delete', items);
  }

  private async mutate(endpoint: string, items: SaveItems): Promise<JsonObject> {
    const form: Record<string, QueryValue> = {};
    if (items.albumIds !== undefined) {
      form.album_ids = prepareAlbumIds(items.albumIds);
    }
    if (items.artistIds !== undefined) {
      form.artist_ids = prepareNumericIds('artistIds', items.artistIds).join(',');
    }
    if (items.trackIds !== undefined) {
      form.track_ids = prepareNumericIds('trackIds', items.trackIds).join(',');
    }
    if (Object.keys(form).length === 0) {
      throw new ValidationError(
        'items',
        'At least one of albumIds, artistIds or trackIds must be specified.'
      );
    }

    const response = await this.client.request({ method: 'POST', endpoint, form });
    this.client.clearCache([this.getMySaved, this.getMySavedIds]);
    return response;
  }
}
