import { validateNonEmpty } from '../../lib/validation.js';
import type { JsonObject } from '../../types/token.js';
import { QobuzResourceApi } from './resource.js';

export type SearchOptions = {
  limit?: number;
  offset?: number;
};

export class SearchApi extends QobuzResourceApi {
  /**
   * 搜尋專輯、藝人、播放清單、曲目等全部類型
   */
  readonly search = this.cached('search', 'search', async (query: string, options: SearchOptions = {}) =>
    this.searchResources('catalog', query, options)
  );

  readonly searchAlbums = this.cached(
    'search',
    'searchAlbums',
    async (query: string, options: SearchOptions = {}) => this.searchResources('album', query, options)
  );

  readonly searchArtists = this.cached(
    'search',
    'searchArtists',
    async (query: string, options: SearchOptions = {}) => this.searchResources('artist', query, options)
  );

  readonly searchTracks = this.cached(
    'search',
    'searchTracks',
    async (query: string, options: SearchOptions = {}) => this.searchResources('track', query, options)
  );

  private async searchResources(
    resourceType: string,
    query: string,
    options: SearchOptions
  ): Promise<JsonObject> {
    return this.client.request({
      method: 'GET',
      endpoint: `${resourceType}/search`,
      query: { query: validateNonEmpty('query', query), ...this.page(options) },
    });
  }
}
