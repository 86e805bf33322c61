import { validateNumericId } from '../../lib/validation.js';
import type { QueryValue } from '../../types/http.js';
import { QobuzResourceApi } from './resource.js';

export type GetGenresOptions = {
  /** 只列出此類型的子類型 */
  parentId?: number | string;
  limit?: number;
  offset?: number;
};

export class GenresApi extends QobuzResourceApi {
  readonly getGenre = this.cached('static', 'getGenre', async (genreId: number | string) =>
    this.client.request({
      method: 'GET',
      endpoint: 'genre/get',
      query: { genre_id: validateNumericId('genreId', genreId) },
    })
  );

  readonly getGenres = this.cached(
    'static',
    'getGenres',
    async (options: GetGenresOptions = {}) => {
      const query: Record<string, QueryValue> = { ...this.page(options) };
      if (options.parentId !== undefined) {
        query.parent_id = validateNumericId('parentId', options.parentId);
      }
      return this.client.request({ method: 'GET', endpoint: 'genre/list', query });
    }
  );
}
