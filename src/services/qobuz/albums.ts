import {
  prepareNumericIds,
  validateAlbumId,
  validateChoice,
  type NumericIds,
} from '../../lib/validation.js';
import type { QueryValue } from '../../types/http.js';
import { QobuzResourceApi } from './resource.js';

const ALBUM_RELATIONSHIPS = ['albumsFromSameArtist', 'focus', 'focusAll'] as const;

export const FEATURED_ALBUM_TYPES = [
  'most-streamed',
  'best-sellers',
  'new-releases',
  'press-awards',
  'editors-picks',
  'most-featured',
  'harmonia-mundi',
  'universal-classic',
  'universal-jazz',
  'universal-jeunesse',
  'universal-chanson',
  'new-releases-full',
  'recent-releases',
  'ideal-discography',
  'qobuzissims',
  'album-of-the-week',
  're-release-of-the-week',
] as const;

export type GetAlbumOptions = {
  expand?: string | readonly string[];
  limit?: number;
  offset?: number;
};

export type GetFeaturedAlbumsOptions = {
  genreIds?: NumericIds;
  limit?: number;
  offset?: number;
};

export class AlbumsApi extends QobuzResourceApi {
  /**
   * 專輯目錄資訊
   * @param albumId 英數字專輯 ID，例如 'ho1xc2bmmn5ra'
   */
  readonly getAlbum = this.cached(
    'catalog',
    'getAlbum',
    async (albumId: string, options: GetAlbumOptions = {}) =>
      this.client.request({
        method: 'GET',
        endpoint: 'album/get',
        query: {
          album_id: validateAlbumId(albumId),
          ...this.extra(options.expand, ALBUM_RELATIONSHIPS),
          ...this.page(options),
        },
      })
  );

  /**
   * 精選專輯清單（排行榜、編輯推薦等）
   */
  readonly getFeaturedAlbums = this.cached(
    'popularity',
    'getFeaturedAlbums',
    async (featuredType: string, options: GetFeaturedAlbumsOptions = {}) => {
      const query: Record<string, QueryValue> = {
        type: validateChoice('featured type', featuredType, FEATURED_ALBUM_TYPES),
        ...this.page(options),
      };
      if (options.genreIds !== undefined) {
        const genreIds = prepareNumericIds('genreIds', options.genreIds);
        query[genreIds.length > 1 ? 'genre_ids' : 'genre_id'] = genreIds.join(',');
      }
      return this.client.request({ method: 'GET', endpoint: 'album/getFeatured', query });
    }
  );
}
