import {
  prepareChoices,
  validateChoice,
  validateInteger,
  validateNumericId,
} from '../../lib/validation.js';
import type { QueryValue } from '../../types/http.js';
import { QobuzResourceApi } from './resource.js';

const ARTIST_RELATIONSHIPS = [
  'albums',
  'albums_with_last_release',
  'playlists',
  'tracks_appears_on',
] as const;

export const RELEASE_TYPES = [
  'all',
  'album',
  'live',
  'compilation',
  'epSingle',
  'other',
  'download',
  'composer',
] as const;

const RELEASE_SORT_FIELDS = ['relevant', 'release_date'] as const;

export type GetArtistOptions = {
  expand?: string | readonly string[];
  limit?: number;
  offset?: number;
};

export type GetArtistReleasesOptions = {
  releaseTypes?: string | readonly string[];
  sortBy?: string;
  descending?: boolean;
  /** 同時取得每張專輯的曲目（改用 artist/getReleasesList） */
  includeTracks?: boolean;
  trackLimit?: number;
  limit?: number;
  offset?: number;
};

export class ArtistsApi extends QobuzResourceApi {
  readonly getArtist = this.cached(
    'popularity',
    'getArtist',
    async (artistId: number | string, options: GetArtistOptions = {}) =>
      this.client.request({
        method: 'GET',
        endpoint: 'artist/get',
        query: {
          artist_id: validateNumericId('artistId', artistId),
          ...this.extra(options.expand, ARTIST_RELATIONSHIPS),
          ...this.page(options),
        },
      })
  );

  /**
   * 藝人的發行作品；需要登入
   */
  readonly getArtistReleases = this.cached(
    'daily',
    'getArtistReleases',
    async (artistId: number | string, options: GetArtistReleasesOptions = {}) => {
      this.client.requireAuthentication('artists.getArtistReleases');

      const query: Record<string, QueryValue> = {
        artist_id: validateNumericId('artistId', artistId),
        ...this.page(options, 100),
      };
      if (options.releaseTypes !== undefined) {
        query.release_type = prepareChoices('release type', options.releaseTypes, RELEASE_TYPES);
      }
      if (options.sortBy !== undefined) {
        query.order = validateChoice('sort field', options.sortBy, RELEASE_SORT_FIELDS);
      }
      if (options.descending !== undefined) {
        query.orderDirection = options.descending ? 'desc' : 'asc';
      }

      if (options.includeTracks) {
        if (options.trackLimit !== undefined) {
          query.track_size = validateInteger('trackLimit', options.trackLimit, 1, 30);
        }
        return this.client.request({ method: 'GET', endpoint: 'artist/getReleasesList', query });
      }
      return this.client.request({ method: 'GET', endpoint: 'artist/getReleasesGrid', query });
    }
  );

  readonly getSimilarArtists = this.cached(
    'popularity',
    'getSimilarArtists',
    async (artistId: number | string, options: { limit?: number; offset?: number } = {}) =>
      this.client.request({
        method: 'GET',
        endpoint: 'artist/getSimilarArtists',
        query: {
          artist_id: validateNumericId('artistId', artistId),
          ...this.page(options, 100),
        },
      })
  );
}
