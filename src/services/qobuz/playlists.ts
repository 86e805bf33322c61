import {
  prepareNumericIds,
  validateChoice,
  ValidationError,
  validateNumericId,
  type NumericIds,
} from '../../lib/validation.js';
import type { QueryValue } from '../../types/http.js';
import { QobuzResourceApi } from './resource.js';

const PLAYLIST_RELATIONSHIPS = ['tracks', 'getSimilarPlaylists', 'focus', 'focusAll'] as const;

export const FEATURED_PLAYLIST_TYPES = ['last-created', 'editor-picks'] as const;

export type GetPlaylistOptions = {
  expand?: string | readonly string[];
  limit?: number;
  offset?: number;
};

export type GetFeaturedPlaylistsOptions = {
  genreIds?: NumericIds;
  /** 標籤 slug，可由 getPlaylistTags() 取得 */
  tags?: string | readonly string[];
  limit?: number;
  offset?: number;
};

export class PlaylistsApi extends QobuzResourceApi {
  /**
   * 播放清單；使用者可能隨時修改，歸在 user 層級
   */
  readonly getPlaylist = this.cached(
    'user',
    'getPlaylist',
    async (playlistId: number | string, options: GetPlaylistOptions = {}) =>
      this.client.request({
        method: 'GET',
        endpoint: 'playlist/get',
        query: {
          playlist_id: validateNumericId('playlistId', playlistId),
          ...this.extra(options.expand, PLAYLIST_RELATIONSHIPS),
          ...this.page(options),
        },
      })
  );

  readonly getFeaturedPlaylists = this.cached(
    'daily',
    'getFeaturedPlaylists',
    async (playlistType: string, options: GetFeaturedPlaylistsOptions = {}) => {
      const query: Record<string, QueryValue> = {
        type: validateChoice('playlist type', playlistType, FEATURED_PLAYLIST_TYPES),
        ...this.page(options),
      };
      if (options.genreIds !== undefined) {
        query.genre_ids = prepareNumericIds('genreIds', options.genreIds).join(',');
      }
      if (options.tags !== undefined) {
        const tags = typeof options.tags === 'string' ? options.tags.split(',') : options.tags;
        const slugs = tags.map((tag) => tag.trim());
        const invalid = slugs.find((slug) => !/^[a-z0-9-]+$/.test(slug));
        if (invalid !== undefined) {
          throw new ValidationError('tags', `Invalid playlist tag slug '${invalid}'.`);
        }
        query.tags = slugs.join(',');
      }
      return this.client.request({ method: 'GET', endpoint: 'playlist/getFeatured', query });
    }
  );

  readonly getPlaylistTags = this.cached('static', 'getPlaylistTags', async () =>
    this.client.request({ method: 'GET', endpoint: 'playlist/getTags' })
  );
}
