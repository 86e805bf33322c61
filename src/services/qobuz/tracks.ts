import {
  prepareNumericIds,
  validateChoice,
  ValidationError,
  validateNumericId,
  type NumericIds,
} from '../../lib/validation.js';
import type { QueryValue } from '../../types/http.js';
import type { JsonObject } from '../../types/token.js';
import { QobuzResourceApi } from './resource.js';

/** 5: MP3 320 kbps, 6: CD 16-bit/44.1 kHz, 7: 24-bit ≤ 96 kHz, 27: 24-bit > 96 kHz */
export const FORMAT_IDS = [5, 6, 7, 27] as const;

export const PLAYBACK_INTENTS = ['download', 'import', 'stream'] as const;

export type PlaybackInfoOptions = {
  formatId?: number;
  intent?: string;
  /** 只取得 30 秒試聽 */
  preview?: boolean;
};

export class TracksApi extends QobuzResourceApi {
  /**
   * 取得一或多首曲目
   * 單一 ID 使用 track/get，多個 ID 改用 track/getList
   */
  readonly getTracks = this.cached('popularity', 'getTracks', async (trackIds: NumericIds) => {
    const ids = prepareNumericIds('trackIds', trackIds);
    const [first] = ids;
    if (ids.length === 1 && first !== undefined) {
      return this.client.request({
        method: 'GET',
        endpoint: 'track/get',
        query: { track_id: first },
      });
    }
    return this.client.request({
      method: 'POST',
      endpoint: 'track/getList',
      json: { tracks_id: ids },
    });
  });

  /**
   * 串流或下載網址；回應含有時效性 URL，不快取
   */
  async getTrackPlaybackInfo(
    trackId: number | string,
    options: PlaybackInfoOptions = {}
  ): Promise<JsonObject> {
    this.client.requireAuthentication('tracks.getTrackPlaybackInfo');

    const query: Record<string, QueryValue> = {
      track_id: validateNumericId('trackId', trackId),
    };
    if (options.formatId !== undefined) {
      const formatId = options.formatId;
      if (!FORMAT_IDS.some((allowed) => allowed === formatId)) {
        throw new ValidationError(
          'formatId',
          `Invalid format ID ${formatId}. Valid values: ${FORMAT_IDS.join(', ')}.`
        );
      }
      query.format_id = formatId;
    }
    if (options.intent !== undefined) {
      query.intent = validateChoice('intent', options.intent, PLAYBACK_INTENTS);
    }
    if (options.preview !== undefined) {
      query.sample = options.preview;
    }

    return this.client.request({
      method: 'GET',
      endpoint: 'track/getFileUrl',
      query,
      signed: true,
    });
  }
}
