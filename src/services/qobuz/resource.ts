/**
 * Qobuz 端點群組共用的參數處理
 */

import { prepareChoices, validateInteger } from '../../lib/validation.js';
import { ResourceApi } from '../api-client.js';
import type { QueryValue } from '../../types/http.js';
import type { PrivateQobuzApi } from './client.js';

export abstract class QobuzResourceApi extends ResourceApi<PrivateQobuzApi> {
  /**
   * 分頁參數；limit 上限依端點而異
   */
  protected page(
    options: { limit?: number; offset?: number },
    maxLimit = 500
  ): Record<string, QueryValue> {
    const query: Record<string, QueryValue> = {};
    if (options.limit !== undefined) {
      query.limit = validateInteger('limit', options.limit, 1, maxLimit);
    }
    if (options.offset !== undefined) {
      query.offset = validateInteger('offset', options.offset, 0);
    }
    return query;
  }

  /**
   * 附帶的關聯資源（`extra` 參數）
   */
  protected extra(
    expand: string | readonly string[] | undefined,
    relationships: readonly string[]
  ): Record<string, QueryValue> {
    if (expand === undefined) {
      return {};
    }
    return { extra: prepareChoices('related resource', expand, relationships) };
  }
}
