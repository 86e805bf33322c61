import { validateNumericId } from '../../lib/validation.js';
import { QobuzResourceApi } from './resource.js';

const LABEL_RELATIONSHIPS = ['albums', 'focus', 'focusAll'] as const;

export type GetLabelOptions = {
  expand?: string | readonly string[];
  limit?: number;
  offset?: number;
};

export class LabelsApi extends QobuzResourceApi {
  readonly getLabel = this.cached(
    'catalog',
    'getLabel',
    async (labelId: number | string, options: GetLabelOptions = {}) =>
      this.client.request({
        method: 'GET',
        endpoint: 'label/get',
        query: {
          label_id: validateNumericId('labelId', labelId),
          ...this.extra(options.expand, LABEL_RELATIONSHIPS),
          ...this.page(options),
        },
      })
  );
}
