/**
 * Metrics Command
 * 以 Prometheus 文字格式輸出本行程累積的指標
 */

import { Command } from 'commander';
import { getMetricsContentType, getMetricsSnapshot } from '../lib/metrics.js';
import { outputError } from '../lib/output-formatter.js';
import { getErrorFormat } from './options.js';

interface MetricsOptions {
  contentType?: boolean;
}

export const metricsCommand = new Command('metrics')
  .description('以 Prometheus 格式輸出指標')
  .option('--content-type', '先輸出 Content-Type 標頭')
  .action(async (options: MetricsOptions, command: Command) => {
    try {
      if (options.contentType) {
        console.log(`Content-Type: ${getMetricsContentType()}\n`);
      }
      console.log(await getMetricsSnapshot());
    } catch (error) {
      outputError(error, getErrorFormat(command));
    }
  });
