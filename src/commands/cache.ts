/**
 * Cache Command
 * 回應快取層級檢視
 */

import { Command } from 'commander';
import { outputData, outputError, renderTable } from '../lib/output-formatter.js';
import { getTtlPolicyRegistry } from '../services/ttl-policy.js';
import type { CacheTier } from '../types/cache.js';
import { getErrorFormat, getOutputFormat } from './options.js';

export interface TierInfo {
  tier: CacheTier;
  /** null 表示永不過期 */
  ttlSeconds: number | null;
}

export function describeTiers(): TierInfo[] {
  return getTtlPolicyRegistry()
    .entries()
    .map(([tier, ttlMs]) => ({
      tier,
      ttlSeconds: Number.isFinite(ttlMs) ? ttlMs / 1000 : null,
    }));
}

export const cacheCommand = new Command('cache').description('回應快取');

/**
 * tonearm cache tiers
 */
cacheCommand
  .command('tiers')
  .description('列出快取層級與 TTL（含設定檔覆寫）')
  .action((_options: Record<string, never>, command: Command) => {
    try {
      const format = getOutputFormat(command);
      const tiers = describeTiers();
      outputData(tiers, format, () =>
        renderTable(
          ['層級', 'TTL（秒）'],
          tiers.map((info) => [info.tier, info.ttlSeconds ?? '∞'])
        )
      );
    } catch (error) {
      outputError(error, getErrorFormat(command));
    }
  });
