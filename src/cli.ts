import { Command } from 'commander';
import { setLogLevel } from './lib/logger.js';
import { getConfigService } from './services/config.js';
import { ResponseCache, setResponseCache } from './services/response-cache.js';
import { setTtlPolicyRegistry, TtlPolicyRegistry } from './services/ttl-policy.js';
import { cacheCommand } from './commands/cache.js';
import { metricsCommand } from './commands/metrics.js';
import { qobuzCommand } from './commands/qobuz.js';
import { tokensCommand } from './commands/tokens.js';

/**
 * 依設定檔套用日誌級別、快取層級 TTL 與快取容量
 * @throws UnknownTierError 設定檔含未知的層級名稱
 */
export function applyConfig(): void {
  const config = getConfigService();

  const logLevel = config.getLogLevel();
  if (logLevel) {
    setLogLevel(logLevel);
  }
  setTtlPolicyRegistry(new TtlPolicyRegistry(config.getCacheTierOverrides()));
  setResponseCache(new ResponseCache({ maxEntries: config.getCacheMaxEntries() }));
}

export const cli = new Command();

cli
  .name('tonearm')
  .description('Music streaming API client with a tiered response cache and multi-account token store')
  .version('0.1.0');

// 全域選項
cli.option('-f, --format <format>', '輸出格式: json (default) | table');

cli.hook('preAction', () => {
  applyConfig();
});

// 註冊指令
cli.addCommand(tokensCommand);
cli.addCommand(cacheCommand);
cli.addCommand(qobuzCommand);
cli.addCommand(metricsCommand);
