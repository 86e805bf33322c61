/**
 * 指令共用的全域選項處理
 */

import type { Command } from 'commander';
import { resolveFormat, type OutputFormat } from '../lib/output-formatter.js';
import { getConfigService } from '../services/config.js';

export interface GlobalOptions {
  format?: string;
}

/**
 * 輸出格式：-f/--format > 設定檔 > json
 */
export function getOutputFormat(command: Command): OutputFormat {
  return resolveFormat(
    command.optsWithGlobals<GlobalOptions>().format,
    getConfigService().get('format') ?? 'json'
  );
}

/**
 * 解析格式失敗時仍要能輸出錯誤
 */
export function getErrorFormat(command: Command): OutputFormat {
  try {
    return getOutputFormat(command);
  } catch {
    return 'json';
  }
}
