/**
 * Tokens Command
 * 已存 token 管理指令
 */

import { Command } from 'commander';
import { outputData, outputError, renderTable } from '../lib/output-formatter.js';
import { ValidationError } from '../lib/validation.js';
import { getTokenStore } from '../services/token-store.js';
import type { CredentialFilter, CredentialSummary } from '../types/token.js';
import { getErrorFormat, getOutputFormat } from './options.js';

interface FilterOptions {
  client?: string[];
  flow?: string[];
  clientId?: string[];
  user?: string[];
}

interface RemoveOptions extends FilterOptions {
  all?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function withFilterOptions(command: Command): Command {
  return command
    .option('--client <name>', '用戶端名稱（可重複）', collect)
    .option('--flow <flow>', '認證流程（可重複）', collect)
    .option('--client-id <id>', '用戶端 ID（可重複）', collect)
    .option('--user <identifier>', '帳號識別碼（可重複）', collect);
}

export function toCredentialFilter(options: FilterOptions): CredentialFilter {
  const filter: CredentialFilter = {};
  if (options.client) filter.clientNames = options.client;
  if (options.flow) filter.authorizationFlows = options.flow;
  if (options.clientId) filter.clientIds = options.clientId;
  if (options.user) filter.userIdentifiers = options.user;
  return filter;
}

function renderSummaries(summaries: CredentialSummary[]): string {
  if (summaries.length === 0) {
    return '沒有已存的 token';
  }
  const table = renderTable(
    ['用戶端', '流程', '帳號', '到期', '最近使用'],
    summaries.map((summary) => [
      summary.clientName,
      summary.authorizationFlow,
      summary.userIdentifier,
      summary.expiresAt,
      summary.lastAccessed,
    ])
  );
  return `${table}\n共 ${summaries.length} 筆`;
}

export const tokensCommand = new Command('tokens').description('管理已存的 token');

/**
 * tonearm tokens list
 */
withFilterOptions(
  tokensCommand.command('list').description('列出已存的 token（不含 secret，最近使用的在前）')
).action(async (options: FilterOptions, command: Command) => {
  try {
    const format = getOutputFormat(command);
    const summaries = await getTokenStore().list(toCredentialFilter(options));
    outputData(summaries, format, () => renderSummaries(summaries));
  } catch (error) {
    outputError(error, getErrorFormat(command));
  }
});

/**
 * tonearm tokens remove
 * 未指定任何條件時必須加上 --all
 */
withFilterOptions(tokensCommand.command('remove').description('刪除符合條件的 token'))
  .option('--all', '刪除所有已存的 token')
  .action(async (options: RemoveOptions, command: Command) => {
    try {
      const format = getOutputFormat(command);
      const filter = toCredentialFilter(options);
      if (Object.keys(filter).length === 0 && !options.all) {
        throw new ValidationError(
          'all',
          'No filter given. Pass --all to remove every stored token.'
        );
      }

      const removed = await getTokenStore().remove(filter);
      outputData({ success: true, removed }, format, () => `已刪除 ${removed} 筆 token`);
    } catch (error) {
      outputError(error, getErrorFormat(command));
    }
  });
