/**
 * Output Formatter
 * 統一輸出格式處理：json | table
 */

import Table from 'cli-table3';
import { ValidationError } from './validation.js';

export type OutputFormat = 'json' | 'table';

export type TableCell = string | number | boolean | null;

/**
 * 驗證輸出格式是否有效
 */
export function isValidFormat(format: string): format is OutputFormat {
  return format === 'json' || format === 'table';
}

/**
 * 解析 -f/--format；未指定時使用設定檔或預設值
 */
export function resolveFormat(value: string | undefined, fallback: OutputFormat = 'json'): OutputFormat {
  if (value === undefined) {
    return fallback;
  }
  if (!isValidFormat(value)) {
    throw new ValidationError('format', `Invalid format '${value}'. Valid values: 'json', 'table'.`);
  }
  return value;
}

/**
 * 以 cli-table3 繪製表格；null 顯示為 '-'
 */
export function renderTable(head: string[], rows: TableCell[][]): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(row.map((cell) => (cell === null ? '-' : String(cell))));
  }
  return table.toString();
}

/**
 * 輸出資料到 stdout
 * @param tableRenderer 若為 table 格式，使用此函數產生內容；未提供時 fallback 到 JSON
 */
export function outputData(
  data: unknown,
  format: OutputFormat = 'json',
  tableRenderer?: () => string
): void {
  if (format === 'table' && tableRenderer) {
    console.log(tableRenderer());
    return;
  }
  console.log(JSON.stringify(data, null, 2));
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN_ERROR';
}

/**
 * 輸出錯誤並設定非零結束碼
 * json 格式寫到 stdout 方便管線處理，table 格式寫到 stderr
 */
export function outputError(error: unknown, format: OutputFormat = 'json'): void {
  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);

  if (format === 'table') {
    console.error(`錯誤 [${code}]：${message}`);
  } else {
    console.log(JSON.stringify({ success: false, error: { code, message } }, null, 2));
  }
  process.exitCode = 1;
}
