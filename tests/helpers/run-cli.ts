/**
 * CLI Runner Helper
 * 在測試行程內執行 CLI；每次都重新載入模組，指令選項與預設實例不會殘留
 */

import { vi } from 'vitest';
import { register } from 'prom-client';

export interface CLIResult {
  stdout: string;
  stderr: string;
  exitCode: typeof process.exitCode;
}

export async function runCLI(args: string[]): Promise<CLIResult> {
  vi.resetModules();
  // 指標會在重新載入時再次註冊
  register.clear();

  const { cli } = await import('../../src/cli.js');
  const { outputError } = await import('../../src/lib/output-formatter.js');

  const stdout: string[] = [];
  const stderr: string[] = [];
  const logSpy = vi.spyOn(console, 'log').mockImplementation((...data: unknown[]) => {
    stdout.push(data.map(String).join(' '));
  });
  const errorSpy = vi.spyOn(console, 'error').mockImplementation((...data: unknown[]) => {
    stderr.push(data.map(String).join(' '));
  });

  try {
    await cli.parseAsync(['node', 'tonearm', ...args]).catch((error: unknown) => {
      outputError(error);
    });
    return { stdout: stdout.join('\n'), stderr: stderr.join('\n'), exitCode: process.exitCode };
  } finally {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
  }
}
