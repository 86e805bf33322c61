import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { toCredentialFilter } from '../../src/commands/tokens.js';
import { JsonFileTokenPersistence } from '../../src/services/token-persistence.js';
import { TokenStore } from '../../src/services/token-store.js';
import { runCLI } from '../helpers/run-cli.js';

describe('tokens command', () => {
  let tempDir: string;
  let store: TokenStore;

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tonearm-tokens-'));
    const storePath = path.join(tempDir, 'tokens.json');
    vi.stubEnv('TONEARM_CONFIG', path.join(tempDir, 'config.json'));
    vi.stubEnv('TONEARM_TOKEN_STORE', storePath);
    vi.stubEnv('TONEARM_LOG_LEVEL', '');

    store = new TokenStore({ persistence: new JsonFileTokenPersistence(storePath) });
    await store.upsert({
      clientName: 'clientA',
      authorizationFlow: 'password',
      clientId: 'id1',
      userIdentifier: 'alice',
      accessToken: 'test-token-alice',
    });
    await store.upsert({
      clientName: 'clientB',
      authorizationFlow: 'password',
      clientId: 'id2',
      userIdentifier: 'bob',
      accessToken: 'test-token-bob',
      refreshToken: 'test-refresh-bob',
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('toCredentialFilter', () => {
    it('should map repeated options to filter fields', () => {
      expect(toCredentialFilter({ client: ['clientA'], user: ['alice', 'bob'] })).toEqual({
        clientNames: ['clientA'],
        userIdentifiers: ['alice', 'bob'],
      });
      expect(toCredentialFilter({})).toEqual({});
    });
  });

  describe('tokens list', () => {
    it('should list summaries without secrets, most recent first', async () => {
      const result = await runCLI(['tokens', 'list']);

      expect(result.exitCode).toBeUndefined();
      const summaries: unknown = JSON.parse(result.stdout);
      expect(summaries).toEqual([
        expect.objectContaining({ clientName: 'clientB', userIdentifier: 'bob', hasRefreshToken: true }),
        expect.objectContaining({ clientName: 'clientA', userIdentifier: 'alice', hasRefreshToken: false }),
      ]);
      expect(result.stdout).not.toContain('test-token-alice');
      expect(result.stdout).not.toContain('test-refresh-bob');
    });

    it('should apply filters', async () => {
      const result = await runCLI(['tokens', 'list', '--client', 'clientA']);
      expect(JSON.parse(result.stdout)).toEqual([
        expect.objectContaining({ clientName: 'clientA', userIdentifier: 'alice' }),
      ]);
    });

    it('should print a count under the table', async () => {
      const result = await runCLI(['-f', 'table', 'tokens', 'list']);
      expect(result.stdout.split('\n').at(-1)).toBe('共 2 筆');
    });

    it('should say so when nothing is stored', async () => {
      await store.remove();
      const result = await runCLI(['-f', 'table', 'tokens', 'list']);
      expect(result.stdout).toBe('沒有已存的 token');
    });
  });

  describe('tokens remove', () => {
    it('should refuse to remove everything without --all', async () => {
      const result = await runCLI(['tokens', 'remove']);

      expect(result.exitCode).toBe(1);
      expect(JSON.parse(result.stdout)).toEqual({
        success: false,
        error: {
          code: 'INVALID_ARGUMENT',
          message: 'No filter given. Pass --all to remove every stored token.',
        },
      });
      expect(await store.list()).toHaveLength(2);
    });

    it('should remove matching tokens', async () => {
      const result = await runCLI(['tokens', 'remove', '--user', 'bob']);

      expect(JSON.parse(result.stdout)).toEqual({ success: true, removed: 1 });
      expect((await store.list()).map((summary) => summary.userIdentifier)).toEqual(['alice']);
    });

    it('should remove every token with --all', async () => {
      const result = await runCLI(['-f', 'table', 'tokens', 'remove', '--all']);

      expect(result.stdout).toBe('已刪除 2 筆 token');
      expect(await store.list()).toEqual([]);
    });
  });
});
