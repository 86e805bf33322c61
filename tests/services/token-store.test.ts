import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ValidationError } from '../../src/lib/validation.js';
import {
  JsonFileTokenPersistence,
  MemoryTokenPersistence,
  type TokenPersistence,
} from '../../src/services/token-persistence.js';
import {
  parseUserIdentifier,
  StoreUnavailableError,
  TokenStore,
} from '../../src/services/token-store.js';
import type { CredentialInput, CredentialRecord } from '../../src/types/token.js';

function credential(overrides: Partial<CredentialInput> = {}): CredentialInput {
  return {
    clientName: 'clientA',
    authorizationFlow: 'password',
    clientId: 'id1',
    accessToken: 'test-token',
    ...overrides,
  };
}

describe('parseUserIdentifier', () => {
  it('should strip the bypass marker', () => {
    expect(parseUserIdentifier('~carol')).toEqual({ userIdentifier: 'carol', bypass: true });
  });

  it('should treat a lone marker as bypass without identifier', () => {
    expect(parseUserIdentifier('~')).toEqual({ userIdentifier: null, bypass: true });
  });

  it('should pass plain identifiers through', () => {
    expect(parseUserIdentifier('alice')).toEqual({ userIdentifier: 'alice', bypass: false });
    expect(parseUserIdentifier(undefined)).toEqual({ userIdentifier: undefined, bypass: false });
  });
});

describe('TokenStore', () => {
  let store: TokenStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    store = new TokenStore({ persistence: new MemoryTokenPersistence() });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('find', () => {
    it('should resolve to null when nothing matches', async () => {
      expect(
        await store.find({ clientName: 'clientA', authorizationFlow: 'password', clientId: 'id1' })
      ).toBeNull();
    });

    it('should return the most recently used record when no identifier is given', async () => {
      await store.upsert(credential({ userIdentifier: 'alice', accessToken: 'alice-token' }));
      vi.setSystemTime(new Date('2026-01-01T00:01:00Z'));
      await store.upsert(credential({ userIdentifier: 'bob', accessToken: 'bob-token' }));

      const found = await store.find({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
      });

      expect(found?.userIdentifier).toBe('bob');
      expect(found?.accessToken).toBe('bob-token');
    });

    it('should return the named record regardless of recency', async () => {
      await store.upsert(credential({ userIdentifier: 'alice', accessToken: 'alice-token' }));
      vi.setSystemTime(new Date('2026-01-01T00:01:00Z'));
      await store.upsert(credential({ userIdentifier: 'bob', accessToken: 'bob-token' }));

      const found = await store.find({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
        userIdentifier: 'alice',
      });

      expect(found?.accessToken).toBe('alice-token');
    });

    it('should refresh the access time of a found record', async () => {
      await store.upsert(credential({ userIdentifier: 'alice' }));
      vi.setSystemTime(new Date('2026-01-01T00:01:00Z'));
      await store.upsert(credential({ userIdentifier: 'bob' }));
      vi.setSystemTime(new Date('2026-01-01T00:02:00Z'));

      const alice = await store.find({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
        userIdentifier: 'alice',
      });
      expect(alice?.lastAccessed).toBe('2026-01-01T00:02:00.000Z');

      const recent = await store.find({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
      });
      expect(recent?.userIdentifier).toBe('alice');
    });

    it('should prefer the later record when access times are equal', async () => {
      await store.upsert(credential({ userIdentifier: 'alice' }));
      await store.upsert(credential({ userIdentifier: 'bob' }));

      const found = await store.find({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
      });

      expect(found?.userIdentifier).toBe('bob');
    });

    it('should not match records of another client, flow or client ID', async () => {
      await store.upsert(credential({ clientName: 'clientB', userIdentifier: 'alice' }));
      await store.upsert(credential({ authorizationFlow: 'pkce', userIdentifier: 'alice' }));
      await store.upsert(credential({ clientId: 'id2', userIdentifier: 'alice' }));

      expect(
        await store.find({ clientName: 'clientA', authorizationFlow: 'password', clientId: 'id1' })
      ).toBeNull();
    });

    it('should skip stored records for a bypass identifier', async () => {
      await store.upsert(credential({ userIdentifier: 'carol' }));

      expect(
        await store.find({
          clientName: 'clientA',
          authorizationFlow: 'password',
          clientId: 'id1',
          userIdentifier: '~carol',
        })
      ).toBeNull();
    });

    it('should return a copy that does not alter the store', async () => {
      await store.upsert(credential({ userIdentifier: 'alice', scopes: ['read'] }));
      const lookup = {
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
        userIdentifier: 'alice',
      };

      const found = await store.find(lookup);
      found?.scopes.push('write');

      expect((await store.find(lookup))?.scopes).toEqual(['read']);
    });
  });

  describe('upsert', () => {
    it('should store a bypass identifier without the marker', async () => {
      const record = await store.upsert(credential({ userIdentifier: '~carol' }));

      expect(record.userIdentifier).toBe('carol');
      expect((await store.list()).map((summary) => summary.userIdentifier)).toEqual(['carol']);
    });

    it('should replace the record with the same identity', async () => {
      await store.upsert(credential({ userIdentifier: 'alice', accessToken: 'old-token' }));
      await store.upsert(credential({ userIdentifier: 'alice', accessToken: 'new-token' }));

      const found = await store.find({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
        userIdentifier: 'alice',
      });
      expect(found?.accessToken).toBe('new-token');
      expect(await store.list()).toHaveLength(1);
    });

    it('should fill optional fields with null', async () => {
      const record = await store.upsert(credential());

      expect(record).toEqual({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
        userIdentifier: null,
        clientSecret: null,
        accessToken: 'test-token',
        refreshToken: null,
        expiresAt: null,
        tokenType: null,
        scopes: [],
        redirectUri: null,
        extras: null,
        lastAccessed: '2026-01-01T00:00:00.000Z',
      });
    });

    it('should require the identity fields', async () => {
      await expect(store.upsert(credential({ clientId: '' }))).rejects.toThrow(ValidationError);
    });
  });

  describe('remove', () => {
    beforeEach(async () => {
      await store.upsert(credential({ userIdentifier: 'alice' }));
      await store.upsert(credential({ userIdentifier: 'bob' }));
      await store.upsert(credential({ clientName: 'clientB', userIdentifier: 'alice' }));
    });

    it('should remove only the matching records', async () => {
      expect(await store.remove({ clientNames: 'clientA', userIdentifiers: 'alice' })).toBe(1);

      const remaining = await store.list();
      expect(remaining.map((summary) => [summary.clientName, summary.userIdentifier])).toEqual([
        ['clientB', 'alice'],
        ['clientA', 'bob'],
      ]);
    });

    it('should remove every record of a client when only the client is given', async () => {
      expect(await store.remove({ clientNames: 'clientA' })).toBe(2);
      expect(await store.list()).toHaveLength(1);
    });

    it('should remove everything without a filter', async () => {
      expect(await store.remove()).toBe(3);
      expect(await store.list()).toEqual([]);
    });

    it('should be a no-op for identities that are absent', async () => {
      expect(await store.remove({ userIdentifiers: 'zed' })).toBe(0);
      expect(await store.list()).toHaveLength(3);
    });

    it('should accept lists of values per field', async () => {
      expect(await store.remove({ userIdentifiers: ['alice', 'bob'], clientNames: ['clientA'] })).toBe(2);
    });
  });

  describe('list', () => {
    it('should not expose secret material', async () => {
      await store.upsert(
        credential({
          userIdentifier: 'alice',
          clientSecret: 'test-secret',
          refreshToken: 'test-refresh',
          extras: { plan: 'studio' },
        })
      );

      const [summary] = await store.list();

      expect(summary).toEqual({
        clientName: 'clientA',
        authorizationFlow: 'password',
        clientId: 'id1',
        userIdentifier: 'alice',
        tokenType: null,
        scopes: [],
        redirectUri: null,
        expiresAt: null,
        hasRefreshToken: true,
        lastAccessed: '2026-01-01T00:00:00.000Z',
      });
    });

    it('should not match records without identifier against an identifier filter', async () => {
      await store.upsert(credential());

      expect(await store.list({ userIdentifiers: 'alice' })).toEqual([]);
      expect(await store.list({ clientNames: 'clientA' })).toHaveLength(1);
    });
  });

  describe('persistence failures', () => {
    it('should surface load failures instead of reporting absence', async () => {
      const failing: TokenPersistence = {
        load: async () => {
          throw new StoreUnavailableError('Cannot read token store at test');
        },
        save: async () => undefined,
        describe: () => 'failing',
      };
      const failingStore = new TokenStore({ persistence: failing });

      await expect(
        failingStore.find({ clientName: 'clientA', authorizationFlow: 'password', clientId: 'id1' })
      ).rejects.toThrow(StoreUnavailableError);
    });

    it('should time out a hanging backend', async () => {
      const hanging: TokenPersistence = {
        load: () => new Promise<CredentialRecord[]>(() => undefined),
        save: async () => undefined,
        describe: () => 'hanging',
      };
      const hangingStore = new TokenStore({ persistence: hanging, timeoutMs: 20 });

      await expect(hangingStore.list()).rejects.toThrow(
        'Token store load timed out after 20ms (hanging)'
      );
    });

    it('should keep serving operations after a failure', async () => {
      const memory = new MemoryTokenPersistence();
      let failNext = true;
      const flaky: TokenPersistence = {
        load: async () => {
          if (failNext) {
            failNext = false;
            throw new StoreUnavailableError('Cannot read token store at flaky');
          }
          return memory.load();
        },
        save: (records) => memory.save(records),
        describe: () => 'flaky',
      };
      const flakyStore = new TokenStore({ persistence: flaky });

      await expect(flakyStore.list()).rejects.toThrow(StoreUnavailableError);
      await flakyStore.upsert(credential({ userIdentifier: 'alice' }));
      expect(await flakyStore.list()).toHaveLength(1);
    });
  });

  describe('concurrency', () => {
    it('should not let a timed-out save overwrite a later write', async () => {
      const memory = new MemoryTokenPersistence();
      let slowSaves = 1;
      const slow: TokenPersistence = {
        load: () => memory.load(),
        save: async (records) => {
          if (slowSaves > 0) {
            slowSaves--;
            await new Promise((resolve) => setTimeout(resolve, 60));
          }
          await memory.save(records);
        },
        describe: () => 'slow',
      };
      const slowStore = new TokenStore({ persistence: slow, timeoutMs: 20 });

      await expect(slowStore.upsert(credential({ userIdentifier: 'alice' }))).rejects.toThrow(
        'Token store save timed out after 20ms (slow)'
      );
      await slowStore.upsert(credential({ userIdentifier: 'bob' }));

      const listed = await slowStore.list();
      expect(listed.map((summary) => summary.userIdentifier)).toEqual(['bob', 'alice']);
    });

    it('should apply interleaved operations in call order without losing writes', async () => {
      const lookup = { clientName: 'clientA', authorizationFlow: 'password', clientId: 'id1' };

      const [, , foundAlice, , removed, , mostRecent] = await Promise.all([
        store.upsert(credential({ userIdentifier: 'alice', accessToken: 'token-a1' })),
        store.upsert(credential({ userIdentifier: 'bob' })),
        store.find({ ...lookup, userIdentifier: 'alice' }),
        store.upsert(credential({ userIdentifier: 'alice', accessToken: 'token-a2' })),
        store.remove({ userIdentifiers: 'bob' }),
        store.upsert(credential({ userIdentifier: 'carol' })),
        store.find(lookup),
      ]);

      expect(foundAlice?.accessToken).toBe('token-a1');
      expect(removed).toBe(1);
      expect(mostRecent?.userIdentifier).toBe('carol');

      const listed = await store.list();
      expect(listed.map((summary) => summary.userIdentifier)).toEqual(['carol', 'alice']);
      expect((await store.find({ ...lookup, userIdentifier: 'alice' }))?.accessToken).toBe(
        'token-a2'
      );
    });

    it('should keep every write from parallel upserts of different accounts', async () => {
      const users = ['u1', 'u2', 'u3', 'u4', 'u5', 'u6'];

      await Promise.all(users.map((user) => store.upsert(credential({ userIdentifier: user }))));

      const listed = await store.list();
      expect(listed.map((summary) => summary.userIdentifier)).toEqual([...users].reverse());
    });
  });
});

describe('JsonFileTokenPersistence', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tonearm-tokens-test-'));
    filePath = path.join(testDir, 'nested', 'tokens.json');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should treat a missing file as an empty store', async () => {
    expect(await new JsonFileTokenPersistence(filePath).load()).toEqual([]);
  });

  it('should persist records across instances', async () => {
    const first = new TokenStore({ persistence: new JsonFileTokenPersistence(filePath) });
    await first.upsert(credential({ userIdentifier: 'alice', extras: { user_id: 42 } }));

    const second = new TokenStore({ persistence: new JsonFileTokenPersistence(filePath) });
    const found = await second.find({
      clientName: 'clientA',
      authorizationFlow: 'password',
      clientId: 'id1',
    });

    expect(found?.userIdentifier).toBe('alice');
    expect(found?.extras).toEqual({ user_id: 42 });
  });

  it('should write the file with owner-only permissions', async () => {
    await new JsonFileTokenPersistence(filePath).save([]);

    expect(fs.statSync(filePath).mode & 0o777).toBe(0o600);
    expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual({ version: 1, tokens: [] });
  });

  it('should reject a file that is not JSON', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{not json');

    await expect(new JsonFileTokenPersistence(filePath).load()).rejects.toThrow(
      `Token store at ${filePath} is not valid JSON`
    );
  });

  it('should reject a file with the wrong shape', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ version: 1, tokens: [{ client_name: 'clientA' }] }));

    const load = new JsonFileTokenPersistence(filePath).load();
    await expect(load).rejects.toThrow(StoreUnavailableError);
    await expect(load).rejects.toThrow(`Token store at ${filePath} is corrupt`);
  });

  it('should report an unreadable path as unavailable', async () => {
    // 目錄無法當作檔案讀取
    await expect(new JsonFileTokenPersistence(testDir).load()).rejects.toThrow(
      `Cannot read token store at ${testDir}`
    );
  });
});
