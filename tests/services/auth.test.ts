import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  AuthPipeline,
  isCredentialRejection,
  NoValidCredentialError,
  selectWorkingSecret,
  type AuthFlow,
} from '../../src/services/auth.js';
import { MemoryTokenPersistence } from '../../src/services/token-persistence.js';
import { TokenStore } from '../../src/services/token-store.js';
import { ApiRequestError } from '../../src/services/transport.js';

const rejected = (): ApiRequestError =>
  new ApiRequestError('track/getFileUrl', 400, 'Invalid Request Signature parameter');

function createFlow(overrides: Partial<AuthFlow> = {}) {
  return {
    authenticate: vi.fn(async () => ({ accessToken: 'fresh-token', extras: { user_id: 7 } })),
    ...overrides,
  };
}

const baseRequest = {
  clientName: 'clientA',
  authorizationFlow: 'password',
  clientId: 'id1',
};

describe('selectWorkingSecret', () => {
  it('should return the first accepted candidate', async () => {
    const probe = vi.fn(async (secret: string) => {
      if (secret !== 'test-secret-two') throw rejected();
    });

    await expect(
      selectWorkingSecret(['test-secret-one', 'test-secret-two', 'test-secret-three'], probe)
    ).resolves.toBe('test-secret-two');
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('should fail after every candidate was rejected once', async () => {
    const probe = vi.fn(async () => {
      throw rejected();
    });

    await expect(
      selectWorkingSecret(['test-secret-one', 'test-secret-two'], probe, 'clientA')
    ).rejects.toThrow('None of the 2 candidate secret(s) for clientA was accepted.');
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('should fail immediately without candidates', async () => {
    const probe = vi.fn(async () => undefined);

    await expect(selectWorkingSecret([], probe)).rejects.toThrow(NoValidCredentialError);
    expect(probe).not.toHaveBeenCalled();
  });

  it('should propagate errors that are not rejections', async () => {
    const outage = new ApiRequestError('track/getFileUrl', 503, 'Service Unavailable');
    const probe = vi.fn(async () => {
      throw outage;
    });

    await expect(selectWorkingSecret(['test-secret-one', 'test-secret-two'], probe)).rejects.toBe(
      outage
    );
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('should only count 400 and 401 responses as rejections', () => {
    expect(isCredentialRejection(new ApiRequestError('x', 401, 'Unauthorized'))).toBe(true);
    expect(isCredentialRejection(new ApiRequestError('x', 403, 'Forbidden'))).toBe(false);
    expect(isCredentialRejection(new Error('socket hang up'))).toBe(false);
  });
});

describe('AuthPipeline', () => {
  let store: TokenStore;
  let pipeline: AuthPipeline;

  beforeEach(() => {
    store = new TokenStore({ persistence: new MemoryTokenPersistence() });
    pipeline = new AuthPipeline({ store });
  });

  describe('credential precedence', () => {
    it('should use an explicit token without touching the store', async () => {
      await store.upsert({ ...baseRequest, userIdentifier: 'alice', accessToken: 'stored-token' });
      const flow = createFlow();

      const credential = await pipeline.establish(
        { ...baseRequest, accessToken: 'explicit-token', clientSecret: 'test-secret-one' },
        flow
      );

      expect(credential).toMatchObject({
        source: 'explicit',
        accessToken: 'explicit-token',
        clientSecret: 'test-secret-one',
        record: null,
      });
      expect(flow.authenticate).not.toHaveBeenCalled();
    });

    it('should reuse a stored token before signing in', async () => {
      await store.upsert({
        ...baseRequest,
        userIdentifier: 'alice',
        accessToken: 'stored-token',
        clientSecret: 'test-secret-one',
      });
      const flow = createFlow();

      const credential = await pipeline.establish(baseRequest, flow);

      expect(credential).toMatchObject({
        source: 'store',
        accessToken: 'stored-token',
        clientSecret: 'test-secret-one',
        userIdentifier: 'alice',
      });
      expect(flow.authenticate).not.toHaveBeenCalled();
    });

    it('should prefer a configured secret over the stored one', async () => {
      await store.upsert({ ...baseRequest, accessToken: 'stored-token', clientSecret: 'test-secret-one' });

      const credential = await pipeline.establish(
        { ...baseRequest, clientSecret: 'test-secret-two' },
        createFlow()
      );

      expect(credential.clientSecret).toBe('test-secret-two');
    });

    it('should sign in and store the result when nothing is stored', async () => {
      const flow = createFlow();

      const credential = await pipeline.establish(
        { ...baseRequest, userIdentifier: 'alice', clientSecret: 'test-secret-one' },
        flow
      );

      expect(credential.source).toBe('fresh');
      expect(flow.authenticate).toHaveBeenCalledTimes(1);
      const stored = await store.find({ ...baseRequest, userIdentifier: 'alice' });
      expect(stored).toMatchObject({
        accessToken: 'fresh-token',
        clientSecret: 'test-secret-one',
        extras: { user_id: 7 },
      });
    });

    it('should resolve the identifier from the flow when none is given', async () => {
      const flow = createFlow({ resolveUserIdentifier: async () => 'user-7' });

      const credential = await pipeline.establish(baseRequest, flow);

      expect(credential.userIdentifier).toBe('user-7');
      expect((await store.list()).map((summary) => summary.userIdentifier)).toEqual(['user-7']);
    });

    it('should work without a store', async () => {
      const credential = await new AuthPipeline({ store: null }).establish(baseRequest, createFlow());

      expect(credential).toMatchObject({ source: 'fresh', record: null, clientSecret: null });
    });
  });

  describe('bypass marker', () => {
    it('should sign in again and store the result under the stripped identifier', async () => {
      await store.upsert({ ...baseRequest, userIdentifier: 'carol', accessToken: 'old-token' });
      const flow = createFlow();

      const credential = await pipeline.establish({ ...baseRequest, userIdentifier: '~carol' }, flow);

      expect(credential).toMatchObject({ source: 'fresh', userIdentifier: 'carol' });
      expect(flow.authenticate).toHaveBeenCalledTimes(1);

      const summaries = await store.list();
      expect(summaries.map((summary) => summary.userIdentifier)).toEqual(['carol']);
      expect((await store.find({ ...baseRequest, userIdentifier: 'carol' }))?.accessToken).toBe(
        'fresh-token'
      );
    });
  });

  describe('secret probing', () => {
    it('should probe candidates with the new token and keep the accepted one', async () => {
      const probeSecret = vi.fn(async (secret: string, accessToken: string) => {
        expect(accessToken).toBe('fresh-token');
        if (secret === 'test-secret-one') throw rejected();
      });
      const flow = createFlow({ probeSecret });

      const credential = await pipeline.establish(
        { ...baseRequest, fallbackSecrets: ['test-secret-one', 'test-secret-two'] },
        flow
      );

      expect(credential.clientSecret).toBe('test-secret-two');
      expect(probeSecret).toHaveBeenCalledTimes(2);
      expect((await store.find(baseRequest))?.clientSecret).toBe('test-secret-two');
    });

    it('should raise NoValidCredentialError when every candidate fails', async () => {
      const flow = createFlow({
        probeSecret: async () => {
          throw rejected();
        },
      });

      await expect(
        pipeline.establish(
          { ...baseRequest, clientSecret: ['test-secret-one', 'test-secret-two'] },
          flow
        )
      ).rejects.toThrow(NoValidCredentialError);
      expect(await store.list()).toEqual([]);
    });

    it('should refuse several candidates when the flow cannot probe', async () => {
      await expect(
        pipeline.establish(
          { ...baseRequest, clientSecret: ['test-secret-one', 'test-secret-two'] },
          createFlow()
        )
      ).rejects.toThrow('No candidate secret available for clientA.');
    });
  });

  describe('reauthenticate', () => {
    it('should ignore the stored token and overwrite it', async () => {
      await store.upsert({ ...baseRequest, userIdentifier: 'alice', accessToken: 'stale-token' });
      const flow = createFlow();

      const credential = await pipeline.reauthenticate(
        { ...baseRequest, userIdentifier: 'alice' },
        flow
      );

      expect(credential.source).toBe('fresh');
      expect((await store.find({ ...baseRequest, userIdentifier: 'alice' }))?.accessToken).toBe(
        'fresh-token'
      );
    });
  });
});
