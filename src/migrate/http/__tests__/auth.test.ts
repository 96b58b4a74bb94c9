/**
 * Token Provider Tests
 */

import { describe, it, expect } from 'vitest';
import { OAuthPasswordTokenProvider, StaticTokenProvider, normalizeToken } from '../auth.js';
import { AuthenticationError, TransientNetworkError } from '../../errors.js';
import { FakeQTest } from '../../testing/fake-qtest.js';
import { VirtualClock } from '../../testing/virtual-clock.js';

describe('normalizeToken', () => {
  it('should strip a bearer prefix in any case', () => {
    expect(normalizeToken('Bearer abc')).toBe('abc');
    expect(normalizeToken('  bearer   abc ')).toBe('abc');
    expect(normalizeToken('abc')).toBe('abc');
  });
});

describe('StaticTokenProvider', () => {
  it('should serve the configured token', async () => {
    await expect(new StaticTokenProvider('Bearer test-secret').getToken()).resolves.toBe('test-secret');
  });

  it('should reject an empty token', () => {
    expect(() => new StaticTokenProvider('   ')).toThrow(AuthenticationError);
  });
});

describe('OAuthPasswordTokenProvider', () => {
  function setup(password = 'test-secret') {
    const qtest = new FakeQTest();
    const clock = new VirtualClock(0);
    const provider = new OAuthPasswordTokenProvider({
      baseUrl: 'https://qtest.test/',
      username: 'tester',
      password,
      fetch: qtest.fetch,
      clock,
    });
    return { qtest, clock, provider };
  }

  it('should perform a password grant with a basic client credential', async () => {
    const { qtest, provider } = setup();

    await expect(provider.getToken()).resolves.toBe('test-token');

    const [request] = qtest.calls('POST', '/oauth/token');
    expect(request.headers.get('authorization')).toBe(`Basic ${Buffer.from('tm-migrate:').toString('base64')}`);
    expect(request.headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(request.body).toBe('grant_type=password&username=tester&password=test-secret');
  });

  it('should cache the token and share one request between concurrent callers', async () => {
    const { qtest, provider } = setup();

    const tokens = await Promise.all([provider.getToken(), provider.getToken()]);
    await provider.getToken();

    expect(tokens).toEqual(['test-token', 'test-token']);
    expect(qtest.calls('POST', '/oauth/token')).toHaveLength(1);
  });

  it('should refresh a minute before the token expires', async () => {
    const { qtest, clock, provider } = setup();
    await provider.getToken();

    clock.advance(3_540_000 - 1);
    await provider.getToken();
    expect(qtest.calls('POST', '/oauth/token')).toHaveLength(1);

    clock.advance(1);
    await provider.getToken();
    expect(qtest.calls('POST', '/oauth/token')).toHaveLength(2);
  });

  it('should fetch a new token after invalidation', async () => {
    const { qtest, provider } = setup();
    await provider.getToken();

    provider.invalidate();
    await provider.getToken();

    expect(qtest.calls('POST', '/oauth/token')).toHaveLength(2);
  });

  it('should raise AuthenticationError for rejected credentials', async () => {
    const { provider } = setup('wrong');

    await expect(provider.getToken()).rejects.toThrow(
      new AuthenticationError('Authentication failed with status 401'),
    );
  });

  it('should raise a retryable error when the token endpoint is down', async () => {
    const { qtest, provider } = setup();
    qtest.fail({ path: '/oauth/token', status: 503, times: 1 });

    await expect(provider.getToken()).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(provider.getToken()).resolves.toBe('test-token');
  });

  it('should reject a response without an access token', async () => {
    const { qtest, provider } = setup();
    qtest.fail({ path: '/oauth/token', status: 200, body: { token_type: 'bearer' } });

    await expect(provider.getToken()).rejects.toThrow('No access token returned from authentication endpoint');
  });
});
