import { describe, it, expect, afterEach, vi } from 'vitest';
import { requireAuth } from './auth.js';
import { StubResponse } from '../testUtils.js';

describe('requireAuth', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('lets every request through without a configured token', () => {
    vi.stubEnv('AUTH_TOKEN', '');
    const next = vi.fn();
    requireAuth({ headers: {}, query: {} }, new StubResponse(), next);
    expect(next).toHaveBeenCalledOnce();
  });

  it('rejects a request without credentials', () => {
    vi.stubEnv('AUTH_TOKEN', 'test-secret');
    const next = vi.fn();
    const res = new StubResponse();
    requireAuth({ headers: {}, query: {} }, res, next);
    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ ok: false, error: 'Unauthorized' });
  });

  it('rejects a wrong bearer token', () => {
    vi.stubEnv('AUTH_TOKEN', 'test-secret');
    const res = new StubResponse();
    requireAuth({ headers: { authorization: 'Bearer other' }, query: {} }, res, vi.fn());
    expect(res.statusCode).toBe(401);
  });

  it('accepts the bearer token', () => {
    vi.stubEnv('AUTH_TOKEN', 'test-secret');
    const next = vi.fn();
    const res = new StubResponse();
    requireAuth({ headers: { authorization: 'Bearer test-secret' }, query: {} }, res, next);
    expect(next).toHaveBeenCalledOnce();
    expect(res.body).toBeUndefined();
  });

  it('accepts the token as a query parameter', () => {
    vi.stubEnv('AUTH_TOKEN', 'test-secret');
    const next = vi.fn();
    requireAuth({ headers: {}, query: { token: 'test-secret' } }, new StubResponse(), next);
    expect(next).toHaveBeenCalledOnce();
  });
});
