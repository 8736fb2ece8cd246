/**
 * Route modules wired to the shared process-wide context
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GET as getEvents, POST as postEvent } from '@/app/api/events/route';
import { POST as postLogin } from '@/app/api/auth/login/route';
import { POST as postSignup } from '@/app/api/auth/signup/route';
import { GET as getHello } from '@/app/api/hello/route';
import { GET as getMe } from '@/app/api/me/route';
import { GET as getRoot } from '@/app/route';
import { GET as getStatus } from '@/app/test/route';
import { getApiContext, resetApiContext } from '@/lib/api/context';
import { mockCredentials } from '@/lib/auth/credentials';
import { bearer, getRequest, postJson } from '../helpers';

describe('bootstrap routes', () => {
  it('GET / reports the service is running', async () => {
    expect(await getRoot().json()).toEqual({ message: 'GiftFlow Mock API running' });
  });

  it('GET /api/hello greets', async () => {
    expect(await getHello().json()).toEqual({ message: 'Hello from GiftFlow backend!' });
  });

  it('GET /test returns the static mock status', async () => {
    expect(await getStatus().json()).toEqual({
      backend: '✅ Running',
      database: '⏸️ Mock mode (no DB)',
      database_url: '❌ Not Set',
      database_name: '❌ Not Set',
      connection_status: 'Mock',
      collections: [],
    });
  });
});

describe('auth and event routes', () => {
  beforeEach(() => {
    resetApiContext();
  });

  afterEach(() => {
    resetApiContext();
  });

  it('share one store across route modules', async () => {
    const signed = await (
      await postSignup(postJson('/api/auth/signup', { name: 'A', email: 'a@x.com', password: 'p' }))
    ).json();
    expect(signed).toEqual({ token: 'mocktoken_u_2', name: 'A', email: 'a@x.com', userId: 'u_2' });

    const logged = await (await postLogin(postJson('/api/auth/login', { email: 'a@x.com', password: 'p' }))).json();
    expect(logged.token).toBe('mocktoken_u_2');

    const who = await (await getMe(getRequest('/api/me', bearer('mocktoken_u_2')))).json();
    expect(who).toEqual({ name: 'A', email: 'a@x.com', userId: 'u_2' });

    const created = await (
      await postEvent(postJson('/api/events', { name: 'Trip', date: '2025-01-01' }, bearer('mocktoken_u_2')))
    ).json();
    expect(created).toMatchObject({ id: 'evt_2', ownerId: 'u_2', status: 'draft' });

    const listed = await (await getEvents(getRequest('/api/events', bearer('mocktoken_u_2')))).json();
    expect(listed).toEqual([created]);
  });

  it('starts from the seed again after a reset', async () => {
    await postSignup(postJson('/api/auth/signup', { name: 'A', email: 'a@x.com', password: 'p' }));
    resetApiContext();

    const { store } = await getApiContext();
    expect(store.countUsers()).toBe(1);
    expect(store.getUserByEmail('a@x.com')).toBeUndefined();
  });

  it('builds the context again after a failed start', async () => {
    const hash = vi.spyOn(mockCredentials, 'hashPassword').mockRejectedValueOnce(new Error('boom'));

    try {
      await expect(getApiContext()).rejects.toThrow('boom');
      expect(globalThis.__giftflowApiContext).toBeUndefined();

      const { store } = await getApiContext();
      expect(store.countUsers()).toBe(1);
    } finally {
      hash.mockRestore();
    }
  });
});
