import { NextRequest } from 'next/server';
import { createApiContext, type ApiContext } from '@/lib/api/context';
import { loadConfig, type AppConfig } from '@/lib/utils/env';

const BASE_URL = 'http://localhost';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig({}), ...overrides };
}

/** A fresh, seeded context with its own in-memory tables. */
export function createTestContext(overrides: Partial<AppConfig> = {}): Promise<ApiContext> {
  return createApiContext({ config: testConfig(overrides) });
}

export function getRequest(path: string, headers: Record<string, string> = {}): NextRequest {
  return new NextRequest(`${BASE_URL}${path}`, { method: 'GET', headers });
}

export function postJson(path: string, body: unknown, headers: Record<string, string> = {}): NextRequest {
  return new NextRequest(`${BASE_URL}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

export function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}` };
}
