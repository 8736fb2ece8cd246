import { createCredentialPolicy, type CredentialPolicy } from '@/lib/auth/credentials';
import { createStore, type Store, type Tables } from '@/lib/db/client';
import { seedDemoData } from '@/lib/db/seed';
import { getConfig, type AppConfig } from '@/lib/utils/env';

export interface ApiContext {
  config: AppConfig;
  store: Store;
  credentials: CredentialPolicy;
}

export interface ApiContextOptions {
  config?: AppConfig;
  tables?: Tables;
}

export async function createApiContext(options: ApiContextOptions = {}): Promise<ApiContext> {
  const config = options.config ?? getConfig();
  const store = createStore(options.tables);
  const credentials = createCredentialPolicy(config);

  if (config.seedDemoData) {
    await seedDemoData(store, credentials);
  }

  if (config.authMode === 'mock' && process.env.NODE_ENV !== 'test') {
    console.warn('[API] Running in mock auth mode: passwords are stored in plaintext and tokens are predictable');
  }

  return { config, store, credentials };
}

// Kept on globalThis so every route bundle (and dev reloads) share one store
declare global {
  var __giftflowApiContext: Promise<ApiContext> | undefined;
}

export function getApiContext(): Promise<ApiContext> {
  if (!globalThis.__giftflowApiContext) {
    globalThis.__giftflowApiContext = createApiContext().catch((error: unknown) => {
      // Not cached on failure; the next call builds again
      globalThis.__giftflowApiContext = undefined;
      throw error;
    });
  }
  return globalThis.__giftflowApiContext;
}

export function resetApiContext(): void {
  globalThis.__giftflowApiContext = undefined;
}
