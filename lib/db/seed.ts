import type { CredentialPolicy } from '@/lib/auth/credentials';
import type { Store } from './client';
import type { GiftEvent } from './schema';

export const DEMO_USER = {
  id: 'u_demo_1',
  name: 'Demo User',
  email: 'demo@giftflow.app',
  password: 'demo123',
} as const;

export const DEMO_EVENT: GiftEvent = {
  id: 'evt_1',
  name: 'Holiday Gift Swap',
  date: '2025-12-15',
  budget: 40,
  participants: ['Alice', 'Bob', 'Charlie'],
  ownerId: DEMO_USER.id,
  status: 'draft',
  event_type: 'Secret Santa',
  allow_wishlists: true,
  collect_addresses: false,
  custom_message: 'Welcome to our annual swap!',
};

/**
 * Load the demo account and its event so the UI has something to show.
 * No token is issued; the demo user logs in like anyone else.
 */
export async function seedDemoData(store: Store, credentials: CredentialPolicy): Promise<void> {
  const password = await credentials.hashPassword(DEMO_USER.password);
  store.insertUser({ ...DEMO_USER, password });
  store.insertEvent(DEMO_EVENT);
}
