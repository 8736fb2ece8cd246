export interface User {
  id: string;
  name: string;
  email: string; // unique, used as the lookup key; domain part lowercased
  password: string; // plaintext in mock mode, bcrypt hash in secure mode
  created_at: number;
}

export type EventStatus = 'draft';

/** Event as stored and as it goes over the wire. */
export interface GiftEvent {
  id: string;
  name: string;
  date: string; // free-form, never parsed
  budget: number | null;
  participants: string[];
  ownerId: string;
  status: EventStatus;
  event_type: string;
  allow_wishlists: boolean;
  collect_addresses: boolean;
  custom_message: string | null;
}

export interface PublicUser {
  name: string;
  email: string;
  userId: string;
}

export interface AuthResponse extends PublicUser {
  token: string;
}
