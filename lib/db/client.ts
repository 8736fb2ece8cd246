import type { GiftEvent, User } from './schema';

/**
 * The in-memory tables. Maps iterate in insertion order, and `set` on an
 * existing key keeps that key's position.
 */
export interface Tables {
  users: Map<string, User>; // email -> user
  tokens: Map<string, string>; // token -> email
  events: GiftEvent[];
}

/**
 * Fresh, empty tables. Nothing is written to disk; state is lost when the
 * process exits.
 */
export function createTables(): Tables {
  return { users: new Map(), tokens: new Map(), events: [] };
}

function copyEvent(event: GiftEvent): GiftEvent {
  return { ...event, participants: [...event.participants] };
}

/**
 * Helper functions over one set of tables. Handlers receive this object rather
 * than reaching for module-level state.
 */
export function createStore(tables: Tables = createTables()) {
  const { users, tokens, events } = tables;

  const store = {
    getUserByEmail: (email: string): User | undefined => {
      return users.get(email);
    },

    countUsers: (): number => users.size,

    insertUser: (user: Omit<User, 'created_at'>): User => {
      if (users.has(user.email)) {
        throw new Error(`User already exists for ${user.email}`);
      }
      const created: User = { ...user, created_at: Date.now() };
      users.set(created.email, created);
      return created;
    },

    getEmailForToken: (token: string): string | undefined => {
      return tokens.get(token);
    },

    // First inserted wins when an email has several tokens
    getTokenForEmail: (email: string): string | undefined => {
      for (const [token, owner] of tokens) {
        if (owner === email) return token;
      }
      return undefined;
    },

    saveToken: (token: string, email: string): void => {
      tokens.set(token, email);
    },

    countEvents: (): number => events.length,

    insertEvent: (event: GiftEvent): GiftEvent => {
      events.push(copyEvent(event));
      return event;
    },

    getEventsByOwner: (ownerId: string): GiftEvent[] => {
      return events.filter((event) => event.ownerId === ownerId).map(copyEvent);
    },
  };

  return store;
}

export type Store = ReturnType<typeof createStore>;
