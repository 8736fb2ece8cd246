import bcrypt from 'bcryptjs';
import { randomBytes } from 'crypto';
import type { User } from '@/lib/db/schema';
import type { AppConfig, AuthMode } from '@/lib/utils/env';

/**
 * How passwords are stored and checked, and how tokens are minted.
 */
export interface CredentialPolicy {
  mode: AuthMode;
  hashPassword(password: string): Promise<string>;
  verifyPassword(password: string, stored: string): Promise<boolean>;
  mintToken(user: Pick<User, 'id'>): string;
}

/**
 * Mock rules: plaintext passwords and predictable `mocktoken_<userId>` tokens.
 * Only suitable for frontend development against a fake API.
 */
export const mockCredentials: CredentialPolicy = {
  mode: 'mock',
  hashPassword: async (password) => password,
  verifyPassword: async (password, stored) => password === stored,
  mintToken: (user) => `mocktoken_${user.id}`,
};

export function secureCredentials(rounds: number): CredentialPolicy {
  return {
    mode: 'secure',
    hashPassword: (password) => bcrypt.hash(password, rounds),
    verifyPassword: (password, stored) => bcrypt.compare(password, stored),
    mintToken: () => randomBytes(32).toString('hex'),
  };
}

export function createCredentialPolicy(config: AppConfig): CredentialPolicy {
  return config.authMode === 'secure' ? secureCredentials(config.bcryptRounds) : mockCredentials;
}
