import type { NextRequest } from 'next/server';
import { ApiError } from '@/lib/api/errors';
import type { Store } from '@/lib/db/client';
import type { User } from '@/lib/db/schema';

const BEARER_PREFIX = 'Bearer ';

export function resolveIdentity(store: Store, token: string): User {
  const email = store.getEmailForToken(token);
  if (!email) {
    throw new ApiError(401, 'Invalid token');
  }
  const user = store.getUserByEmail(email);
  if (!user) {
    throw new ApiError(401, 'User not found');
  }
  return user;
}

/**
 * Resolve the caller from the Authorization header.
 * The header may carry the token bare or as `Bearer <token>`.
 */
export function requireUser(request: NextRequest, store: Store): User {
  const authorization = request.headers.get('authorization');
  if (!authorization) {
    throw new ApiError(401, 'Missing Authorization header');
  }
  const token = authorization.startsWith(BEARER_PREFIX)
    ? authorization.slice(BEARER_PREFIX.length)
    : authorization;
  return resolveIdentity(store, token);
}
