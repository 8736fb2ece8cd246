import { NextRequest, NextResponse } from 'next/server';
import { requireUser } from '@/lib/auth/current-user';
import type { AuthResponse, PublicUser, User } from '@/lib/db/schema';
import { LoginSchema, SignupSchema, parseBody } from '@/lib/schemas';
import type { ApiContext } from './context';
import { ApiError, errorResponse } from './errors';

function toPublicUser(user: User): PublicUser {
  return { name: user.name, email: user.email, userId: user.id };
}

function toAuthResponse(user: User, token: string): AuthResponse {
  return { token, ...toPublicUser(user) };
}

/**
 * Register a new account
 *
 * Request body:
 * - name: string
 * - email: string - must not already be registered
 * - password: string
 *
 * Response: { token, name, email, userId }
 *
 * Error responses:
 * - 400: Email already in use
 * - 422: Invalid body
 */
export async function signup(request: NextRequest, { store, credentials }: ApiContext) {
  try {
    const { name, email, password } = await parseBody(request, SignupSchema);
    const storedPassword = await credentials.hashPassword(password);

    // Checked after the hash resolves; nothing below yields until both rows are in
    if (store.getUserByEmail(email)) {
      throw new ApiError(400, 'Email already in use');
    }
    const userId = `u_${store.countUsers() + 1}`;
    const user = store.insertUser({ id: userId, name, email, password: storedPassword });
    const token = credentials.mintToken(user);
    store.saveToken(token, email);
    const result = toAuthResponse(user, token);

    console.log(`[Signup] Created user ${result.userId} (${email})`);
    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, 'Signup');
  }
}

/**
 * Exchange email and password for a token
 *
 * An existing token for the account is reused; otherwise one is minted.
 *
 * Error responses:
 * - 401: Unknown email or wrong password
 * - 422: Invalid body
 */
export async function login(request: NextRequest, { store, credentials }: ApiContext) {
  try {
    const { email, password } = await parseBody(request, LoginSchema);

    const user = store.getUserByEmail(email);
    const valid = user ? await credentials.verifyPassword(password, user.password) : false;
    if (!user || !valid) {
      // Same message either way so the response does not reveal which emails exist
      console.warn(`[Login] Rejected credentials for ${email}`);
      throw new ApiError(401, 'Invalid email or password');
    }

    const token = store.getTokenForEmail(email) ?? credentials.mintToken(user);
    store.saveToken(token, email);

    console.log(`[Login] ${user.id} signed in`);
    return NextResponse.json(toAuthResponse(user, token));
  } catch (error) {
    return errorResponse(error, 'Login');
  }
}

export async function me(request: NextRequest, { store }: ApiContext) {
  try {
    const user = requireUser(request, store);
    return NextResponse.json(toPublicUser(user));
  } catch (error) {
    return errorResponse(error, 'Me');
  }
}
