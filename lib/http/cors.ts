import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import type { CorsOrigins } from '@/lib/utils/env';

export const ALLOWED_METHODS = 'DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT';
const PREFLIGHT_MAX_AGE = '600';

export function isOriginAllowed(origin: string, allowed: CorsOrigins): boolean {
  return allowed === '*' || allowed.includes(origin);
}

export function isPreflight(request: NextRequest): boolean {
  return (
    request.method === 'OPTIONS' &&
    request.headers.has('origin') &&
    request.headers.has('access-control-request-method')
  );
}

/**
 * Add CORS headers for a simple (non-preflight) request.
 * The origin is echoed rather than sent as "*" because credentials are allowed.
 */
export function applyCorsHeaders(request: NextRequest, headers: Headers, allowed: CorsOrigins): void {
  const origin = request.headers.get('origin');
  if (!origin || !isOriginAllowed(origin, allowed)) return;

  headers.set('Access-Control-Allow-Origin', origin);
  headers.set('Access-Control-Allow-Credentials', 'true');
  headers.append('Vary', 'Origin');
}

export function preflightResponse(request: NextRequest, allowed: CorsOrigins): NextResponse {
  const origin = request.headers.get('origin') ?? '';
  if (!isOriginAllowed(origin, allowed)) {
    return new NextResponse('Disallowed CORS origin', { status: 400 });
  }

  const headers = new Headers({
    'Access-Control-Allow-Origin': origin,
    'Access-Control-Allow-Credentials': 'true',
    'Access-Control-Allow-Methods': ALLOWED_METHODS,
    'Access-Control-Max-Age': PREFLIGHT_MAX_AGE,
    Vary: 'Origin',
  });
  const requestedHeaders = request.headers.get('access-control-request-headers');
  if (requestedHeaders) {
    headers.set('Access-Control-Allow-Headers', requestedHeaders);
  }

  return new NextResponse('OK', { status: 200, headers });
}
