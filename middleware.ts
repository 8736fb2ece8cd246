import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { applyCorsHeaders, isPreflight, preflightResponse } from '@/lib/http/cors';
import { getConfig } from '@/lib/utils/env';

export function middleware(req: NextRequest) {
  const { corsOrigins } = getConfig();

  // Answer preflights here; route handlers only define GET/POST
  if (isPreflight(req)) {
    return preflightResponse(req, corsOrigins);
  }

  const res = NextResponse.next();
  applyCorsHeaders(req, res.headers, corsOrigins);
  return res;
}

export const config = {
  matcher: ['/', '/test', '/api/:path*'],
};
