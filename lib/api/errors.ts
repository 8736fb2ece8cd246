import { NextResponse } from 'next/server';

/**
 * An expected failure that maps straight to an HTTP status and a `detail`
 * message for the client.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = 'ApiError';
    this.status = status;
    this.detail = detail;
  }
}

export function errorResponse(error: unknown, scope: string) {
  if (error instanceof ApiError) {
    return NextResponse.json({ detail: error.detail }, { status: error.status });
  }

  console.error(`[${scope}] Unexpected error:`, error);
  return NextResponse.json(
    { detail: 'Internal server error' },
    { status: 500 }
  );
}
