import { NextResponse } from 'next/server';

export interface StatusReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
}

// There is no database behind the mock; this is what the frontend's
// connectivity check expects to see.
export const MOCK_STATUS: StatusReport = {
  backend: '✅ Running',
  database: '⏸️ Mock mode (no DB)',
  database_url: '❌ Not Set',
  database_name: '❌ Not Set',
  connection_status: 'Mock',
  collections: [],
};

export function rootMessage() {
  return NextResponse.json({ message: 'GiftFlow Mock API running' });
}

export function hello() {
  return NextResponse.json({ message: 'Hello from GiftFlow backend!' });
}

export function statusReport() {
  return NextResponse.json(MOCK_STATUS);
}
