import { NextRequest } from 'next/server';
import { getApiContext } from '@/lib/api/context';
import { createEvent, listEvents } from '@/lib/api/events';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  return listEvents(request, await getApiContext());
}

export async function POST(request: NextRequest) {
  return createEvent(request, await getApiContext());
}
