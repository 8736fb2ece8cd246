import { NextRequest } from 'next/server';
import { me } from '@/lib/api/auth';
import { getApiContext } from '@/lib/api/context';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  return me(request, await getApiContext());
}
