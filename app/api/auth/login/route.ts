import { NextRequest } from 'next/server';
import { login } from '@/lib/api/auth';
import { getApiContext } from '@/lib/api/context';

export async function POST(request: NextRequest) {
  return login(request, await getApiContext());
}
