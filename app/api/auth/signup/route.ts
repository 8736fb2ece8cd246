import { NextRequest } from 'next/server';
import { signup } from '@/lib/api/auth';
import { getApiContext } from '@/lib/api/context';

export async function POST(request: NextRequest) {
  return signup(request, await getApiContext());
}
