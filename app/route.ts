import { rootMessage } from '@/lib/api/status';

export function GET() {
  return rootMessage();
}
