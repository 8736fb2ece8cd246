import { hello } from '@/lib/api/status';

export function GET() {
  return hello();
}
