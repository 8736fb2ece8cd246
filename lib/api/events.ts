import { NextRequest, NextResponse } from 'next/server';
import { requireUser } from '@/lib/auth/current-user';
import type { GiftEvent, User } from '@/lib/db/schema';
import { EventCreateSchema, parseBody, type EventCreateInput } from '@/lib/schemas';
import type { ApiContext } from './context';
import { errorResponse } from './errors';

export const DEFAULT_EVENT_TYPE = 'Secret Santa';

/**
 * Fill in defaults for a new event. Status and owner are never taken from
 * the input.
 */
export function buildEvent(id: string, owner: User, input: EventCreateInput): GiftEvent {
  return {
    id,
    name: input.name,
    date: input.date,
    budget: input.budget ?? null,
    participants: input.participants ?? [],
    ownerId: owner.id,
    status: 'draft',
    // An empty string also falls back to the default
    event_type: input.event_type || DEFAULT_EVENT_TYPE,
    allow_wishlists: input.allow_wishlists ?? true,
    collect_addresses: input.collect_addresses ?? false,
    custom_message: input.custom_message ?? null,
  };
}

/**
 * List the caller's events in the order they were created
 */
export async function listEvents(request: NextRequest, { store }: ApiContext) {
  try {
    const user = requireUser(request, store);
    return NextResponse.json(store.getEventsByOwner(user.id));
  } catch (error) {
    return errorResponse(error, 'Events');
  }
}

/**
 * Create an event owned by the caller
 *
 * Request body:
 * - name: string
 * - date: string - free-form, not validated as a date
 * - budget?: number
 * - participants?: string[]
 * - event_type?: string - defaults to "Secret Santa"
 * - allow_wishlists?: boolean - defaults to true
 * - collect_addresses?: boolean - defaults to false
 * - custom_message?: string
 *
 * Error responses:
 * - 401: Missing or invalid token
 * - 422: Invalid body
 */
export async function createEvent(request: NextRequest, { store }: ApiContext) {
  try {
    const user = requireUser(request, store);
    const input = await parseBody(request, EventCreateSchema);

    const event = store.insertEvent(buildEvent(`evt_${store.countEvents() + 1}`, user, input));

    console.log(`[Events] ${user.id} created ${event.id}`);
    return NextResponse.json(event);
  } catch (error) {
    return errorResponse(error, 'Events');
  }
}
