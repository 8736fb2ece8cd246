import type { NextRequest } from 'next/server';
import { z } from 'zod';
import { ApiError } from '@/lib/api/errors';
import { normalizeEmail, validateEmail } from '@/lib/utils/validation';

const EmailSchema = z
  .string()
  .trim()
  .superRefine((email, ctx) => {
    const result = validateEmail(email);
    if (!result.valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error ?? 'Invalid email format' });
    }
  })
  .transform(normalizeEmail);

const TRUE_STRINGS = new Set(['1', 'true', 't', 'yes', 'y', 'on']);
const FALSE_STRINGS = new Set(['0', 'false', 'f', 'no', 'n', 'off']);

// Numeric strings become numbers; anything else is left for the schema to reject
function laxNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

// 1/0 and the usual yes/no words become booleans
function laxBoolean(value: unknown): unknown {
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(word)) return true;
    if (FALSE_STRINGS.has(word)) return false;
  }
  return value;
}

export const SignupSchema = z.object({
  name: z.string(),
  email: EmailSchema,
  password: z.string(),
});

export const LoginSchema = z.object({
  email: EmailSchema,
  password: z.string(),
});

// status and ownerId are not accepted from the caller; unknown keys are stripped
export const EventCreateSchema = z.object({
  name: z.string(),
  date: z.string(),
  budget: z.preprocess(laxNumber, z.number().nullish()),
  participants: z.array(z.string()).nullish(),
  event_type: z.string().nullish(),
  allow_wishlists: z.preprocess(laxBoolean, z.boolean().nullish()),
  collect_addresses: z.preprocess(laxBoolean, z.boolean().nullish()),
  custom_message: z.string().nullish(),
});

export type EventCreateInput = z.infer<typeof EventCreateSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Read the JSON body and validate it, failing with 422 on either step.
 */
export async function parseBody<S extends z.ZodTypeAny>(request: NextRequest, schema: S): Promise<z.infer<S>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ApiError(422, 'Invalid JSON body');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ApiError(422, formatIssues(parsed.error));
  }
  return parsed.data;
}
