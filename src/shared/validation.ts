import { z, ZodError } from 'zod';

export const MAX_MESSAGE_LENGTH = 10000;

/**
 * Length in code points, so an emoji counts once rather than as a surrogate pair.
 */
export function codePointLength(value: string): number {
  return [...value].length;
}

export function withinMessageLength(value: string): boolean {
  return codePointLength(value) <= MAX_MESSAGE_LENGTH;
}

/**
 * Admission rules for anything entering the outbound queue.
 */
export const outboundMessageSchema = z.object({
  recipient: z.string().min(1, 'Recipient is required'),
  body: z.string()
    .min(1, 'Message body is required')
    .refine(withinMessageLength, `Message body must be at most ${MAX_MESSAGE_LENGTH} characters`),
});

/**
 * Body of POST /send. Both fields are trimmed before the length checks run.
 */
export const sendRequestSchema = z.object({
  to: z.string().trim().min(1, 'Recipient is required'),
  message: z.string()
    .trim()
    .min(1, 'Message is required')
    .refine(withinMessageLength, `Message must be at most ${MAX_MESSAGE_LENGTH} characters`),
});

/**
 * Flatten zod issues into `{ field: [messages] }`. Issues without a path are
 * filed under `_root`.
 */
export function toFieldErrors(error: ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_root';
    const messages = errors[field] ?? [];
    messages.push(issue.message);
    errors[field] = messages;
  }

  return errors;
}
