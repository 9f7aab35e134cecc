/**
 * Response shapes of the chat service's REST API.
 * Unknown fields are kept (passthrough) so bots can read what they need.
 */
import { z } from 'zod';

// ============================================================================
// Entities
// ============================================================================

export const recipientSchema = z
  .object({
    id: z.number().int(),
    email: z.string().optional(),
    full_name: z.string().optional(),
  })
  .passthrough();

export const messageSchema = z
  .object({
    id: z.number().int(),
    type: z.enum(['stream', 'private']),
    content: z.string(),
    sender_id: z.number().int(),
    sender_email: z.string(),
    sender_full_name: z.string(),
    client: z.string().optional(),
    stream_id: z.number().int().nullish(),
    display_recipient: z.union([z.array(recipientSchema), z.string()]).nullish(),
    subject: z.string().nullish(),
    topic: z.string().nullish(),
  })
  .passthrough();

export const eventSchema = z
  .object({
    id: z.number().int(),
    type: z.string(),
    // A malformed message must not poison the whole batch
    message: messageSchema.optional().catch(undefined),
    op: z.string().optional(),
  })
  .passthrough();

export const userSchema = z
  .object({
    user_id: z.number().int(),
    email: z.string(),
    full_name: z.string().optional(),
    role: z.number().int().optional(),
    is_bot: z.boolean().optional(),
  })
  .passthrough();

// ============================================================================
// Envelopes
// ============================================================================

export const errorResponseSchema = z
  .object({
    result: z.literal('error'),
    msg: z.string().default(''),
    code: z.string().default('BAD_REQUEST'),
    'retry-after': z.number().optional(),
  })
  .passthrough();

export const registerResponseSchema = z
  .object({
    queue_id: z.string(),
    last_event_id: z.number().int(),
  })
  .passthrough();

export const eventsResponseSchema = z
  .object({
    events: z.array(eventSchema).default([]),
  })
  .passthrough();

export const sendMessageResponseSchema = z
  .object({
    id: z.number().int(),
  })
  .passthrough();

export const wrappedUserSchema = z.object({ user: userSchema }).passthrough();

// ============================================================================
// Types
// ============================================================================

export type Recipient = z.infer<typeof recipientSchema>;
export type Message = z.infer<typeof messageSchema>;
export type ChatEvent = z.infer<typeof eventSchema>;
export type User = z.infer<typeof userSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export interface StreamMessageRequest {
  type: 'stream';
  to: number | string;
  topic: string;
  content: string;
}

export interface PrivateMessageRequest {
  type: 'private';
  to: number[];
  content: string;
}

export type SendMessageRequest = StreamMessageRequest | PrivateMessageRequest;

export type PresenceStatus = 'active' | 'idle';

/** Role names derived from the server's numeric role codes. */
export type RoleName = 'owner' | 'admin' | 'moderator' | 'member' | 'guest';

const ROLE_CODES: Record<number, RoleName> = {
  100: 'owner',
  200: 'admin',
  300: 'moderator',
  400: 'member',
  600: 'guest',
};

/** `undefined` for a missing or unrecognised code. */
export function roleNameFromCode(code: number | undefined): RoleName | undefined {
  if (code === undefined) return undefined;
  return ROLE_CODES[code];
}
