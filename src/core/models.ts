import { z } from 'zod';
import { ValidationError } from './errors.js';
import {
  CLIENT_TYPES,
  MESSAGE_TYPES,
  type BotPayload,
  type CanonicalMessage,
  type CanonicalResponse,
  type CommandRequest,
  type WebRequest,
} from '../types/messaging.js';

// ── Schemas ────────────────────────────────────────────────────────────────────

const requiredText = z.string().min(1);

const metadataSchema = z.record(z.unknown());

/** Accepts a Date, an ISO string or epoch milliseconds; rejects null and garbage. */
const timestampSchema = z
  .union([z.date(), z.string().min(1), z.number()])
  .pipe(z.coerce.date());

export const clientTypeSchema = z.enum(CLIENT_TYPES);
export const messageTypeSchema = z.enum(MESSAGE_TYPES);

export const canonicalMessageSchema = z.object({
  id: requiredText,
  clientType: clientTypeSchema,
  messageType: messageTypeSchema,
  content: z.string(),
  userId: requiredText,
  userName: z.string().optional(),
  timestamp: timestampSchema,
  metadata: metadataSchema.default({}),
});

export const canonicalResponseSchema = z.object({
  messageId: requiredText,
  clientType: clientTypeSchema,
  content: z.string(),
  responseType: messageTypeSchema.default('text'),
  metadata: metadataSchema.default({}),
});

export const botPayloadSchema = canonicalMessageSchema.extend({
  clientType: z.literal('telegram'),
  metadata: z
    .object({
      chatId: z.union([requiredText, z.number()]),
      messageId: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough(),
});

export const webRequestSchema = z.object({
  content: z.string(),
  userId: requiredText,
  sessionId: requiredText.optional(),
  messageType: messageTypeSchema.default('text'),
});

export const commandRequestSchema = z.object({
  command: z.string().trim().min(1),
  args: z.array(z.string()).default([]),
  userId: requiredText,
  options: metadataSchema.default({}),
});

export type CanonicalMessageInit = z.input<typeof canonicalMessageSchema>;
export type CanonicalResponseInit = z.input<typeof canonicalResponseSchema>;

// ── Helpers ────────────────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
}

// ── Constructors ───────────────────────────────────────────────────────────────

/** Validate an untrusted value and freeze it into a CanonicalMessage. */
export function parseCanonicalMessage(raw: unknown): CanonicalMessage {
  const parsed = parseWith(canonicalMessageSchema, raw, 'message');
  const message: CanonicalMessage = {
    id: parsed.id,
    clientType: parsed.clientType,
    messageType: parsed.messageType,
    content: parsed.content,
    userId: parsed.userId,
    timestamp: parsed.timestamp,
    metadata: Object.freeze({ ...parsed.metadata }),
    ...(parsed.userName !== undefined ? { userName: parsed.userName } : {}),
  };
  return Object.freeze(message);
}

export function createCanonicalMessage(init: CanonicalMessageInit): CanonicalMessage {
  return parseCanonicalMessage(init);
}

export function createCanonicalResponse(init: CanonicalResponseInit): CanonicalResponse {
  const parsed = parseWith(canonicalResponseSchema, init, 'response');
  return Object.freeze({
    messageId: parsed.messageId,
    clientType: parsed.clientType,
    content: parsed.content,
    responseType: parsed.responseType,
    metadata: Object.freeze({ ...parsed.metadata }),
  });
}

export function parseBotPayload(raw: unknown): BotPayload {
  return parseWith(botPayloadSchema, raw, 'bot payload');
}

export function parseWebRequest(raw: unknown): WebRequest {
  return parseWith(webRequestSchema, raw, 'web message');
}

export function parseCommandRequest(raw: unknown): CommandRequest {
  return parseWith(commandRequestSchema, raw, 'cli command');
}
