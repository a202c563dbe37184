// ── Enumerations ───────────────────────────────────────────────────────────────

/** Client surfaces served by the gateway. `telegram` is the chat-bot protocol. */
export const CLIENT_TYPES = ['telegram', 'web', 'cli'] as const;
export type ClientType = (typeof CLIENT_TYPES)[number];

export const MESSAGE_TYPES = ['text', 'command', 'file', 'image', 'audio', 'video'] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export type MessageMetadata = Record<string, unknown>;

// ── Canonical Model ────────────────────────────────────────────────────────────

/** A normalized inbound message from any supported client surface. */
export interface CanonicalMessage {
  readonly id: string;
  readonly clientType: ClientType;
  readonly messageType: MessageType;
  readonly content: string;
  readonly userId: string;
  readonly userName?: string;
  readonly timestamp: Date;
  /** Opaque to the core; passed through to the response generator. */
  readonly metadata: Readonly<MessageMetadata>;
}

/** Exactly one of these is produced for every processed CanonicalMessage. */
export interface CanonicalResponse {
  readonly messageId: string;
  readonly clientType: ClientType;
  readonly content: string;
  readonly responseType: MessageType;
  readonly metadata: Readonly<MessageMetadata>;
}

// ── Bookkeeping ────────────────────────────────────────────────────────────────

export interface AdapterStatus {
  isHealthy: boolean;
  lastActivity: Date | null;
  errorCount: number;
  messageCount: number;
}

export interface AdapterHealth {
  healthy: boolean;
  lastActivity: string | null;
  messageCount: number;
  errorCount: number;
  [extra: string]: unknown;
}

export interface GatewayStatsSnapshot {
  readonly totalMessages: number;
  readonly messagesByClientType: Readonly<Record<ClientType, number>>;
  readonly errors: number;
  readonly startTime: string;
  readonly uptimeSeconds: number;
  readonly activeSessions: number;
}

/** Anything that can report how many client sessions are currently live. */
export interface SessionSource {
  readonly activeSessionCount: number;
}

export interface SessionRecord {
  userId: string;
  createdAt: Date;
  lastActivity: Date;
}

export interface CommandHistoryEntry {
  command: string;
  args: string[];
  timestamp: Date;
  userId: string;
}

// ── Inbound protocol shapes ────────────────────────────────────────────────────

/** Payload produced by the bot transport for every chat update. */
export interface BotPayload {
  id: string;
  timestamp: Date;
  clientType: 'telegram';
  messageType: MessageType;
  content: string;
  userId: string;
  userName?: string;
  metadata: MessageMetadata & { chatId: string | number; messageId?: string | number };
}

export interface WebRequest {
  content: string;
  userId: string;
  sessionId?: string;
  messageType: MessageType;
}

export interface CommandRequest {
  command: string;
  args: string[];
  userId: string;
  options: Record<string, unknown>;
}

// ── Outbound protocol shapes ───────────────────────────────────────────────────

export type BotReply =
  | { success: true; messageId: string; chatId: string | number | null; text: string }
  | { success: false; messageId: string; chatId: string | number | null; text: string; error: string; errorKind: string };

export type WebReply =
  | { success: true; response: { content: string; type: MessageType; timestamp: string } }
  | { success: false; error: string; errorKind: string };

export type CliReply =
  | { success: true; output: string; command?: string; timestamp?: string }
  | { success: false; error: string; errorKind: string };

/** Unified reply handed back to the transport layer by the dispatch router. */
export interface RouterReply {
  status: 'ok' | 'error';
  messageId: string;
  response: string;
  errorKind?: string;
}

// ── Collaborators ──────────────────────────────────────────────────────────────

/**
 * Produces reply content for messages that are not handled by a built-in.
 * May reject; the processor converts the rejection into an error response.
 */
export interface ResponseGenerator {
  generate(message: CanonicalMessage): Promise<string>;
}
