/**
 * Role of a chat message within a conversation.
 */
export type ChatRole = "system" | "user" | "assistant";

/**
 * A single turn stored in a conversation. Never mutated once stored.
 */
export interface ChatMessage {
  /** Who produced the message. */
  readonly role: ChatRole;
  /** Text content of the message. */
  readonly content: string;
  /** Unix timestamp (in milliseconds) when the message was recorded. */
  readonly timestamp: number;
}

/**
 * A message supplied by a caller when importing a conversation; the timestamp
 * is optional.
 */
export interface ChatMessageInput {
  role: ChatRole;
  content: string;
  timestamp?: number;
}

/**
 * Cached state of one conversation.
 */
export interface ConversationEntry {
  /** Conversation identifier. */
  id: string;
  /** Messages in insertion order. */
  messages: ChatMessage[];
  /** Unix timestamp (ms) of the last read or write. */
  lastActivity: number;
}
