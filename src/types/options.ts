import type { ChatParameters } from "./completion.js";

/**
 * Immutable configuration snapshot read at construction time.
 */
export interface ChatOptions {
  apiKey?: string;
  organization?: string;
  baseURL?: string;
  /** Model used when a call does not name one. */
  defaultModel: string;
  /** Maximum messages kept per conversation, system messages included. */
  messageLimit: number;
  /** Idle time (ms) after which a conversation is treated as absent. */
  messageExpiration: number;
  /**
   * Period (ms) of the background expiration sweep; lazy expiration only when
   * unset.
   */
  sweepInterval?: number;
  /** Raise upstream failures (true) or return a degraded response (false). */
  throwOnError: boolean;
  defaultParameters: ChatParameters;
}
