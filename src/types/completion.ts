import type { ChatRole } from "./chat.js";

/**
 * Generation knobs sent along with a request. Every field is optional so that
 * per-call overrides can be merged field by field over the defaults.
 */
export interface ChatParameters {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
  stop?: string[];
  /** End-user identifier forwarded to the provider. */
  user?: string;
}

/**
 * Outgoing payload for the completion service.
 */
export interface ChatRequest {
  model: string;
  messages: Array<{ role: ChatRole; content: string }>;
  parameters: ChatParameters;
}

export interface ChatUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Result of a single-shot completion.
 */
export interface CompletionResult {
  content: string;
  model: string;
  finishReason?: string;
  usage?: ChatUsage;
}

/**
 * One item of a streamed completion: either a content fragment or the
 * end-of-stream marker.
 */
export type CompletionChunk =
  | { type: "delta"; content: string; model?: string }
  | { type: "end"; finishReason?: string; usage?: ChatUsage };

/**
 * Failure categories reported by the completion service.
 */
export type UpstreamErrorKind =
  | "network"
  | "auth"
  | "rate_limit"
  | "server"
  | "bad_request"
  | "unknown";

/**
 * Transport to the chat-completion API.
 */
export interface CompletionService {
  complete(
    request: ChatRequest,
    signal?: AbortSignal
  ): Promise<CompletionResult>;
  completeStream(
    request: ChatRequest,
    signal?: AbortSignal
  ): AsyncIterable<CompletionChunk>;
}
