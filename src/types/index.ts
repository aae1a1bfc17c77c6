/**
 * @file src/types/index.ts
 * @description Central type definitions for messages, requests, responses
 *   and options.
 */

export type {
  ChatMessage,
  ChatMessageInput,
  ChatRole,
  ConversationEntry,
} from "./chat.js";
export type {
  ChatParameters,
  ChatRequest,
  ChatUsage,
  CompletionChunk,
  CompletionResult,
  CompletionService,
  UpstreamErrorKind,
} from "./completion.js";
export type { ChatOptions } from "./options.js";
export type {
  AskOptions,
  ChatClient,
  ChatErrorInfo,
  ChatResponse,
  LoadConversationOptions,
} from "./response.js";
