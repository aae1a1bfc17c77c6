/**
 * @file src/index.ts
 * @description Public entry point: multi-turn conversations over a stateless
 *   chat-completion API, with an in-memory, bounded, expiring history per
 *   conversation.
 */

export {
  defaultChatOptions,
  loadChatOptions,
  parseDuration,
  resolveChatOptions,
} from "./config/index.js";
export { ChatModels, type ChatModel } from "./config/models.js";
export {
  createChatClient,
  isConversationId,
  type ChatClientDependencies,
} from "./services/chatClient.js";
export { OpenAICompletionService } from "./services/openaiCompletionService.js";
export { mergeParameters } from "./services/requestBuilder.js";
export {
  ConversationCache,
  type ConversationCacheOptions,
} from "./store/conversationCache.js";
export {
  CacheStateError,
  CancelledError,
  ChatError,
  InvalidArgumentError,
  UpstreamError,
} from "./utils/errors.js";
export { trimHistory } from "./utils/trimHistory.js";
export type * from "./types/index.js";
