/**
 * @file src/services/chatClient.ts
 * @description Conversation lifecycle: setup, ask, askStream, retrieval and
 *   deletion on top of the conversation cache, the request builder and the
 *   response assembler.
 *
 * Every operation that writes a conversation holds that conversation's lock
 * for its whole read → complete → commit sequence, so concurrent calls on one
 * id are applied in lock order and calls on different ids never wait on each
 * other.
 * A failed or cancelled completion commits nothing: the user turn and the
 * assistant reply enter the history together.
 */

import type {
  AskOptions,
  ChatClient,
  ChatMessage,
  ChatMessageInput,
  ChatOptions,
  ChatResponse,
  CompletionService,
  LoadConversationOptions,
} from "@/types/index.js";
import { randomUUID } from "crypto";
import { resolveChatOptions } from "../config/index.js";
import { ConversationCache } from "../store/conversationCache.js";
import {
  CancelledError,
  describeError,
  InvalidArgumentError,
  toUpstreamError,
} from "../utils/errors.js";
import logger from "../utils/logger.js";
import { assembleResponse, assembleStream } from "./responseAssembler.js";
import { assertMessage, buildRequest } from "./requestBuilder.js";

const CONVERSATION_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const ROLES = new Set(["system", "user", "assistant"]);

/**
 * Whether `value` is a well-formed conversation id (a UUID).
 */
export function isConversationId(value: unknown): value is string {
  return typeof value === "string" && CONVERSATION_ID_PATTERN.test(value);
}

/**
 * Return `conversationId`, or a fresh id when it is omitted.
 * @throws InvalidArgumentError when a supplied id is malformed.
 */
function resolveConversationId(conversationId?: string): string {
  if (conversationId === undefined) return randomUUID();
  if (!isConversationId(conversationId)) {
    throw new InvalidArgumentError(
      "conversationId",
      `"${conversationId}" is not a valid conversation id`
    );
  }
  return conversationId;
}

export interface ChatClientDependencies {
  /** Clock used for timestamps and expiration, in ms. */
  now?: () => number;
}

/**
 * Create a conversation client.
 * @param service  Transport to the completion API.
 * @param options  Configuration; missing fields take the library defaults.
 * @param deps     Optional collaborators.
 */
export function createChatClient(
  service: CompletionService,
  options: Partial<ChatOptions> = {},
  deps: ChatClientDependencies = {}
): ChatClient {
  const config = resolveChatOptions(options);
  const cache = new ConversationCache({
    messageLimit: config.messageLimit,
    messageExpiration: config.messageExpiration,
    sweepInterval: config.sweepInterval,
    now: deps.now,
  });

  logger.debug(
    `[chatClient] Created (model=${config.defaultModel}, limit=${config.messageLimit}, throwOnError=${config.throwOnError})`
  );

  /**
   * Raise the failure, or turn it into a degraded response when
   * `throwOnError` is off.
   * Cancellation is always raised.
   */
  function handleFailure(conversationId: string, err: unknown): ChatResponse {
    const failure = toUpstreamError(err);
    if (failure instanceof CancelledError) {
      logger.debug(`[chatClient] Call on ${conversationId} cancelled`);
      throw failure;
    }
    if (config.throwOnError) {
      throw failure;
    }
    logger.warn(
      `[chatClient] Returning degraded response for ${conversationId}: ${failure.message}`
    );
    return {
      conversationId,
      role: "assistant",
      content: "",
      isPartial: false,
      error: describeError(failure),
    };
  }

  async function* streamTurn(
    conversationId: string,
    message: string,
    options: AskOptions
  ): AsyncGenerator<ChatResponse, void, undefined> {
    const { signal } = options;
    const release = await cache.acquire(conversationId, signal);
    try {
      const { request, userMessage } = buildRequest(
        cache,
        conversationId,
        message,
        config,
        options
      );
      try {
        yield* assembleStream(
          cache,
          conversationId,
          userMessage,
          service.completeStream(request, signal),
          signal
        );
      } catch (err) {
        yield handleFailure(conversationId, err);
      }
    } finally {
      release();
    }
  }

  return {
    async setup(message: string, conversationId?: string): Promise<string> {
      assertMessage(message);
      const id = resolveConversationId(conversationId);
      await cache.runExclusive(id, () =>
        cache.reset(id, {
          role: "system",
          content: message,
          timestamp: cache.timestamp(),
        })
      );
      logger.info(`🧭 Conversation ${id} set up with a system message`);
      return id;
    },

    async ask(
      message: string,
      options: AskOptions = {}
    ): Promise<ChatResponse> {
      assertMessage(message);
      const conversationId = resolveConversationId(options.conversationId);
      const { signal } = options;

      return cache.runExclusive(
        conversationId,
        async () => {
          const { request, userMessage } = buildRequest(
            cache,
            conversationId,
            message,
            config,
            options
          );
          try {
            const result = await service.complete(request, signal);
            if (signal?.aborted) {
              throw new CancelledError({ cause: signal.reason });
            }
            return assembleResponse(
              cache,
              conversationId,
              userMessage,
              result
            );
          } catch (err) {
            return handleFailure(conversationId, err);
          }
        },
        signal
      );
    },

    askStream(
      message: string,
      options: AskOptions = {}
    ): AsyncGenerator<ChatResponse, void, undefined> {
      assertMessage(message);
      const conversationId = resolveConversationId(options.conversationId);
      return streamTurn(conversationId, message, options);
    },

    async getConversation(conversationId: string): Promise<ChatMessage[]> {
      return cache.get(conversationId);
    },

    async deleteConversation(conversationId: string): Promise<void> {
      await cache.runExclusive(conversationId, () =>
        cache.delete(conversationId)
      );
    },

    async loadConversation(
      messages: ChatMessageInput[],
      options: LoadConversationOptions = {}
    ): Promise<string> {
      const id = resolveConversationId(options.conversationId);
      const replaceHistory = options.replaceHistory ?? true;
      const now = cache.timestamp();
      const imported = messages.map((m, i): ChatMessage => {
        if (!ROLES.has(m.role)) {
          throw new InvalidArgumentError(
            `messages[${i}].role`,
            `unknown role "${m.role}"`
          );
        }
        assertMessage(m.content, `messages[${i}].content`);
        return {
          role: m.role,
          content: m.content,
          timestamp: m.timestamp ?? now,
        };
      });

      await cache.runExclusive(id, () => {
        if (replaceHistory) {
          cache.replace(id, imported);
        } else {
          cache.append(id, ...imported);
        }
      });
      logger.debug(
        `[chatClient] Loaded ${imported.length} message(s) into ${id} (replace=${replaceHistory})`
      );
      return id;
    },

    async conversationExists(conversationId: string): Promise<boolean> {
      return cache.has(conversationId);
    },

    dispose(): void {
      cache.dispose();
    },
  };
}
