/**
 * @file src/services/requestBuilder.ts
 * @description Assembles the outgoing completion request from the cached
 *   history, the new user turn, and the merged generation parameters.
 *
 *   The cache is only read here; the user turn is committed together with the
 *   assistant reply once the completion succeeds.
 */

import type {
  ChatMessage,
  ChatOptions,
  ChatParameters,
  ChatRequest,
} from "@/types/index.js";
import { stripUndefined } from "../config/index.js";
import { ConversationCache } from "../store/conversationCache.js";
import { InvalidArgumentError } from "../utils/errors.js";
import logger from "../utils/logger.js";

export interface BuiltRequest {
  request: ChatRequest;
  /** The user turn to commit once the reply arrives. */
  userMessage: ChatMessage;
}

/**
 * Merge per-call overrides over the defaults; a field left unset in
 * `overrides` keeps its default.
 */
export function mergeParameters(
  defaults: ChatParameters,
  overrides?: ChatParameters
): ChatParameters {
  return {
    ...stripUndefined(defaults),
    ...stripUndefined(overrides ?? {}),
  };
}

/**
 * Reject empty or whitespace-only message text.
 * @throws InvalidArgumentError
 */
export function assertMessage(
  message: unknown,
  argument = "message"
): asserts message is string {
  if (typeof message !== "string" || message.trim() === "") {
    throw new InvalidArgumentError(argument, "message text must not be empty");
  }
}

/**
 * Build the request for a new user turn in `conversationId`.
 * @param cache          Conversation cache to read the history from.
 * @param conversationId Conversation the turn belongs to.
 * @param message        User message text.
 * @param options        Client configuration (default model and parameters).
 * @param overrides      Optional per-call parameters and model.
 */
export function buildRequest(
  cache: ConversationCache,
  conversationId: string,
  message: string,
  options: Pick<ChatOptions, "defaultModel" | "defaultParameters">,
  overrides: { parameters?: ChatParameters; model?: string } = {}
): BuiltRequest {
  assertMessage(message);

  const history = cache.get(conversationId);
  const userMessage: ChatMessage = {
    role: "user",
    content: message,
    timestamp: cache.timestamp(),
  };
  const model = overrides.model?.trim()
    ? overrides.model
    : options.defaultModel;

  const request: ChatRequest = {
    model,
    messages: [...history, userMessage].map(({ role, content }) => ({
      role,
      content,
    })),
    parameters: mergeParameters(
      options.defaultParameters,
      overrides.parameters
    ),
  };

  logger.debug(
    `[requestBuilder] Built request for ${conversationId}: model=${model}, messages=${request.messages.length}`
  );
  return { request, userMessage };
}
