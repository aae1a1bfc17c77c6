/**
 * @file src/services/responseAssembler.ts
 * @description Turns completion results into `ChatResponse` objects and
 *   commits the finished turn (user message + assistant reply) to the
 *   conversation cache.
 *
 * Single-shot results are committed immediately. Streams are re-emitted delta
 * by delta while the fragments accumulate; the assembled reply is committed
 * exactly once, when the end-of-stream marker arrives, and a closing response
 * then carries the finish reason and usage. A stream that fails, is cancelled
 * or stops without the marker commits nothing.
 */

import type {
  ChatMessage,
  ChatResponse,
  ChatUsage,
  CompletionChunk,
  CompletionResult,
} from "@/types/index.js";
import { ConversationCache } from "../store/conversationCache.js";
import {
  CancelledError,
  toUpstreamError,
  UpstreamError,
} from "../utils/errors.js";
import logger from "../utils/logger.js";

function logUsage(usage: ChatUsage | undefined): void {
  if (!usage) return;
  logger.info(
    `📝 Prompt tokens: ${usage.promptTokens}, completion tokens: ${usage.completionTokens}`
  );
}

/**
 * Commit a single-shot completion and build its response.
 * @param cache          Cache that receives the turn.
 * @param conversationId Conversation the turn belongs to.
 * @param userMessage    User turn the completion answers.
 * @param result         Completion returned by the service.
 */
export function assembleResponse(
  cache: ConversationCache,
  conversationId: string,
  userMessage: ChatMessage,
  result: CompletionResult
): ChatResponse {
  const assistantMessage: ChatMessage = {
    role: "assistant",
    content: result.content,
    timestamp: cache.timestamp(),
  };
  cache.append(conversationId, userMessage, assistantMessage);

  logger.debug(
    `[responseAssembler] Committed reply for ${conversationId} (length=${result.content.length})`
  );
  logUsage(result.usage);

  return {
    conversationId,
    role: "assistant",
    content: result.content,
    model: result.model,
    finishReason: result.finishReason,
    usage: result.usage,
    isPartial: false,
  };
}

/**
 * Re-emit a streamed completion as partial responses and commit the assembled
 * reply. After the commit, one last response with empty `content` and
 * `isPartial: false` carries the finish reason and usage of the stream.
 * @throws UpstreamError when the stream fails or ends without its end marker.
 * @throws CancelledError when `signal` fires mid-stream.
 */
export async function* assembleStream(
  cache: ConversationCache,
  conversationId: string,
  userMessage: ChatMessage,
  chunks: AsyncIterable<CompletionChunk>,
  signal?: AbortSignal
): AsyncGenerator<ChatResponse, void, undefined> {
  const buffer: string[] = [];
  let model: string | undefined;
  let completed = false;

  try {
    for await (const chunk of chunks) {
      if (signal?.aborted) throw new CancelledError({ cause: signal.reason });

      if (chunk.type === "end") {
        cache.append(conversationId, userMessage, {
          role: "assistant",
          content: buffer.join(""),
          timestamp: cache.timestamp(),
        });
        completed = true;
        logger.debug(
          `[responseAssembler] Stream for ${conversationId} finished (${buffer.length} delta(s), finishReason=${chunk.finishReason ?? "?"})`
        );
        logUsage(chunk.usage);

        yield {
          conversationId,
          role: "assistant",
          content: "",
          model,
          finishReason: chunk.finishReason,
          usage: chunk.usage,
          isPartial: false,
        };
        break;
      }

      model = chunk.model ?? model;
      buffer.push(chunk.content);
      yield {
        conversationId,
        role: "assistant",
        content: chunk.content,
        model,
        isPartial: true,
      };
    }
  } catch (err) {
    throw toUpstreamError(err);
  } finally {
    if (!completed && buffer.length > 0) {
      logger.debug(
        `[responseAssembler] Discarding ${buffer.length} uncommitted delta(s) for ${conversationId}`
      );
    }
  }

  if (!completed) {
    throw new UpstreamError(
      "network",
      "The response stream ended before completion"
    );
  }
}
