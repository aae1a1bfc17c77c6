/**
 * @file src/services/openaiCompletionService.ts
 * @description `CompletionService` backed by the official OpenAI SDK. Converts
 *   between the library's camelCase request model and the chat completions
 *   wire format, and translates SDK failures into `UpstreamError` /
 *   `CancelledError`.
 */

import type {
  ChatOptions,
  ChatParameters,
  ChatRequest,
  ChatUsage,
  CompletionChunk,
  CompletionResult,
  CompletionService,
} from "@/types/index.js";
import OpenAI, { type ClientOptions } from "openai";
import type { CompletionUsage } from "openai/resources/completions";
import type { ChatCompletionMessageParam } from "openai/resources/chat/index";
import {
  InvalidArgumentError,
  toUpstreamError,
  UpstreamError,
} from "../utils/errors.js";
import logger from "../utils/logger.js";

/**
 * Sampling fields of a chat completions request, in wire naming.
 */
export interface WireParameters {
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  stop?: string[];
  user?: string;
}

export function toWireParameters(parameters: ChatParameters): WireParameters {
  const wire: WireParameters = {};
  if (parameters.temperature !== undefined) {
    wire.temperature = parameters.temperature;
  }
  if (parameters.topP !== undefined) wire.top_p = parameters.topP;
  if (parameters.maxTokens !== undefined) {
    wire.max_tokens = parameters.maxTokens;
  }
  if (parameters.presencePenalty !== undefined) {
    wire.presence_penalty = parameters.presencePenalty;
  }
  if (parameters.frequencyPenalty !== undefined) {
    wire.frequency_penalty = parameters.frequencyPenalty;
  }
  if (parameters.stop !== undefined) wire.stop = parameters.stop;
  if (parameters.user !== undefined) wire.user = parameters.user;
  return wire;
}

export function toMessageParams(
  messages: ChatRequest["messages"]
): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "user":
        return { role: "user", content: m.content };
      case "assistant":
        return { role: "assistant", content: m.content };
    }
  });
}

function toUsage(
  usage: CompletionUsage | null | undefined
): ChatUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

export class OpenAICompletionService implements CompletionService {
  private readonly client: OpenAI;

  /**
   * @param clientOrOptions An initialised OpenAI client, or options to create
   *   one.
   */
  constructor(clientOrOptions: OpenAI | ClientOptions) {
    this.client =
      clientOrOptions instanceof OpenAI
        ? clientOrOptions
        : new OpenAI(clientOrOptions);
  }

  /**
   * Create the service from a configuration snapshot.
   * @throws InvalidArgumentError when no API key is configured.
   */
  static fromOptions(
    options: Pick<ChatOptions, "apiKey" | "organization" | "baseURL">
  ): OpenAICompletionService {
    if (!options.apiKey) {
      throw new InvalidArgumentError(
        "apiKey",
        "an OpenAI API key is required"
      );
    }
    return new OpenAICompletionService({
      apiKey: options.apiKey,
      organization: options.organization,
      baseURL: options.baseURL,
    });
  }

  async complete(
    request: ChatRequest,
    signal?: AbortSignal
  ): Promise<CompletionResult> {
    logger.debug(
      `[openai] chat.completions.create model=${request.model}, messages=${request.messages.length}`
    );
    try {
      const res = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: toMessageParams(request.messages),
          ...toWireParameters(request.parameters),
          stream: false,
        },
        { signal }
      );

      const choice = res.choices[0];
      return {
        content: choice?.message.content ?? "",
        model: res.model,
        finishReason: choice?.finish_reason,
        usage: toUsage(res.usage),
      };
    } catch (err: unknown) {
      const translated = toUpstreamError(err);
      logger.error(`[openai] Completion failed: ${translated.message}`);
      throw translated;
    }
  }

  /**
   * Stream a completion as content deltas followed by one `end` marker.
   * The marker is only emitted once a choice has reported its finish reason;
   * a stream that closes before that fails with a `network` UpstreamError.
   */
  async *completeStream(
    request: ChatRequest,
    signal?: AbortSignal
  ): AsyncGenerator<CompletionChunk, void, undefined> {
    logger.debug(
      `[openai] chat.completions.create (stream) model=${request.model}, messages=${request.messages.length}`
    );
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: toMessageParams(request.messages),
          ...toWireParameters(request.parameters),
          stream: true,
          stream_options: { include_usage: true },
        },
        { signal }
      );

      let finishReason: string | undefined;
      let usage: ChatUsage | undefined;
      for await (const chunk of stream) {
        usage = toUsage(chunk.usage) ?? usage;
        const choice = chunk.choices[0];
        if (!choice) continue;
        if (choice.finish_reason) finishReason = choice.finish_reason;
        // The first chunk only carries the role
        const content = choice.delta.content;
        if (content) {
          yield { type: "delta", content, model: chunk.model };
        }
      }

      // The SDK ends iteration quietly when the connection closes early
      if (finishReason === undefined) {
        throw new UpstreamError(
          "network",
          "The response stream ended before completion"
        );
      }
      yield { type: "end", finishReason, usage };
    } catch (err: unknown) {
      const translated = toUpstreamError(err);
      logger.error(
        `[openai] Streaming completion failed: ${translated.message}`
      );
      throw translated;
    }
  }
}
