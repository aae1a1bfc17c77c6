import type { ChatMessage, ChatMessageInput } from "./chat.js";
import type {
  ChatParameters,
  ChatUsage,
  UpstreamErrorKind,
} from "./completion.js";

/**
 * Error details attached to a degraded response when `throwOnError` is off.
 */
export interface ChatErrorInfo {
  kind: UpstreamErrorKind;
  message: string;
  status?: number;
}

/**
 * Response handed back by `ask`, or yielded by `askStream`: once per delta,
 * then a closing response with the finish reason and usage.
 */
export interface ChatResponse {
  conversationId: string;
  role: "assistant";
  /**
   * Full reply for `ask`; the fragment for a streamed delta; empty on the
   * closing response of a stream.
   */
  content: string;
  model?: string;
  finishReason?: string;
  usage?: ChatUsage;
  /** True for streamed deltas. */
  isPartial: boolean;
  /** Set only on degraded responses. */
  error?: ChatErrorInfo;
}

export interface AskOptions {
  /** Conversation to continue; a new one is started when omitted. */
  conversationId?: string;
  /** Overrides merged field by field over the default parameters. */
  parameters?: ChatParameters;
  /** Model to use instead of the default one. */
  model?: string;
  signal?: AbortSignal;
}

export interface LoadConversationOptions {
  conversationId?: string;
  /** Replace the existing history (default) or append to it. */
  replaceHistory?: boolean;
}

/**
 * Caller-facing conversation API.
 */
export interface ChatClient {
  setup(message: string, conversationId?: string): Promise<string>;
  ask(message: string, options?: AskOptions): Promise<ChatResponse>;
  askStream(
    message: string,
    options?: AskOptions
  ): AsyncGenerator<ChatResponse, void, undefined>;
  getConversation(conversationId: string): Promise<ChatMessage[]>;
  deleteConversation(conversationId: string): Promise<void>;
  loadConversation(
    messages: ChatMessageInput[],
    options?: LoadConversationOptions
  ): Promise<string>;
  conversationExists(conversationId: string): Promise<boolean>;
  dispose(): void;
}
