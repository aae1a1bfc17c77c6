import type { ChatClient } from "@/types/index.js";

/**
 * State shared by the interactive session and its commands.
 */
export interface SessionContext {
  client: ChatClient;
  /** Current conversation; a new one starts on the next message when unset. */
  conversationId?: string;
  /** Write text to the terminal as-is. */
  write(text: string): void;
  /** End the session. */
  stop(): void;
}

/**
 * Structure of a slash-command module.
 */
export interface CommandModule {
  data: {
    name: string;
    description: string;
    /** Argument synopsis shown by /help. */
    usage?: string;
  };
  execute(context: SessionContext, args: string): Promise<void>;
}
