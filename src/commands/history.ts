/**
 * @file src/commands/history.ts
 * @description /history: print the cached messages of the current conversation.
 */
import type { SessionContext } from "./types.js";

export const data = {
  name: "history",
  description: "Show the messages kept for the current conversation",
};

export async function execute(context: SessionContext): Promise<void> {
  const messages = context.conversationId
    ? await context.client.getConversation(context.conversationId)
    : [];
  if (messages.length === 0) {
    context.write("(empty)\n");
    return;
  }
  for (const message of messages) {
    context.write(`[${message.role}] ${message.content}\n`);
  }
}
