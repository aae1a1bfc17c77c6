/**
 * @file src/commands/forget.ts
 * @description /forget: delete the current conversation from the cache.
 */
import type { SessionContext } from "./types.js";

export const data = {
  name: "forget",
  description: "Delete the current conversation and its history",
};

export async function execute(context: SessionContext): Promise<void> {
  if (context.conversationId) {
    await context.client.deleteConversation(context.conversationId);
  }
  context.conversationId = undefined;
  context.write("🗑️ Conversation deleted\n");
}
