/**
 * @file src/commands/system.ts
 * @description /system: (re)start the current conversation with a system
 *   message.
 */
import logger from "../utils/logger.js";
import type { SessionContext } from "./types.js";

export const data = {
  name: "system",
  description: "Start the conversation over with a system message",
  usage: "<message>",
};

export async function execute(
  context: SessionContext,
  args: string
): Promise<void> {
  if (!args) {
    context.write("⚠️ Usage: /system <message>\n");
    return;
  }
  context.conversationId = await context.client.setup(
    args,
    context.conversationId
  );
  logger.debug(`[system] Conversation ${context.conversationId} set up`);
  context.write(
    `🧭 System message set (conversation ${context.conversationId})\n`
  );
}
