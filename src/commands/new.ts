/**
 * @file src/commands/new.ts
 * @description /new: leave the current conversation in the cache and start
 *   another.
 */
import type { SessionContext } from "./types.js";

export const data = {
  name: "new",
  description: "Start a new conversation",
};

export async function execute(context: SessionContext): Promise<void> {
  context.conversationId = undefined;
  context.write("✨ New conversation\n");
}
