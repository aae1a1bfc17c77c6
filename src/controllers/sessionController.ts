/**
 * @file src/controllers/sessionController.ts
 * @description Handles one line of terminal input: dispatches slash
 *   commands, otherwise streams the assistant's answer for the current
 *   conversation.
 */

import { commands, type SessionContext } from "../commands/index.js";
import { ChatError } from "../utils/errors.js";
import logger from "../utils/logger.js";

/**
 * Split "/name rest of line" into its command name and argument text.
 */
export function parseCommand(
  line: string
): { name: string; args: string } | undefined {
  const match = /^\/(\S+)\s*(.*)$/s.exec(line.trim());
  if (!match) return undefined;
  return { name: match[1].toLowerCase(), args: match[2].trim() };
}

/**
 * @param context Session state.
 * @param line    Raw input line.
 */
export async function handleLine(
  context: SessionContext,
  line: string
): Promise<void> {
  const text = line.trim();
  if (!text) return;

  const command = parseCommand(text);
  if (command) {
    const mod = commands.get(command.name);
    if (!mod) {
      context.write(`⚠️ Unknown command /${command.name} (try /help)\n`);
      return;
    }
    logger.debug(`[sessionController] Running /${command.name}`);
    await mod.execute(context, command.args);
    return;
  }

  try {
    for await (const part of context.client.askStream(text, {
      conversationId: context.conversationId,
    })) {
      context.conversationId = part.conversationId;
      if (part.error) {
        context.write(`⚠️ ${part.error.message}`);
        continue;
      }
      // The closing part of a stream only carries metadata
      if (part.content) context.write(part.content);
    }
    context.write("\n");
  } catch (err) {
    logger.error("[sessionController] Error in reply workflow:", err);
    const reason = err instanceof ChatError ? err.message : "unexpected error";
    context.write(
      `\n⚠️ Sorry, I couldn’t complete that request (${reason}).\n`
    );
  }
}
