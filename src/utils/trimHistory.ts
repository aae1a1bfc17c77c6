import type { ChatMessage } from "@/types/index.js";
import logger from "./logger.js";

/**
 * Trim a conversation so it holds at most `limit` messages.
 * The oldest non-system messages are discarded first; system messages are
 * always kept, so when there are `limit` or more of them the result holds the
 * system messages alone and may exceed `limit`.
 * @param messages – Conversation messages in chronological (oldest-first) order.
 * @param limit – Maximum number of messages, system messages included.
 * @returns A **new** array; the input is left untouched.
 */
export function trimHistory(
  messages: readonly ChatMessage[],
  limit: number
): ChatMessage[] {
  const excess = messages.length - limit;
  if (excess <= 0) return [...messages];

  let toDrop = excess;
  const out: ChatMessage[] = [];
  for (const message of messages) {
    if (toDrop > 0 && message.role !== "system") {
      toDrop--;
      continue;
    }
    out.push(message);
  }

  logger.debug(
    `[trimHistory] Trimmed ${excess - toDrop} message(s): count=${messages.length} → ${out.length}, limit=${limit}`
  );
  return out;
}

/**
 * Whether `messages` satisfies the bound `trimHistory` enforces.
 */
export function isWithinLimit(
  messages: readonly ChatMessage[],
  limit: number
): boolean {
  const systemCount = messages.filter((m) => m.role === "system").length;
  return messages.length <= Math.max(limit, systemCount);
}
