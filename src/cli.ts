#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Interactive terminal chat on top of the conversation client.
 * @remarks
 *   Reads OpenAI credentials and cache settings from the environment (see
 *   `.env.example`), streams every answer, and keeps history for the lifetime
 *   of the process.
 */

import readline from "readline/promises";
import { loadChatOptions } from "./config/index.js";
import type { SessionContext } from "./commands/index.js";
import { handleLine } from "./controllers/sessionController.js";
import { createChatClient } from "./services/chatClient.js";
import { OpenAICompletionService } from "./services/openaiCompletionService.js";
import logger from "./utils/logger.js";

async function main(): Promise<void> {
  const options = loadChatOptions();
  const client = createChatClient(
    OpenAICompletionService.fromOptions(options),
    options
  );
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let running = true;
  const context: SessionContext = {
    client,
    write: (text) => {
      process.stdout.write(text);
    },
    stop: () => {
      running = false;
    },
  };

  logger.info(
    `🚀 Chat ready (model=${options.defaultModel}); type /help for commands`
  );
  rl.on("SIGINT", () => {
    context.stop();
    rl.close();
  });

  try {
    while (running) {
      const line = await rl.question("> ");
      await handleLine(context, line);
    }
  } catch (err) {
    // question() rejects once the interface is closed (Ctrl+D / Ctrl+C)
    logger.debug("[cli] Input closed:", err);
  } finally {
    rl.close();
    client.dispose();
  }
}

main().catch((err: unknown) => {
  logger.error("❌ Fatal error:", err);
  process.exitCode = 1;
});
