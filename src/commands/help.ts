/**
 * @file src/commands/help.ts
 * @description /help: list the available commands.
 */
import { commands } from "./index.js";
import type { SessionContext } from "./types.js";

export const data = {
  name: "help",
  description: "List the available commands",
};

export async function execute(context: SessionContext): Promise<void> {
  for (const command of commands.values()) {
    const usage = command.data.usage ? ` ${command.data.usage}` : "";
    context.write(
      `/${command.data.name}${usage}: ${command.data.description}\n`
    );
  }
}
