/**
 * @file src/commands/exit.ts
 * @description /exit: end the interactive session.
 */
import type { SessionContext } from "./types.js";

export const data = {
  name: "exit",
  description: "Quit",
};

export async function execute(context: SessionContext): Promise<void> {
  context.write("👋 Bye\n");
  context.stop();
}
