/**
 * @file src/commands/index.ts
 * @description Registry of slash commands available in the interactive
 *   session, by name.
 */
import * as exit from "./exit.js";
import * as forget from "./forget.js";
import * as help from "./help.js";
import * as history from "./history.js";
import * as newConversation from "./new.js";
import * as system from "./system.js";
import type { CommandModule } from "./types.js";

const modules: CommandModule[] = [
  help,
  system,
  history,
  newConversation,
  forget,
  exit,
];

export const commands = new Map<string, CommandModule>(
  modules.map((mod) => [mod.data.name, mod])
);

export type { CommandModule, SessionContext } from "./types.js";
