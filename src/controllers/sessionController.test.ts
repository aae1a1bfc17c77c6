import type { ChatClient } from "@/types/index.js";
import { afterEach, describe, expect, it, type Mock, vi } from "vitest";
import type { SessionContext } from "../commands/index.js";
import { createChatClient } from "../services/chatClient.js";
import { FakeCompletionService } from "../testing/fakeCompletionService.js";
import { UpstreamError } from "../utils/errors.js";
import { handleLine, parseCommand } from "./sessionController.js";

interface Session {
  context: SessionContext;
  output: string[];
  stop: Mock;
  service: FakeCompletionService;
}

let client: ChatClient | undefined;

function startSession(throwOnError = true): Session {
  const service = new FakeCompletionService();
  client = createChatClient(service, { throwOnError });
  const output: string[] = [];
  const stop = vi.fn();
  const context: SessionContext = {
    client,
    write: (text) => {
      output.push(text);
    },
    stop,
  };
  return { context, output, stop, service };
}

afterEach(() => {
  client?.dispose();
  client = undefined;
});

describe("parseCommand", () => {
  it("splits the command name from its arguments", () => {
    expect(parseCommand("/System  be brief ")).toEqual({
      name: "system",
      args: "be brief",
    });
    expect(parseCommand("/help")).toEqual({ name: "help", args: "" });
  });

  it("returns undefined for plain text", () => {
    expect(parseCommand("hello /there")).toBeUndefined();
  });
});

describe("handleLine", () => {
  it("ignores blank lines", async () => {
    const { context, output } = startSession();
    await handleLine(context, "   ");
    expect(output).toEqual([]);
  });

  it("streams the reply and remembers the conversation", async () => {
    const { context, output } = startSession();

    await handleLine(context, "hello there");

    expect(output).toEqual(["HELLO ", "THERE", "\n"]);
    expect(context.conversationId).toBeDefined();
    const history = await context.client.getConversation(
      context.conversationId ?? ""
    );
    expect(history.map((m) => `${m.role}:${m.content}`)).toEqual([
      "user:hello there",
      "assistant:HELLO THERE",
    ]);
  });

  it("sets a system message and shows the history", async () => {
    const { context, output, service } = startSession();

    await handleLine(context, "/system be brief");
    const id = context.conversationId;
    expect(output).toEqual([`🧭 System message set (conversation ${id})\n`]);

    await handleLine(context, "hi");
    expect(service.requests[0].messages).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "hi" },
    ]);

    output.length = 0;
    await handleLine(context, "/history");
    expect(output).toEqual([
      "[system] be brief\n",
      "[user] hi\n",
      "[assistant] HI\n",
    ]);
  });

  it("asks for the system message when it is missing", async () => {
    const { context, output } = startSession();
    await handleLine(context, "/system");
    expect(output).toEqual(["⚠️ Usage: /system <message>\n"]);
    expect(context.conversationId).toBeUndefined();
  });

  it("forgets the current conversation", async () => {
    const { context, output } = startSession();
    await handleLine(context, "hi");
    const id = context.conversationId ?? "";

    output.length = 0;
    await handleLine(context, "/forget");

    expect(output).toEqual(["🗑️ Conversation deleted\n"]);
    expect(context.conversationId).toBeUndefined();
    expect(await context.client.conversationExists(id)).toBe(false);
  });

  it("starts a new conversation without deleting the old one", async () => {
    const { context, output } = startSession();
    await handleLine(context, "hi");
    const id = context.conversationId ?? "";

    await handleLine(context, "/new");
    await handleLine(context, "/history");

    expect(output.slice(-2)).toEqual(["✨ New conversation\n", "(empty)\n"]);
    expect(await context.client.conversationExists(id)).toBe(true);
  });

  it("lists the commands", async () => {
    const { context, output } = startSession();
    await handleLine(context, "/help");
    expect(output).toEqual([
      "/help: List the available commands\n",
      "/system <message>: Start the conversation over with a system message\n",
      "/history: Show the messages kept for the current conversation\n",
      "/new: Start a new conversation\n",
      "/forget: Delete the current conversation and its history\n",
      "/exit: Quit\n",
    ]);
  });

  it("reports unknown commands", async () => {
    const { context, output } = startSession();
    await handleLine(context, "/dance");
    expect(output).toEqual(["⚠️ Unknown command /dance (try /help)\n"]);
  });

  it("stops the session on /exit", async () => {
    const { context, output, stop } = startSession();
    await handleLine(context, "/exit");
    expect(output).toEqual(["👋 Bye\n"]);
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it("apologises when the completion fails", async () => {
    const { context, output, service } = startSession();
    service.failure = new UpstreamError("server", "upstream unavailable");

    await handleLine(context, "hi");

    expect(output).toEqual([
      "\n⚠️ Sorry, I couldn’t complete that request (upstream unavailable).\n",
    ]);
  });

  it("prints the error of a degraded response", async () => {
    const { context, output, service } = startSession(false);
    service.failure = new UpstreamError("rate_limit", "slow down", {
      status: 429,
    });

    await handleLine(context, "hi");

    expect(output).toEqual(["⚠️ slow down", "\n"]);
  });
});
