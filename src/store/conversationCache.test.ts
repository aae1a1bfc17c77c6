import type { ChatMessage, ChatRole } from "@/types/index.js";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConversationCache,
  type ConversationCacheOptions,
} from "./conversationCache.js";

const ID = "3f2b8c1e-5d4a-4f6b-9c7d-0e1f2a3b4c5d";

function msg(role: ChatRole, content: string, timestamp = 0): ChatMessage {
  return { role, content, timestamp };
}

function createCache(overrides: Partial<ConversationCacheOptions> = {}) {
  const clock = { now: 0 };
  const cache = new ConversationCache({
    messageLimit: 3,
    messageExpiration: 1_000,
    now: () => clock.now,
    ...overrides,
  });
  return { cache, clock };
}

const contents = (messages: ChatMessage[]) => messages.map((m) => m.content);

describe("ConversationCache", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns an empty list for unknown conversations", () => {
    const { cache } = createCache();
    expect(cache.get(ID)).toEqual([]);
    expect(cache.has(ID)).toBe(false);
  });

  it("appends messages in insertion order", () => {
    const { cache } = createCache();
    cache.append(ID, msg("user", "a"));
    cache.append(ID, msg("assistant", "A"));
    expect(contents(cache.get(ID))).toEqual(["a", "A"]);
  });

  it("hands out copies that cannot alter the stored history", () => {
    const { cache } = createCache();
    cache.append(ID, msg("user", "a"));
    const copy = cache.get(ID);
    copy.push(msg("user", "injected"));
    expect(contents(cache.get(ID))).toEqual(["a"]);
  });

  it("trims to the message limit while keeping the system message", () => {
    const { cache } = createCache();
    cache.reset(ID, msg("system", "sys"));
    cache.append(ID, msg("user", "a"), msg("assistant", "A"));
    cache.append(ID, msg("user", "b"), msg("assistant", "B"));
    expect(contents(cache.get(ID))).toEqual(["sys", "b", "B"]);
  });

  it("reset replaces any existing history with the system message", () => {
    const { cache } = createCache();
    cache.append(ID, msg("user", "a"));
    cache.reset(ID, msg("system", "sys"));
    cache.reset(ID, msg("system", "sys"));
    expect(cache.get(ID)).toEqual([msg("system", "sys")]);
  });

  it("replace stores a trimmed copy of the given history", () => {
    const { cache } = createCache();
    cache.append(ID, msg("user", "old"));
    cache.replace(ID, [
      msg("system", "sys"),
      msg("user", "a"),
      msg("user", "b"),
      msg("user", "c"),
    ]);
    expect(contents(cache.get(ID))).toEqual(["sys", "b", "c"]);
  });

  it("delete removes the conversation and ignores unknown ids", () => {
    const { cache } = createCache();
    cache.append(ID, msg("user", "a"));
    cache.delete(ID);
    cache.delete(ID);
    expect(cache.get(ID)).toEqual([]);
    expect(cache.size).toBe(0);
  });

  it("treats idle conversations as absent once the expiration window has passed", () => {
    const { cache, clock } = createCache();
    cache.append(ID, msg("user", "a"));

    clock.now = 1_000;
    expect(cache.has(ID)).toBe(true);

    clock.now = 2_001;
    expect(cache.get(ID)).toEqual([]);
    expect(cache.size).toBe(0);
  });

  it("refreshes activity on every read", () => {
    const { cache, clock } = createCache();
    cache.append(ID, msg("user", "a"));

    clock.now = 800;
    expect(contents(cache.get(ID))).toEqual(["a"]);
    clock.now = 1_600;
    expect(contents(cache.get(ID))).toEqual(["a"]);
  });

  it("starts a fresh history when appending to an expired conversation", () => {
    const { cache, clock } = createCache();
    cache.append(ID, msg("user", "a"));
    clock.now = 5_000;
    cache.append(ID, msg("user", "b"));
    expect(contents(cache.get(ID))).toEqual(["b"]);
  });

  it("sweep purges only expired entries", () => {
    const { cache, clock } = createCache();
    const other = "9a8b7c6d-5e4f-4a3b-8c2d-1e0f9a8b7c6d";
    cache.append(ID, msg("user", "a"));
    clock.now = 900;
    cache.append(other, msg("user", "b"));

    clock.now = 1_500;
    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(contents(cache.get(other))).toEqual(["b"]);
  });

  it("runs the sweep on a timer when an interval is configured", () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const cache = new ConversationCache({
      messageLimit: 3,
      messageExpiration: 500,
      sweepInterval: 1_000,
    });
    cache.append(ID, msg("user", "a"));

    vi.advanceTimersByTime(1_000);
    expect(cache.size).toBe(0);
    cache.dispose();
  });

  it("resets an entry to its system messages when trimming breaks the limit", () => {
    const { cache } = createCache({
      messageLimit: 2,
      trim: (messages) => [...messages],
    });
    cache.append(ID, msg("system", "sys"), msg("user", "a"), msg("user", "b"));
    expect(contents(cache.get(ID))).toEqual(["sys"]);
  });
});
