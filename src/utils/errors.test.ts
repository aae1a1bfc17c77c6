import { describe, expect, it } from "vitest";
import {
  CancelledError,
  ChatError,
  describeError,
  InvalidArgumentError,
  kindFromStatus,
  toUpstreamError,
  UpstreamError,
} from "./errors.js";

describe("kindFromStatus", () => {
  it.each([
    [401, "auth"],
    [403, "auth"],
    [429, "rate_limit"],
    [500, "server"],
    [502, "server"],
    [404, "bad_request"],
    [302, "unknown"],
    [undefined, "unknown"],
  ])("maps %s to %s", (status, kind) => {
    expect(kindFromStatus(status)).toBe(kind);
  });
});

describe("toUpstreamError", () => {
  it("returns upstream and cancellation errors unchanged", () => {
    const upstream = new UpstreamError("server", "boom");
    const cancelled = new CancelledError();
    expect(toUpstreamError(upstream)).toBe(upstream);
    expect(toUpstreamError(cancelled)).toBe(cancelled);
  });

  it("treats an AbortError as a cancellation", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";
    const translated = toUpstreamError(abort);
    expect(translated).toBeInstanceOf(CancelledError);
    expect(translated.cause).toBe(abort);
  });

  it("wraps anything else as an unknown failure", () => {
    const translated = toUpstreamError(new Error("socket hang up"));
    expect(translated).toBeInstanceOf(UpstreamError);
    expect(translated).toHaveProperty("kind", "unknown");
    expect(translated.message).toBe("socket hang up");

    expect(toUpstreamError("plain text").message).toBe("plain text");
  });
});

describe("describeError", () => {
  it("includes the status only when there is one", () => {
    expect(describeError(new UpstreamError("network", "offline"))).toEqual({
      kind: "network",
      message: "offline",
    });
    const limited = new UpstreamError("rate_limit", "slow down", {
      status: 429,
    });
    expect(describeError(limited)).toEqual({
      kind: "rate_limit",
      message: "slow down",
      status: 429,
    });
  });
});

describe("error classes", () => {
  it("share the ChatError base and carry a code", () => {
    const error = new InvalidArgumentError("message", "must not be empty");
    expect(error).toBeInstanceOf(ChatError);
    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(error.message).toBe('Invalid argument "message": must not be empty');
    expect(new CancelledError().code).toBe("CANCELLED");
  });
});
