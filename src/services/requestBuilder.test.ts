import { describe, expect, it } from "vitest";
import { ConversationCache } from "../store/conversationCache.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { buildRequest, mergeParameters } from "./requestBuilder.js";

const ID = "3f2b8c1e-5d4a-4f6b-9c7d-0e1f2a3b4c5d";

function createCache() {
  return new ConversationCache({
    messageLimit: 10,
    messageExpiration: 60_000,
    now: () => 42,
  });
}

const defaults = {
  defaultModel: "gpt-3.5-turbo",
  defaultParameters: { temperature: 0.5, maxTokens: 100 },
};

describe("mergeParameters", () => {
  it("lets overrides win field by field", () => {
    expect(
      mergeParameters(
        { temperature: 0.5, maxTokens: 100 },
        { temperature: 0.9, topP: 0.8 }
      )
    ).toEqual({
      temperature: 0.9,
      maxTokens: 100,
      topP: 0.8,
    });
  });

  it("keeps defaults for fields an override leaves undefined", () => {
    expect(
      mergeParameters({ temperature: 0.5 }, { temperature: undefined })
    ).toEqual({ temperature: 0.5 });
  });

  it("returns the defaults when there is no override", () => {
    expect(mergeParameters({ maxTokens: 64 })).toEqual({ maxTokens: 64 });
  });
});

describe("buildRequest", () => {
  it("places the new user message after the cached history", () => {
    const cache = createCache();
    cache.reset(ID, { role: "system", content: "sys", timestamp: 1 });
    cache.append(
      ID,
      { role: "user", content: "a", timestamp: 2 },
      { role: "assistant", content: "A", timestamp: 3 }
    );

    const { request, userMessage } = buildRequest(cache, ID, "b", defaults);

    expect(request.messages).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "a" },
      { role: "assistant", content: "A" },
      { role: "user", content: "b" },
    ]);
    expect(userMessage).toEqual({ role: "user", content: "b", timestamp: 42 });
  });

  it("does not write the user message to the cache", () => {
    const cache = createCache();
    buildRequest(cache, ID, "hello", defaults);
    expect(cache.get(ID)).toEqual([]);
  });

  it("uses the default model and parameters when nothing is overridden", () => {
    const { request } = buildRequest(createCache(), ID, "hello", defaults);
    expect(request.model).toBe("gpt-3.5-turbo");
    expect(request.parameters).toEqual({ temperature: 0.5, maxTokens: 100 });
  });

  it("applies the per-call model and parameter overrides", () => {
    const { request } = buildRequest(createCache(), ID, "hello", defaults, {
      model: "gpt-4",
      parameters: { temperature: 1 },
    });
    expect(request.model).toBe("gpt-4");
    expect(request.parameters).toEqual({ temperature: 1, maxTokens: 100 });
  });

  it.each(["", "   "])("rejects the message %j", (message) => {
    expect(() => buildRequest(createCache(), ID, message, defaults)).toThrow(
      InvalidArgumentError
    );
  });
});
