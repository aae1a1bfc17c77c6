/**
 * @file src/config/index.ts
 * @description Builds the immutable `ChatOptions` snapshot: defaults, environment
 *   variables and explicit overrides, validated and frozen.
 *
 *   Durations in the environment are ISO-8601 (`PT1H`, `PT5M`) and parsed with luxon.
 */
import type { ChatOptions, ChatParameters } from "@/types/index.js";
import { Duration } from "luxon";
import { InvalidArgumentError } from "../utils/errors.js";
import {
  getBoolean,
  getNumber,
  getOptional,
  initialiseEnv,
} from "../utils/env.js";
import logger from "../utils/logger.js";
import { ChatModels } from "./models.js";

// Ten messages, one hour idle, errors raised.
export const defaultChatOptions: Readonly<ChatOptions> = Object.freeze({
  defaultModel: ChatModels.Gpt35Turbo,
  messageLimit: 10,
  messageExpiration: Duration.fromObject({ hours: 1 }).toMillis(),
  throwOnError: true,
  defaultParameters: {},
});

/**
 * Parse an ISO-8601 duration into milliseconds.
 * @throws InvalidArgumentError when the text is not a valid duration.
 */
export function parseDuration(name: string, text: string): number {
  const duration = Duration.fromISO(text);
  if (!duration.isValid) {
    throw new InvalidArgumentError(
      name,
      `"${text}" is not an ISO-8601 duration (${duration.invalidExplanation ?? "invalid"})`
    );
  }
  return duration.toMillis();
}

function assertPositive(name: string, value: number, integer = false): void {
  if (
    !Number.isFinite(value) ||
    value <= 0 ||
    (integer && !Number.isInteger(value))
  ) {
    throw new InvalidArgumentError(
      name,
      `must be a positive ${integer ? "integer" : "number"}, got ${value}`
    );
  }
}

/**
 * Fill in defaults for `partial`, validate and freeze the result.
 */
export function resolveChatOptions(
  partial: Partial<ChatOptions> = {}
): Readonly<ChatOptions> {
  const options: ChatOptions = {
    ...defaultChatOptions,
    ...stripUndefined(partial),
    defaultParameters: { ...stripUndefined(partial.defaultParameters ?? {}) },
  };

  if (options.defaultModel.trim() === "") {
    throw new InvalidArgumentError("defaultModel", "must not be empty");
  }
  assertPositive("messageLimit", options.messageLimit, true);
  assertPositive("messageExpiration", options.messageExpiration);
  if (options.sweepInterval !== undefined) {
    assertPositive("sweepInterval", options.sweepInterval);
  }

  Object.freeze(options.defaultParameters);
  return Object.freeze(options);
}

/**
 * Read options from the environment, then apply `overrides` on top.
 */
export function loadChatOptions(
  overrides: Partial<ChatOptions> = {}
): Readonly<ChatOptions> {
  initialiseEnv();
  logger.debug("[config] Loading chat options from environment");

  const expiration = getOptional("CHAT_MESSAGE_EXPIRATION");
  const sweep = getOptional("CHAT_SWEEP_INTERVAL");
  const defaultParameters: ChatParameters = {
    temperature: getNumber("CHAT_TEMPERATURE"),
    topP: getNumber("CHAT_TOP_P"),
    maxTokens: getNumber("CHAT_MAX_TOKENS"),
    presencePenalty: getNumber("CHAT_PRESENCE_PENALTY"),
    frequencyPenalty: getNumber("CHAT_FREQUENCY_PENALTY"),
  };

  const fromEnv: Partial<ChatOptions> = {
    apiKey: getOptional("OPENAI_API_KEY") || undefined,
    organization: getOptional("OPENAI_ORGANIZATION") || undefined,
    baseURL: getOptional("OPENAI_BASE_URL") || undefined,
    defaultModel: getOptional("CHAT_DEFAULT_MODEL") || undefined,
    messageLimit: getNumber("CHAT_MESSAGE_LIMIT"),
    messageExpiration: expiration
      ? parseDuration("CHAT_MESSAGE_EXPIRATION", expiration)
      : undefined,
    sweepInterval: sweep
      ? parseDuration("CHAT_SWEEP_INTERVAL", sweep)
      : undefined,
    throwOnError: getBoolean(
      "CHAT_THROW_ON_ERROR",
      defaultChatOptions.throwOnError
    ),
    defaultParameters: {
      ...stripUndefined(defaultParameters),
      ...overrides.defaultParameters,
    },
  };

  const options = resolveChatOptions({
    ...stripUndefined(fromEnv),
    ...stripUndefined(overrides),
    defaultParameters: fromEnv.defaultParameters,
  });
  logger.debug(
    `[config] Options → model=${options.defaultModel}, limit=${options.messageLimit}, expiration=${options.messageExpiration}ms, throwOnError=${options.throwOnError}`
  );
  return options;
}

/**
 * Copy `value` without the keys whose value is `undefined`, so spreading it never
 * overwrites a default with `undefined`.
 */
export function stripUndefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in value) {
    if (
      Object.prototype.hasOwnProperty.call(value, key) &&
      value[key] !== undefined
    ) {
      out[key] = value[key];
    }
  }
  return out;
}
