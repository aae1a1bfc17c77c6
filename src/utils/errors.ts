/**
 * @file src/utils/errors.ts
 * @description Error hierarchy raised by the conversation client, plus translation of
 *   `openai` SDK failures into `UpstreamError`.
 */

import type { ChatErrorInfo, UpstreamErrorKind } from "@/types/index.js";
import {
  APIConnectionError,
  APIError,
  APIUserAbortError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from "openai";

export class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ChatError";
  }
}

/**
 * Bad caller input: empty message text, malformed conversation id, invalid option.
 * Raised before any network call.
 */
export class InvalidArgumentError extends ChatError {
  constructor(
    public readonly argument: string,
    message: string
  ) {
    super(`Invalid argument "${argument}": ${message}`, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

/**
 * The completion service failed or returned an error.
 */
export class UpstreamError extends ChatError {
  public readonly status?: number;

  constructor(
    public readonly kind: UpstreamErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, "UPSTREAM_ERROR", options);
    this.name = "UpstreamError";
    this.status = options?.status;
  }
}

/**
 * A cached conversation broke one of its invariants.
 */
export class CacheStateError extends ChatError {
  constructor(
    public readonly conversationId: string,
    message: string
  ) {
    super(
      `Conversation "${conversationId}" is inconsistent: ${message}`,
      "CACHE_STATE_ERROR"
    );
    this.name = "CacheStateError";
  }
}

/**
 * The caller aborted the operation.
 */
export class CancelledError extends ChatError {
  constructor(options?: { cause?: unknown }) {
    super("The operation was cancelled", "CANCELLED", options);
    this.name = "CancelledError";
  }
}

/**
 * Map an HTTP status code to an upstream failure category.
 */
export function kindFromStatus(status: number | undefined): UpstreamErrorKind {
  if (status === undefined) return "unknown";
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status >= 500) return "server";
  if (status >= 400) return "bad_request";
  return "unknown";
}

/**
 * Translate anything thrown by the transport into an `UpstreamError`.
 * Aborts are returned as `CancelledError` so callers can tell them apart.
 */
export function toUpstreamError(err: unknown): UpstreamError | CancelledError {
  if (err instanceof UpstreamError || err instanceof CancelledError) return err;
  if (err instanceof APIUserAbortError) {
    return new CancelledError({ cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new UpstreamError("network", err.message, { cause: err });
  }
  if (
    err instanceof AuthenticationError ||
    err instanceof PermissionDeniedError
  ) {
    return new UpstreamError("auth", err.message, {
      cause: err,
      status: err.status,
    });
  }
  if (err instanceof RateLimitError) {
    return new UpstreamError("rate_limit", err.message, {
      cause: err,
      status: err.status,
    });
  }
  if (err instanceof APIError) {
    return new UpstreamError(kindFromStatus(err.status), err.message, {
      cause: err,
      status: err.status,
    });
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new CancelledError({ cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamError("unknown", message, { cause: err });
}

/**
 * Build the `error` payload of a degraded response.
 */
export function describeError(err: UpstreamError): ChatErrorInfo {
  return err.status === undefined
    ? { kind: err.kind, message: err.message }
    : { kind: err.kind, message: err.message, status: err.status };
}
