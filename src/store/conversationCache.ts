/**
 * @file src/store/conversationCache.ts
 * @description In-memory message history keyed by conversation id, with a
 *   message-count bound and sliding idle expiration.
 *
 *   The cache owns every conversation entry; callers only ever receive copies.
 *   Each method is synchronous and therefore atomic; callers that read, await
 *   and then write must hold the per-conversation lock (`acquire` /
 *   `runExclusive`) around the sequence.
 *   Expired entries are purged lazily on access and, when `sweepInterval` is
 *   set, by a timer.
 */

import type { ChatMessage, ConversationEntry } from "@/types/index.js";
import { CacheStateError } from "../utils/errors.js";
import { KeyedLock, type Release } from "../utils/keyedLock.js";
import logger from "../utils/logger.js";
import { isWithinLimit, trimHistory } from "../utils/trimHistory.js";

export type TrimPolicy = (
  messages: readonly ChatMessage[],
  limit: number
) => ChatMessage[];

export interface ConversationCacheOptions {
  /** Maximum messages per conversation, system messages included. */
  messageLimit: number;
  /** Idle time (ms) after which an entry is treated as absent. */
  messageExpiration: number;
  /** Period (ms) of the background sweep. */
  sweepInterval?: number;
  /** Clock, in ms. */
  now?: () => number;
  /** Trimming policy applied after every append. */
  trim?: TrimPolicy;
}

export class ConversationCache {
  private readonly entries = new Map<string, ConversationEntry>();
  private readonly locks = new KeyedLock();
  private readonly now: () => number;
  private readonly trim: TrimPolicy;
  private sweepTimer?: NodeJS.Timeout;

  constructor(private readonly options: ConversationCacheOptions) {
    this.now = options.now ?? (() => Date.now());
    this.trim = options.trim ?? trimHistory;

    if (options.sweepInterval !== undefined) {
      this.sweepTimer = setInterval(() => this.sweep(), options.sweepInterval);
      this.sweepTimer.unref();
      logger.debug(
        `[conversationCache] Sweeping every ${options.sweepInterval}ms`
      );
    }
  }

  /** Number of stored entries, expired ones included until purged. */
  get size(): number {
    return this.entries.size;
  }

  /** Current time according to the cache clock. */
  timestamp(): number {
    return this.now();
  }

  /**
   * Messages of a live conversation, oldest first; empty for unknown or
   * expired ids. Reading counts as activity.
   */
  get(id: string): ChatMessage[] {
    const entry = this.live(id);
    if (!entry) return [];
    entry.lastActivity = this.now();
    return [...entry.messages];
  }

  /** True when `id` names a live (non-expired) conversation. */
  has(id: string): boolean {
    return this.live(id) !== undefined;
  }

  /**
   * Append messages in order, creating the entry if needed, then trim to the
   * limit.
   */
  append(id: string, ...messages: ChatMessage[]): void {
    const entry = this.live(id) ?? {
      id,
      messages: [],
      lastActivity: this.now(),
    };
    this.store(entry, [...entry.messages, ...messages]);
    const total = this.entries.get(id)?.messages.length ?? 0;
    logger.debug(
      `[conversationCache] Appended ${messages.length} message(s) to ${id} (total ${total})`
    );
  }

  /**
   * Replace the whole history of `id` (trimmed to the limit).
   */
  replace(id: string, messages: ChatMessage[]): void {
    this.store({ id, messages: [], lastActivity: this.now() }, messages);
    logger.debug(
      `[conversationCache] Replaced history of ${id} (${messages.length} message(s))`
    );
  }

  /**
   * Clear `id` and start it over with a single system message.
   */
  reset(id: string, systemMessage: ChatMessage): void {
    this.entries.set(id, {
      id,
      messages: [systemMessage],
      lastActivity: this.now(),
    });
    logger.debug(`[conversationCache] Reset ${id} with a system message`);
  }

  /** Remove `id`; no-op when absent. */
  delete(id: string): void {
    if (this.entries.delete(id)) {
      logger.debug(`[conversationCache] Deleted ${id}`);
    }
  }

  /**
   * Purge every expired entry.
   * @returns How many entries were removed.
   */
  sweep(): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug(
        `[conversationCache] Sweep removed ${removed} expired conversation(s)`
      );
    }
    return removed;
  }

  /** Wait for exclusive access to `id`. */
  acquire(id: string, signal?: AbortSignal): Promise<Release> {
    return this.locks.acquire(id, signal);
  }

  /** Run `fn` with exclusive access to `id`. */
  runExclusive<T>(
    id: string,
    fn: () => Promise<T> | T,
    signal?: AbortSignal
  ): Promise<T> {
    return this.locks.runExclusive(id, fn, signal);
  }

  /** Stop the background sweep. */
  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private live(id: string): ConversationEntry | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(id);
      logger.debug(`[conversationCache] ${id} expired; purged`);
      return undefined;
    }
    return entry;
  }

  private isExpired(entry: ConversationEntry): boolean {
    return this.now() - entry.lastActivity > this.options.messageExpiration;
  }

  private store(entry: ConversationEntry, messages: ChatMessage[]): void {
    const { messageLimit } = this.options;
    const trimmed = this.trim(messages, messageLimit);
    const next: ConversationEntry = {
      id: entry.id,
      messages: trimmed,
      lastActivity: this.now(),
    };

    if (!isWithinLimit(trimmed, messageLimit)) {
      const err = new CacheStateError(
        entry.id,
        `${trimmed.length} message(s) kept with a limit of ${messageLimit}`
      );
      // Keep only the system messages.
      logger.error(`[conversationCache] ${err.message}; resetting entry`);
      next.messages = messages.filter((m) => m.role === "system");
    }
    this.entries.set(entry.id, next);
  }
}
