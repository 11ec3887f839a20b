/**
 * @flashvault/event-store — In-memory EventStore implementation.
 *
 * Holds every stream in process memory and links each appended event to
 * its predecessor by hash. All state is lost on process exit.
 */

import type { DomainEvent } from "@flashvault/types";
import { isDomainEvent } from "@flashvault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UndoJournal,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock used for appendedAt. Default: system time */
  readonly now?: (() => Date) | undefined;

  /** Journal that records the inverse of every append. Default: none */
  readonly journal?: UndoJournal | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _now: () => Date;
  private readonly _journal: UndoJournal | undefined;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
    this._journal = options.journal;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    events.forEach((event, i) => {
      if (!isDomainEvent(event)) {
        throw new EventStoreError(
          "INVALID_EVENT",
          `Event ${String(i)} is not a well-formed domain event`,
          streamId,
        );
      }
    });

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }
    const undo = this._undoAppend(streamId, currentVersion);

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const appended: StoredEvent[] = [];

    events.forEach((event, i) => {
      const unlinked = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const stored: StoredEvent = {
        ...unlinked,
        hash: computeEventHash(unlinked, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;
      stream.push(stored);
      this._globalLog.push(stored);
      appended.push(stored);
    });

    try {
      this._dispatch(appended);
    } catch (err) {
      undo();
      throw err;
    }
    this._journal?.record(undo);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(
      stream.filter((e) => e.version >= fromVersion),
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: ExpectedVersion | undefined,
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  /**
   * Inverse of an append that starts at the current head: truncates the
   * stream and global log and restores the chain tip.
   */
  private _undoAppend(streamId: string, streamLength: number): () => void {
    const globalLength = this._globalLog.length;
    const lastHash = this._lastHash;
    return () => {
      const stream = this._streams.get(streamId);
      if (stream !== undefined) {
        stream.length = streamLength;
        if (streamLength === 0) this._streams.delete(streamId);
      }
      this._globalLog.length = globalLength;
      this._lastHash = lastHash;
    };
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
