/**
 * @sla-registry/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - A single-process registry host
 *
 * All state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 */

import type { DomainEvent } from "@sla-registry/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  HandlerErrorCallback,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export interface InMemoryEventStoreOptions {
  /**
   * Called when a subscriber throws or rejects. Without it, the failure
   * is rethrown to the appender once every subscriber has run.
   */
  readonly onHandlerError?: HandlerErrorCallback;
}

/**
 * In-memory event store.
 *
 * Events are kept twice:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and global subscriptions
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();

  private readonly _globalLog: StoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();

  private readonly _globalSubscribers = new Set<EventHandler>();

  private _nextGlobalPosition = 1;

  private readonly _onHandlerError: HandlerErrorCallback | undefined;

  constructor(options?: InMemoryEventStoreOptions) {
    this._onHandlerError = options?.onHandlerError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const currentVersion = this.streamVersion(streamId);

    const expectedVersion = options?.expectedVersion;
    if (expectedVersion !== undefined && expectedVersion !== "any") {
      if (expectedVersion === "no_stream") {
        if (currentVersion !== 0) {
          throw new EventStoreError(
            "CONCURRENCY_CONFLICT",
            `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
            streamId,
          );
        }
      } else if (currentVersion !== expectedVersion) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" is at version ${currentVersion}, expected ${expectedVersion}`,
          streamId,
        );
      }
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    const storedEvents = events.map(
      (event, i): StoredEvent => ({
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      }),
    );

    stream.push(...storedEvents);
    this._globalLog.push(...storedEvents);

    this._dispatch(streamId, storedEvents);

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

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    const failures: unknown[] = [];

    for (const handler of handlers) {
      for (const event of events) {
        try {
          const result = handler(event);
          if (result instanceof Promise) {
            result.catch((err: unknown) => this._reportAsync(err, event));
          }
        } catch (err) {
          if (this._onHandlerError !== undefined) {
            this._onHandlerError(err, event);
          } else {
            failures.push(err);
          }
        }
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} event subscribers failed`);
    }
  }

  private _reportAsync(err: unknown, event: StoredEvent): void {
    if (this._onHandlerError !== undefined) {
      this._onHandlerError(err, event);
      return;
    }
    // No callback: raise it as an uncaught exception.
    queueMicrotask(() => {
      throw err;
    });
  }
}

function limit(
  events: StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  if (maxCount !== undefined && maxCount >= 0) {
    return events.slice(0, maxCount);
  }
  return events;
}
