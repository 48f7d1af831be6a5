/**
 * Signals — Publishes registry state transitions to the event store.
 *
 * Each signal is checked against the catalog, wrapped in metadata and
 * appended to the stream of the entity it concerns. Signals of one
 * operation share a correlation id.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@sla-registry/types";
import type { EventCatalog, EventStore, SlaSignal } from "@sla-registry/event-store";
import type { Clock } from "./types.js";

// =============================================================================
// Streams
// =============================================================================

export const streams = {
  client: (id: number): string => `client-${id}`,
  contract: (id: number): string => `contract-${id}`,
  sla: (id: number): string => `sla-${id}`,
  alert: (id: number): string => `alert-${id}`,
} as const;

// =============================================================================
// Emitter
// =============================================================================

export interface SignalContext {
  readonly actor: string;
  readonly source: EventSource;
  readonly correlationId: string;
}

interface PendingSignal {
  readonly streamId: string;
  readonly event: DomainEvent;
}

/**
 * The signals of one operation, appended together by `publish()`.
 *
 * `add` checks each signal against the catalog, so an invalid one fails
 * before anything reaches the store. Subscriber failures raised by one
 * append are held back until every signal of the batch is in the log.
 */
export class SignalBatch {
  readonly context: SignalContext;
  private readonly events: EventStore;
  private readonly build: (context: SignalContext, signal: SlaSignal) => DomainEvent;
  private readonly pending: PendingSignal[] = [];
  private published = false;

  constructor(
    context: SignalContext,
    events: EventStore,
    build: (context: SignalContext, signal: SlaSignal) => DomainEvent,
  ) {
    this.context = context;
    this.events = events;
    this.build = build;
  }

  add(streamId: string, signal: SlaSignal): this {
    if (this.published) {
      throw new Error("Signal batch has already been published");
    }
    this.pending.push({ streamId, event: this.build(this.context, signal) });
    return this;
  }

  publish(): void {
    if (this.published) {
      throw new Error("Signal batch has already been published");
    }
    this.published = true;

    const failures: unknown[] = [];
    for (const { streamId, event } of this.pending) {
      const before = this.events.globalPosition();
      try {
        this.events.append(streamId, [event]);
      } catch (err) {
        // Nothing written: the store refused the append itself.
        if (this.events.globalPosition() === before) {
          throw err;
        }
        failures.push(err);
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} signal subscribers failed`);
    }
  }
}

export class SignalEmitter {
  private readonly events: EventStore;
  private readonly catalog: EventCatalog;
  private readonly now: Clock;
  private readonly newId: () => string;

  constructor(
    events: EventStore,
    catalog: EventCatalog,
    now: Clock,
    newId: () => string = randomUUID,
  ) {
    this.events = events;
    this.catalog = catalog;
    this.now = now;
    this.newId = newId;
  }

  /** Start the signal batch of one operation under a new correlation id. */
  batch(actor: string, source: EventSource): SignalBatch {
    const context: SignalContext = { actor, source, correlationId: this.newId() };
    return new SignalBatch(context, this.events, (ctx, signal) => this.toEvent(ctx, signal));
  }

  private toEvent(context: SignalContext, signal: SlaSignal): DomainEvent {
    this.catalog.assertValid(signal.type, signal.payload);

    return {
      type: signal.type,
      metadata: {
        eventId: this.newId(),
        timestamp: this.now().toISOString(),
        actor: context.actor,
        correlationId: context.correlationId,
        source: context.source,
      },
      payload: signal.payload,
    };
  }
}
