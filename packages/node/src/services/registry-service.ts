/**
 * RegistryService — composition root for the HTTP host.
 *
 * Owns the SlaRegistry the routes operate on and the pino subscriber
 * that turns every signal into a log line. Route handlers reach the
 * registry through `c.get("registry")`.
 */

import type { Logger } from "pino";
import { SlaRegistry, describeRule } from "@sla-registry/registry";
import type { Clock, EntityStore } from "@sla-registry/registry";
import { SLA_EVENTS } from "@sla-registry/event-store";
import type { StoredEvent, Subscription } from "@sla-registry/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface RegistryServiceOptions {
  /** Receives signal log lines and subscriber failures */
  readonly logger?: Logger | undefined;
  /** Restored entity state; an empty in-memory store otherwise */
  readonly store?: EntityStore | undefined;
  readonly now?: Clock | undefined;
  readonly newId?: (() => string) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class RegistryService {
  readonly registry: SlaRegistry;

  private readonly subscriptions: Subscription[] = [];
  private _ready = false;

  constructor(options: RegistryServiceOptions = {}) {
    const logger = options.logger;

    this.registry = new SlaRegistry({
      ...(options.store !== undefined ? { store: options.store } : {}),
      ...(options.now !== undefined ? { now: options.now } : {}),
      ...(options.newId !== undefined ? { newId: options.newId } : {}),
      onSignalError: (error: unknown, stored: StoredEvent) => {
        logger?.error(
          { err: error, eventType: stored.event.type, streamId: stored.streamId },
          "Signal subscriber failed",
        );
      },
    });

    if (logger !== undefined) {
      this.subscriptions.push(
        this.registry.events.subscribeAll((stored) => this.logSignal(logger, stored)),
      );
    }

    this._ready = true;
  }

  // ─── Signal Log ────────────────────────────────────────────────────

  private logSignal(logger: Logger, stored: StoredEvent): void {
    const { event } = stored;
    const fields = {
      eventType: event.type,
      streamId: stored.streamId,
      actor: event.metadata.actor,
      correlationId: event.metadata.correlationId,
      payload: event.payload,
    };

    if (event.type !== SLA_EVENTS.SLA_VIOLATED) {
      logger.info(fields, "Signal");
      return;
    }

    const slaId = event.payload["slaId"];
    const rule =
      typeof slaId === "number" ? describeRule(this.registry.getSla(slaId)) : "unknown rule";
    logger.warn({ ...fields, rule }, `SLA breached: ${rule}`);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  async stop(): Promise<void> {
    this._ready = false;
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.unsubscribe();
    }
  }
}
