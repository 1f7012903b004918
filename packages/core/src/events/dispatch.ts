/**
 * Single-slot callback registry.
 *
 * Deliveries are chained onto one promise, so the handler sees events in
 * arrival order and never runs twice at once. The slot is read when a
 * delivery starts: swapping the handler mid-delivery affects the next event
 * only.
 *
 * A handler that returns a promise holds up later deliveries until it
 * settles. Slow work should be handed off rather than awaited here: the
 * event channel is paused for the whole delivery and its heartbeat only
 * resumes once the next frame is read.
 */

import type { Logger } from "pino";
import { createSilentLogger } from "../logger/index.js";
import type { GatewayEvent } from "./types.js";

export type EventCallback = (event: GatewayEvent) => void | Promise<void>;

export class DispatchRegistry {
  private callback: EventCallback | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createSilentLogger();
  }

  /** Install the handler, replacing any previous one. */
  register(callback: EventCallback): void {
    this.callback = callback;
  }

  clear(): void {
    this.callback = null;
  }

  hasCallback(): boolean {
    return this.callback !== null;
  }

  /**
   * Queue one event for delivery. Resolves once this event's delivery has
   * finished. Never rejects: handler failures are logged.
   */
  dispatch(event: GatewayEvent): Promise<void> {
    const delivery = this.tail.then(() => this.deliver(event));
    this.tail = delivery;
    return delivery;
  }

  /** Resolves when every queued delivery has finished. */
  idle(): Promise<void> {
    return this.tail;
  }

  private async deliver(event: GatewayEvent): Promise<void> {
    const callback = this.callback;
    if (!callback) {
      this.logger.trace({ kind: event.kind }, "No callback registered, dropping event");
      return;
    }

    try {
      await callback(event);
    } catch (err) {
      this.logger.error({ err, kind: event.kind }, "Event callback failed");
    }
  }
}
