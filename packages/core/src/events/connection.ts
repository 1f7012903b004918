/**
 * Resilient event connection.
 *
 * Owns one event channel at a time and drives it through the
 * ConnectionStateMachine:
 *
 *   idle -> connecting -> open -> (reconnecting -> connecting)* -> closed
 *
 * While open, frames are read one at a time and each decoded event is
 * dispatched (and the dispatch awaited) before the next read. A dropped or
 * failed channel is retried with exponential backoff when autoReconnect is
 * on; otherwise the connection closes and the error is reported through
 * closed(). A 401 on the upgrade is never retried.
 *
 * Every failed cycle, whether or not its channel opened, is followed by a
 * connection_update with connected=false and reconnect telling whether
 * another attempt follows.
 */

import type { Logger } from "pino";
import {
  AlreadyRunningError,
  NotRunningError,
  ReconnectLimitError,
  UnauthorizedError,
} from "../errors/catalog.js";
import { createSilentLogger } from "../logger/index.js";
import { computeBackoffDelay, sleep } from "../lifecycle/backoff.js";
import {
  ConnectionStateMachine,
  type ConnectionState,
  type StateChangeListener,
} from "../lifecycle/state-machine.js";
import type { WebSocketConfig } from "../schemas/client-config.js";
import { defaultTransport, type TransportAdapter } from "../transport/index.js";
import type { EventChannel } from "../transport/event-channel.js";
import { DispatchRegistry } from "./dispatch.js";
import { connectionUpdate, parseGatewayFrame } from "./types.js";

export interface EventConnectionOptions {
  websocket: Readonly<WebSocketConfig>;
  /** Extra trusted CA in PEM form. */
  ca?: string;
  /** Shared with the owning client so callbacks survive a new connection. */
  dispatcher?: DispatchRegistry;
  transport?: Pick<TransportAdapter, "openEventChannel">;
  logger?: Logger;
  /** Jitter source, injectable for deterministic tests. */
  random?: () => number;
}

export interface ConnectionInfo {
  state: ConnectionState;
  retryCount: number;
  lastError: Error | null;
  lastConnectedAt: Date | null;
  lastDisconnectedAt: Date | null;
}

type RunOutcome = { ok: true } | { ok: false; error: Error };

type CycleOutcome =
  | { kind: "aborted"; opened: boolean }
  | { kind: "failed"; opened: boolean; error: Error };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class EventConnection {
  private readonly machine = new ConnectionStateMachine();
  private readonly websocket: Readonly<WebSocketConfig>;
  private readonly ca: string | undefined;
  private readonly dispatcher: DispatchRegistry;
  private readonly transport: Pick<TransportAdapter, "openEventChannel">;
  private readonly logger: Logger;
  private readonly random: () => number;

  private retryCount = 0;
  private lastError: Error | null = null;
  private lastConnectedAt: Date | null = null;
  private lastDisconnectedAt: Date | null = null;

  private cycle: AbortController | null = null;
  private loop: Promise<RunOutcome> | null = null;
  private stopRequested = false;
  private reconnectRequested = false;

  constructor(options: EventConnectionOptions) {
    this.websocket = options.websocket;
    this.ca = options.ca;
    this.logger = options.logger ?? createSilentLogger();
    this.dispatcher = options.dispatcher ?? new DispatchRegistry(this.logger);
    this.transport = options.transport ?? defaultTransport;
    this.random = options.random ?? Math.random;
  }

  /**
   * Begin connecting. Returns immediately; use closed() to wait for the
   * connection to end. Only valid once, from idle.
   */
  start(): void {
    const state = this.machine.getState();
    if (state !== "idle") {
      throw new AlreadyRunningError(state);
    }
    this.loop = this.run();
  }

  /**
   * Close the channel, cancel any pending read or backoff and move to
   * closed. Safe to call repeatedly and from any state.
   */
  async stop(): Promise<void> {
    if (this.machine.getState() === "idle") {
      this.machine.transition("closed", "stopped before start");
      return;
    }
    this.stopRequested = true;
    this.cycle?.abort(new Error("Connection stopped"));
    await this.loop;
  }

  /**
   * Drop the current channel and connect again straight away, skipping any
   * pending backoff. The retry count starts over.
   */
  reconnect(): void {
    const state = this.machine.getState();
    if (state === "idle" || state === "closed" || this.stopRequested) {
      throw new NotRunningError(state);
    }
    this.logger.info("Reconnect requested");
    this.reconnectRequested = true;
    this.retryCount = 0;
    this.cycle?.abort(new Error("Reconnect requested"));
  }

  /**
   * Resolves once the connection has been stopped; rejects with the error
   * that closed it otherwise.
   */
  async closed(): Promise<void> {
    if (!this.loop) {
      const state = this.machine.getState();
      if (state === "idle") throw new NotRunningError(state);
      return;
    }
    const outcome = await this.loop;
    if (!outcome.ok) throw outcome.error;
  }

  getState(): ConnectionState {
    return this.machine.getState();
  }

  getInfo(): ConnectionInfo {
    return {
      state: this.machine.getState(),
      retryCount: this.retryCount,
      lastError: this.lastError,
      lastConnectedAt: this.lastConnectedAt,
      lastDisconnectedAt: this.lastDisconnectedAt,
    };
  }

  onStateChange(listener: StateChangeListener): () => void {
    return this.machine.onStateChange(listener);
  }

  private async run(): Promise<RunOutcome> {
    try {
      return await this.runLoop();
    } catch (err) {
      const error = toError(err);
      this.logger.error({ err: error }, "Event connection loop failed");
      return this.finish(error);
    }
  }

  private async runLoop(): Promise<RunOutcome> {
    for (;;) {
      const cycle = new AbortController();
      this.cycle = cycle;
      this.reconnectRequested = false;

      const outcome = await this.runCycle(cycle.signal);

      if (this.stopRequested) {
        if (outcome.opened) await this.dispatcher.dispatch(connectionUpdate(false, false));
        return this.finish(null);
      }

      if (this.reconnectRequested) {
        if (outcome.opened) await this.dispatcher.dispatch(connectionUpdate(false, true));
        this.machine.transition("reconnecting", "reconnect requested");
        continue;
      }

      if (outcome.kind === "aborted") {
        // Only stop() and reconnect() abort a cycle
        return this.finish(null);
      }

      const { error } = outcome;
      this.lastError = error;
      const terminal = this.terminalError(error);
      await this.dispatcher.dispatch(connectionUpdate(false, terminal === null));
      if (terminal) {
        this.logger.error({ err: terminal }, "Event connection closed");
        return this.finish(terminal);
      }

      this.machine.transition("reconnecting", error.message);
      const delay = computeBackoffDelay(
        this.retryCount,
        {
          baseDelayMs: this.websocket.reconnectIntervalMs,
          maxDelayMs: this.websocket.maxReconnectDelayMs,
          maxJitterMs: this.websocket.reconnectJitterMs,
        },
        this.random,
      );
      this.retryCount++;
      this.logger.warn(
        { err: error, attempt: this.retryCount, delayMs: Math.round(delay) },
        "Event channel unavailable, reconnecting",
      );

      await this.backoff(delay, cycle.signal);
      if (this.stopRequested) {
        return this.finish(null);
      }
    }
  }

  /** Decide whether a failed cycle ends the connection. */
  private terminalError(error: Error): Error | null {
    if (error instanceof UnauthorizedError) return error;
    if (!this.websocket.autoReconnect) return error;

    const limit = this.websocket.maxReconnectAttempts;
    if (limit !== null && this.retryCount >= limit) {
      return new ReconnectLimitError(this.retryCount, { cause: error });
    }
    return null;
  }

  /** Open one channel and read from it until it fails or is aborted. */
  private async runCycle(signal: AbortSignal): Promise<CycleOutcome> {
    this.machine.transition("connecting");

    let channel: EventChannel;
    try {
      channel = await this.transport.openEventChannel(
        {
          url: this.websocket.url,
          authorization: this.websocket.authorization,
          ca: this.ca,
          filteredEvents: this.websocket.filteredEvents,
          pingIntervalMs: this.websocket.pingIntervalMs,
          pingTimeoutMs: this.websocket.pingTimeoutMs,
          logger: this.logger,
        },
        signal,
      );
    } catch (err) {
      if (signal.aborted) return { kind: "aborted", opened: false };
      return { kind: "failed", opened: false, error: toError(err) };
    }

    if (signal.aborted) {
      channel.close();
      return { kind: "aborted", opened: false };
    }

    this.retryCount = 0;
    this.machine.transition("open");
    this.lastConnectedAt = new Date();
    this.logger.info({ url: this.websocket.url }, "Event channel open");

    try {
      await this.dispatcher.dispatch(connectionUpdate(true, false));
      for (;;) {
        const text = await channel.read(signal);
        const parsed = parseGatewayFrame(text);
        if (!parsed.ok) {
          this.logger.warn({ reason: parsed.reason }, "Skipping malformed event frame");
          continue;
        }
        await this.dispatcher.dispatch(parsed.event);
      }
    } catch (err) {
      if (signal.aborted) return { kind: "aborted", opened: true };
      return { kind: "failed", opened: true, error: toError(err) };
    } finally {
      channel.close();
      this.lastDisconnectedAt = new Date();
    }
  }

  private async backoff(delayMs: number, signal: AbortSignal): Promise<void> {
    try {
      await sleep(delayMs, signal);
    } catch (err) {
      if (!signal.aborted) throw err;
      this.logger.debug("Backoff interrupted");
    }
  }

  private finish(error: Error | null): RunOutcome {
    if (this.machine.canTransition("closed")) {
      this.machine.transition("closed", error?.message ?? "stopped");
    }
    this.cycle = null;
    if (error) {
      this.lastError = error;
      return { ok: false, error };
    }
    return { ok: true };
  }
}
