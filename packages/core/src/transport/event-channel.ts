/**
 * WebSocket event channel.
 *
 * Frames are handed out one read() at a time. The socket is paused while a
 * frame waits to be read, so the reader is never more than one frame behind
 * the network. A ping is sent every pingIntervalMs; if no pong arrives
 * within pingTimeoutMs the channel is torn down and read() rejects.
 *
 * A paused socket reads no pongs either, so the heartbeat is suspended
 * while a frame is held and its clock restarts on the next read().
 */

import WebSocket from "ws";
import type { Logger } from "pino";
import {
  ChannelClosedError,
  ConnectError,
  UnauthorizedError,
} from "../errors/catalog.js";
import { createSilentLogger } from "../logger/index.js";

export interface EventChannel {
  /**
   * Resolves with the next text frame. Rejects with ChannelClosedError once
   * the channel is gone, or with the signal's reason when aborted.
   */
  read(signal?: AbortSignal): Promise<string>;

  /** Close the channel. Pending reads reject. */
  close(): void;
}

export interface EventChannelOptions {
  url: string;
  authorization?: string;
  /** Extra trusted CA in PEM form. */
  ca?: string;
  /** Sent as `?events=a,b` so the gateway filters server-side. */
  filteredEvents?: readonly string[] | null;
  pingIntervalMs: number;
  pingTimeoutMs: number;
  logger?: Logger;
}

export function buildEventUrl(
  url: string,
  filteredEvents?: readonly string[] | null,
): string {
  const parsed = new URL(url);
  if (filteredEvents && filteredEvents.length > 0) {
    parsed.searchParams.append("events", filteredEvents.join(","));
  }
  return parsed.toString();
}

interface PendingRead {
  resolve: (frame: string) => void;
  reject: (reason: unknown) => void;
}

class WsEventChannel implements EventChannel {
  private readonly frames: string[] = [];
  private pending: PendingRead | null = null;
  private failure: ChannelClosedError | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private lastPongAt = Date.now();
  private awaitingPong = false;

  constructor(
    private readonly socket: WebSocket,
    private readonly options: EventChannelOptions,
    private readonly logger: Logger,
  ) {
    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        this.logger.trace("Ignoring binary frame");
        return;
      }
      this.push(data.toString());
    });

    socket.on("pong", () => {
      this.lastPongAt = Date.now();
      this.awaitingPong = false;
    });

    socket.on("close", (code, reason) => {
      this.fail(new ChannelClosedError(code, reason.toString()));
    });

    // Always followed by "close"; recorded first so the cause is kept
    socket.on("error", (err) => {
      this.logger.debug({ err }, "Event channel error");
      this.fail(new ChannelClosedError(1006, err.message, { cause: err }));
    });

    this.heartbeat = setInterval(() => this.tick(), options.pingIntervalMs);
  }

  read(signal?: AbortSignal): Promise<string> {
    const next = this.frames.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.socket.isPaused) {
      this.lastPongAt = Date.now();
      this.socket.resume();
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.pending = null;
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.pending = {
        resolve: (frame) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(frame);
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        },
      };
    });
  }

  close(): void {
    this.fail(new ChannelClosedError(1000, "closed by client"));
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000);
    } else {
      this.socket.terminate();
    }
  }

  private push(frame: string): void {
    // Hold further frames until the reader asks for the next one
    this.socket.pause();

    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private fail(error: ChannelClosedError): void {
    if (this.failure) return;
    this.failure = error;
    this.clearHeartbeat();

    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(error);
    }
  }

  private tick(): void {
    if (
      this.awaitingPong &&
      Date.now() - this.lastPongAt > this.options.pingTimeoutMs
    ) {
      this.logger.debug("Heartbeat timeout, dropping event channel");
      this.fail(new ChannelClosedError(1006, "heartbeat timeout"));
      this.socket.terminate();
      return;
    }
    if (this.socket.readyState !== WebSocket.OPEN) return;
    if (this.socket.isPaused) {
      this.awaitingPong = false;
      return;
    }

    this.socket.ping();
    this.awaitingPong = true;
  }

  private clearHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}

/**
 * Open a WebSocket to the gateway. Rejects with UnauthorizedError on a 401
 * upgrade response and ConnectError on any other failure.
 */
export function openEventChannel(
  options: EventChannelOptions,
  signal?: AbortSignal,
): Promise<EventChannel> {
  const logger = options.logger ?? createSilentLogger();
  const url = buildEventUrl(options.url, options.filteredEvents);

  return new Promise<EventChannel>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      fn();
    };

    logger.debug({ url }, "Connecting to event channel");
    const socket = new WebSocket(url, {
      headers: options.authorization
        ? { authorization: options.authorization }
        : undefined,
      ca: options.ca,
    });

    const onAbort = () => {
      settle(() => reject(signal?.reason));
      socket.terminate();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    socket.once("open", () => {
      socket.removeListener("error", onHandshakeError);
      logger.debug({ url }, "Event channel connected");
      settle(() => resolve(new WsEventChannel(socket, options, logger)));
    });

    socket.once("unexpected-response", (_req, res) => {
      const status = res.statusCode ?? 0;
      settle(() =>
        reject(
          status === 401
            ? new UnauthorizedError({ url })
            : new ConnectError(`Unexpected response ${status} from ${url}`, {
                url,
                status,
              }),
        ),
      );
      socket.terminate();
    });

    // Stays attached until open: terminate() during the handshake emits one
    const onHandshakeError = (err: Error) => {
      settle(() =>
        reject(
          new ConnectError(`Failed to connect to ${url}: ${err.message}`, { url }, {
            cause: err,
          }),
        ),
      );
    };
    socket.on("error", onHandshakeError);

    socket.once("close", (code) => {
      settle(() =>
        reject(new ConnectError(`Connection to ${url} closed (${code})`, { url })),
      );
    });
  });
}
