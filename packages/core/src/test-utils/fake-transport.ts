/**
 * In-memory stand-ins for the transport adapter.
 * Frames are pushed by the test; failures are scripted per attempt.
 */

import { ChannelClosedError } from "../errors/catalog.js";
import type { TransportAdapter } from "../transport/index.js";
import type {
  EventChannel,
  EventChannelOptions,
} from "../transport/event-channel.js";
import type {
  RawResponse,
  RequestChannel,
  RequestMethod,
  RequestOptions,
} from "../transport/request-channel.js";

interface Waiter {
  resolve: (frame: string) => void;
  reject: (reason: unknown) => void;
}

export class FakeEventChannel implements EventChannel {
  closed = false;
  private readonly frames: string[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;

  /** Queue a frame; objects are JSON-encoded. */
  push(frame: string | object): void {
    const text = typeof frame === "string" ? frame : JSON.stringify(frame);
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(text);
    } else {
      this.frames.push(text);
    }
  }

  /** Simulate the remote end going away. */
  drop(error: Error = new ChannelClosedError(1006, "connection lost")): void {
    if (this.failure) return;
    this.failure = error;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(error);
    }
  }

  /** Number of frames not yet read. */
  get pending(): number {
    return this.frames.length;
  }

  read(signal?: AbortSignal): Promise<string> {
    const next = this.frames.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiter = {
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
    this.closed = true;
    this.drop(new ChannelClosedError(1000, "closed by client"));
  }
}

type OpenStep = { kind: "fail"; error: Error } | { kind: "hang" };

export class FakeTransport implements Pick<TransportAdapter, "openEventChannel"> {
  /** Options of every attempt, successful or not. */
  readonly attempts: EventChannelOptions[] = [];
  readonly channels: FakeEventChannel[] = [];
  private readonly script: OpenStep[] = [];
  private readonly openListeners: Array<() => void> = [];

  /** Make the next attempt reject with error. */
  failNext(error: Error, times = 1): this {
    for (let i = 0; i < times; i++) this.script.push({ kind: "fail", error });
    return this;
  }

  /** Make the next attempt wait until its signal aborts. */
  hangNext(): this {
    this.script.push({ kind: "hang" });
    return this;
  }

  /** Resolves with the nth channel (1-based) once it has been opened. */
  opened(n: number): Promise<FakeEventChannel> {
    return new Promise((resolve) => {
      const check = () => {
        const channel = this.channels[n - 1];
        if (!channel) return false;
        resolve(channel);
        return true;
      };
      if (check()) return;
      const listener = () => {
        if (check()) {
          this.openListeners.splice(this.openListeners.indexOf(listener), 1);
        }
      };
      this.openListeners.push(listener);
    });
  }

  openEventChannel(
    options: EventChannelOptions,
    signal?: AbortSignal,
  ): Promise<EventChannel> {
    this.attempts.push(options);
    if (signal?.aborted) return Promise.reject(signal.reason);

    const step = this.script.shift();
    if (step?.kind === "fail") return Promise.reject(step.error);
    if (step?.kind === "hang") {
      return new Promise<EventChannel>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(signal.reason), {
          once: true,
        });
      });
    }

    const channel = new FakeEventChannel();
    this.channels.push(channel);
    for (const listener of [...this.openListeners]) listener();
    return Promise.resolve(channel);
  }
}

export interface RecordedRequest {
  method: RequestMethod;
  path: string;
  options: RequestOptions;
}

/** Request channel answering from a queue of canned responses. */
export class FakeRequestChannel implements RequestChannel {
  readonly requests: RecordedRequest[] = [];
  closed = false;
  private readonly responses: Array<RawResponse | Error> = [];

  /** Queue a JSON envelope `{ success: true, response }`. */
  respond(response: unknown, status = 200): this {
    return this.respondRaw({
      status,
      contentType: "application/json",
      body: JSON.stringify({ success: true, response }),
    });
  }

  respondRaw(response: RawResponse | Error): this {
    this.responses.push(response);
    return this;
  }

  request(
    method: RequestMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<RawResponse> {
    this.requests.push({ method, path, options });
    const next = this.responses.shift();
    if (next === undefined) {
      return Promise.reject(new Error(`No response queued for ${method} ${path}`));
    }
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve(next);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
