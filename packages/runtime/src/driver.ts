/**
 * Execution driver for the event connection.
 *
 * Two ways to run the same connection: runBlocking() keeps the caller
 * until the connection closes, runBackground() hands back a handle right
 * away. Only one run is active at a time; once it has closed, the next run
 * gets a fresh connection from the factory.
 */

import { AlreadyRunningError } from "@smsgate/core/errors";
import type { EventConnection } from "@smsgate/core/events";
import { createSilentLogger, type Logger } from "@smsgate/core/logger";

export interface BackgroundHandle {
  readonly connection: EventConnection;
  /** Settles when the connection closes: resolves on stop, rejects on failure. */
  readonly done: Promise<void>;
  stop(): Promise<void>;
}

export interface ExecutionDriverOptions {
  createConnection: () => EventConnection;
  logger?: Logger;
}

export class ExecutionDriver {
  private readonly createConnection: () => EventConnection;
  private readonly logger: Logger;
  private current: EventConnection | null = null;

  constructor(options: ExecutionDriverOptions) {
    this.createConnection = options.createConnection;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Start and wait until the connection closes. Resolves after stop();
   * rejects with the error that closed the connection otherwise.
   */
  async runBlocking(): Promise<void> {
    const connection = this.launch();
    await connection.closed();
  }

  /** Start and return immediately. */
  runBackground(): BackgroundHandle {
    const connection = this.launch();
    const done = connection.closed();
    done.catch((err: unknown) => {
      this.logger.error({ err }, "Background event connection closed with an error");
    });

    return {
      connection,
      done,
      stop: () => connection.stop(),
    };
  }

  /** Stop the active run, if any. */
  async stop(): Promise<void> {
    await this.current?.stop();
  }

  isRunning(): boolean {
    return this.current !== null && this.current.getState() !== "closed";
  }

  /** Connection of the current or most recent run. */
  connection(): EventConnection | null {
    return this.current;
  }

  private launch(): EventConnection {
    if (this.current && this.current.getState() !== "closed") {
      throw new AlreadyRunningError(this.current.getState());
    }
    const connection = this.createConnection();
    this.current = connection;
    connection.start();
    return connection;
  }
}
