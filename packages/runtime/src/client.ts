/**
 * SmsClient: one object over both gateway channels.
 *
 * Either channel may be left unconfigured; reaching for a missing one
 * throws MissingClientError. The callback registry lives here, not on the
 * connection, so a callback registered once survives every new run.
 */

import { resolveEndpointConfig, type EndpointConfig } from "@smsgate/core/config";
import { MissingClientError, NotRunningError } from "@smsgate/core/errors";
import {
  DispatchRegistry,
  EventConnection,
  type ConnectionInfo,
  type EventCallback,
} from "@smsgate/core/events";
import type { SmsHttpClient } from "@smsgate/core/http";
import { createSmsHttpClient } from "@smsgate/core/http";
import { createLogger, type Logger } from "@smsgate/core/logger";
import type { ClientConfig } from "@smsgate/core/schemas";
import {
  defaultTransport,
  loadCertificate,
  type TransportAdapter,
} from "@smsgate/core/transport";
import { ExecutionDriver, type BackgroundHandle } from "./driver.js";

export interface SmsClientOptions {
  transport?: TransportAdapter;
  /** Defaults to a pino logger built from config.logging. */
  logger?: Logger;
  /** Jitter source for reconnect backoff. */
  random?: () => number;
}

export class SmsClient {
  private constructor(
    readonly endpoints: EndpointConfig,
    private readonly httpClient: SmsHttpClient | null,
    private readonly driver: ExecutionDriver | null,
    private readonly dispatcher: DispatchRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Builds a client from a validated config. The certificate, if any, is
   * read once here and shared by both channels.
   */
  static async create(
    config: ClientConfig,
    options: SmsClientOptions = {},
  ): Promise<SmsClient> {
    const endpoints = resolveEndpointConfig(config);
    const logger = options.logger ?? createLogger(endpoints.logging);
    const transport = options.transport ?? defaultTransport;
    const ca = endpoints.certificate
      ? await loadCertificate(endpoints.certificate)
      : undefined;

    const httpConfig = endpoints.http;
    const httpClient = httpConfig
      ? createSmsHttpClient(
          transport.openRequestChannel({
            baseUrl: httpConfig.url,
            authorization: httpConfig.authorization,
            ca,
          }),
          { http: httpConfig, logger },
        )
      : null;

    const dispatcher = new DispatchRegistry(logger);
    const websocket = endpoints.websocket;
    const driver = websocket
      ? new ExecutionDriver({
          createConnection: () =>
            new EventConnection({
              websocket,
              ca,
              dispatcher,
              transport,
              logger,
              random: options.random,
            }),
          logger,
        })
      : null;

    logger.debug(
      { http: httpClient !== null, websocket: driver !== null },
      "SMS client created",
    );
    return new SmsClient(endpoints, httpClient, driver, dispatcher, logger);
  }

  /** HTTP command client. */
  http(): SmsHttpClient {
    if (!this.httpClient) throw new MissingClientError("http");
    return this.httpClient;
  }

  /** Connection of the current or last run, or null before the first run. */
  events(): EventConnection | null {
    return this.requireDriver().connection();
  }

  /** Install the event callback, replacing any previous one. */
  onEvent(callback: EventCallback): void {
    this.requireDriver();
    this.dispatcher.register(callback);
  }

  clearCallback(): void {
    this.dispatcher.clear();
  }

  async runBlocking(): Promise<void> {
    await this.requireDriver().runBlocking();
  }

  runBackground(): BackgroundHandle {
    return this.requireDriver().runBackground();
  }

  /** Ask the active connection to drop and connect again. */
  reconnect(): void {
    const connection = this.requireDriver().connection();
    if (!connection) throw new NotRunningError("idle");
    connection.reconnect();
  }

  connectionInfo(): ConnectionInfo | null {
    return this.driver?.connection()?.getInfo() ?? null;
  }

  async stop(): Promise<void> {
    await this.driver?.stop();
  }

  /** Stop the event connection and release the HTTP channel. */
  async close(): Promise<void> {
    await this.stop();
    await this.httpClient?.close();
    this.logger.debug("SMS client closed");
  }

  private requireDriver(): ExecutionDriver {
    if (!this.driver) throw new MissingClientError("websocket");
    return this.driver;
  }
}
