/**
 * HTTP command client for the SMS gateway.
 *
 * Covers sending messages, the gateway's message database (history,
 * latest numbers, delivery reports, friendly names) and modem/system
 * queries. Modem queries wait on the hardware, so they get their own
 * timeout.
 */

import { z } from "zod";
import type { Logger } from "pino";
import { createSilentLogger } from "../logger/index.js";
import { paginateOffset } from "../pagination/offset.js";
import type { Paginator } from "../pagination/paginator.js";
import type { HttpConfig } from "../schemas/client-config.js";
import {
  BatteryLevelSchema,
  LatestNumberSchema,
  NetworkOperatorSchema,
  NetworkStatusSchema,
  SignalStrengthSchema,
  SmsDeliveryReportSchema,
  SmsSendResponseSchema,
  SmsStoredMessageSchema,
  type BatteryLevel,
  type LatestNumber,
  type NetworkOperator,
  type NetworkStatus,
  type PaginationOptions,
  type SignalStrength,
  type SmsDeliveryReport,
  type SmsOutgoingMessage,
  type SmsSendResponse,
  type SmsStoredMessage,
} from "../schemas/sms.js";
import type {
  RequestChannel,
  RequestMethod,
} from "../transport/request-channel.js";
import { readEnvelope, readModemResponse } from "./response.js";

/** Extra time allowed on top of a message's own send timeout. */
const SEND_TIMEOUT_MARGIN_MS = 5_000;

export interface SmsHttpClient {
  sendSms(message: SmsOutgoingMessage): Promise<SmsSendResponse>;
  getMessages(
    phoneNumber: string,
    pagination?: PaginationOptions,
  ): Promise<SmsStoredMessage[]>;
  getLatestNumbers(pagination?: PaginationOptions): Promise<LatestNumber[]>;
  getDeliveryReports(
    messageId: number,
    pagination?: PaginationOptions,
  ): Promise<SmsDeliveryReport[]>;
  /** Set, or with null remove, the friendly name for a number. */
  setFriendlyName(phoneNumber: string, friendlyName: string | null): Promise<boolean>;
  getFriendlyName(phoneNumber: string): Promise<string | null>;

  getNetworkStatus(): Promise<NetworkStatus>;
  getSignalStrength(): Promise<SignalStrength>;
  getNetworkOperator(): Promise<NetworkOperator>;
  getServiceProvider(): Promise<string>;
  getBatteryLevel(): Promise<BatteryLevel>;

  /** The gateway's own number, if it has been configured with one. */
  getPhoneNumber(): Promise<string | null>;
  getVersion(): Promise<string>;

  paginateMessages(
    phoneNumber: string,
    options?: PaginationOptions,
  ): Paginator<SmsStoredMessage, number>;
  paginateLatestNumbers(options?: PaginationOptions): Paginator<LatestNumber, number>;
  paginateDeliveryReports(
    messageId: number,
    options?: PaginationOptions,
  ): Paginator<SmsDeliveryReport, number>;

  close(): Promise<void>;
}

export interface SmsHttpClientOptions {
  http: Pick<HttpConfig, "baseTimeoutMs" | "modemTimeoutMs">;
  logger?: Logger;
}

/** Only the pagination fields that were set, as the gateway expects them. */
function paginationBody(pagination: PaginationOptions): Record<string, unknown> {
  return {
    ...(pagination.limit !== undefined && { limit: pagination.limit }),
    ...(pagination.offset !== undefined && { offset: pagination.offset }),
    ...(pagination.reverse !== undefined && { reverse: pagination.reverse }),
  };
}

export function createSmsHttpClient(
  channel: RequestChannel,
  options: SmsHttpClientOptions,
): SmsHttpClient {
  const logger = options.logger ?? createSilentLogger();
  const baseTimeoutMs = options.http.baseTimeoutMs;
  const modemTimeoutMs = options.http.modemTimeoutMs ?? baseTimeoutMs;

  async function call<T>(
    method: RequestMethod,
    path: string,
    schema: z.ZodType<T>,
    request: { body?: unknown; timeoutMs?: number } = {},
  ): Promise<T> {
    logger.debug({ method, path }, "Gateway request");
    const raw = await channel.request(method, path, {
      body: request.body,
      timeoutMs: request.timeoutMs ?? baseTimeoutMs,
    });
    return readEnvelope(raw, schema);
  }

  async function modem<T>(
    route: string,
    expectedType: string,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const path = `/sms/${route}`;
    logger.debug({ method: "GET", path }, "Gateway modem request");
    const raw = await channel.request("GET", path, { timeoutMs: modemTimeoutMs });
    return readModemResponse(raw, expectedType, schema);
  }

  const client: SmsHttpClient = {
    async sendSms(message) {
      const timeoutMs =
        message.timeout !== undefined
          ? message.timeout * 1_000 + SEND_TIMEOUT_MARGIN_MS
          : modemTimeoutMs;
      return call("POST", "/sms/send", SmsSendResponseSchema, {
        body: message,
        timeoutMs,
      });
    },

    async getMessages(phoneNumber, pagination) {
      return call("POST", "/db/sms", z.array(SmsStoredMessageSchema), {
        body: { phone_number: phoneNumber, ...paginationBody(pagination ?? {}) },
      });
    },

    async getLatestNumbers(pagination) {
      return call("POST", "/db/latest-numbers", z.array(LatestNumberSchema), {
        body: pagination ? paginationBody(pagination) : undefined,
      });
    },

    async getDeliveryReports(messageId, pagination) {
      return call("POST", "/db/delivery-reports", z.array(SmsDeliveryReportSchema), {
        body: { message_id: messageId, ...paginationBody(pagination ?? {}) },
      });
    },

    async setFriendlyName(phoneNumber, friendlyName) {
      return call("POST", "/db/friendly-names/set", z.boolean(), {
        body: { phone_number: phoneNumber, friendly_name: friendlyName },
      });
    },

    async getFriendlyName(phoneNumber) {
      return call("POST", "/db/friendly-names/get", z.string().nullable(), {
        body: { phone_number: phoneNumber },
      });
    },

    getNetworkStatus: () => modem("modem-status", "NetworkStatus", NetworkStatusSchema),
    getSignalStrength: () =>
      modem("signal-strength", "SignalStrength", SignalStrengthSchema),
    getNetworkOperator: () =>
      modem("network-operator", "NetworkOperator", NetworkOperatorSchema),
    getServiceProvider: () => modem("service-provider", "ServiceProvider", z.string()),
    getBatteryLevel: () => modem("battery-level", "BatteryLevel", BatteryLevelSchema),

    async getPhoneNumber() {
      return call("GET", "/sys/phone-number", z.string().nullable());
    },

    async getVersion() {
      return call("GET", "/sys/version", z.string());
    },

    paginateMessages(phoneNumber, options) {
      return paginateOffset((page) => client.getMessages(phoneNumber, page), options);
    },

    paginateLatestNumbers(options) {
      return paginateOffset((page) => client.getLatestNumbers(page), options);
    },

    paginateDeliveryReports(messageId, options) {
      return paginateOffset(
        (page) => client.getDeliveryReports(messageId, page),
        options,
      );
    },

    async close() {
      await channel.close();
    },
  };

  return client;
}
