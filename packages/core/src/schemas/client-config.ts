import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  websocket: {
    autoReconnect: true,
    reconnectIntervalMs: 5_000,
    maxReconnectDelayMs: 60_000,
    reconnectJitterMs: 1_000,
    maxReconnectAttempts: null,
    pingIntervalMs: 10_000,
    pingTimeoutMs: 30_000,
    filteredEvents: null,
  },
  http: {
    baseTimeoutMs: 5_000,
    modemTimeoutMs: 20_000,
  },
};

export const LogLevel = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const WebSocketConfigSchema = z.object({
  url: z.url({ protocol: /^wss?$/ }),
  authorization: z
    .string()
    .min(1)
    .optional()
    .describe("Overrides the shared authorization token for this channel"),
  autoReconnect: z.boolean().default(DEFAULTS.websocket.autoReconnect),
  reconnectIntervalMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULTS.websocket.reconnectIntervalMs),
  maxReconnectDelayMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULTS.websocket.maxReconnectDelayMs),
  reconnectJitterMs: z
    .number()
    .int()
    .min(0)
    .default(DEFAULTS.websocket.reconnectJitterMs),
  maxReconnectAttempts: z
    .number()
    .int()
    .positive()
    .nullable()
    .default(DEFAULTS.websocket.maxReconnectAttempts)
    .describe("null keeps reconnecting until stopped"),
  pingIntervalMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULTS.websocket.pingIntervalMs),
  pingTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULTS.websocket.pingTimeoutMs),
  filteredEvents: z
    .array(z.string().min(1))
    .min(1)
    .nullable()
    .default(DEFAULTS.websocket.filteredEvents)
    .describe("Event names the gateway should send; null sends everything"),
});

export const HttpConfigSchema = z.object({
  url: z.url({ protocol: /^https?$/ }),
  authorization: z.string().min(1).optional(),
  baseTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULTS.http.baseTimeoutMs),
  modemTimeoutMs: z
    .number()
    .int()
    .positive()
    .nullable()
    .default(DEFAULTS.http.modemTimeoutMs)
    .describe("Timeout for requests that wait on the modem; null uses baseTimeoutMs"),
});

export const ClientConfigSchema = z
  .object({
    websocket: WebSocketConfigSchema.optional(),
    http: HttpConfigSchema.optional(),
    authorization: z
      .string()
      .min(1)
      .optional()
      .describe("Shared authorization token for both channels"),
    certificate: z
      .string()
      .min(1)
      .optional()
      .describe("Path to a .pem, .crt or .der certificate to trust"),
    logging: z
      .object({
        level: LogLevel.default(DEFAULTS.logging.level),
        pretty: z.boolean().default(DEFAULTS.logging.pretty),
      })
      .default(DEFAULTS.logging),
  })
  .refine((config) => config.websocket !== undefined || config.http !== undefined, {
    message: "At least one of websocket or http must be configured",
  });

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type WebSocketConfig = z.infer<typeof WebSocketConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type LoggingConfig = ClientConfig["logging"];
