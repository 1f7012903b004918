export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  expandHomePath,
  loadConfig,
  parseConfig,
  configFromEnv,
  resolveEndpointConfig,
  type LoadConfigOptions,
  type EndpointConfig,
} from "@smsgate/core/config";
export type {
  ClientConfig,
  ClientConfigInput,
  SmsStoredMessage,
  SmsDeliveryReport,
  SmsOutgoingMessage,
  SmsSendResponse,
  LatestNumber,
  PaginationOptions,
} from "@smsgate/core/schemas";
export * from "@smsgate/core/errors";
export {
  ConnectionStateMachine,
  type ConnectionState,
  type StateTransitionEvent,
} from "@smsgate/core/lifecycle";
export {
  EventConnection,
  type GatewayEvent,
  type EventCallback,
  type ConnectionInfo,
} from "@smsgate/core/events";
export { createSmsHttpClient, type SmsHttpClient } from "@smsgate/core/http";
export { Paginator, paginateOffset, type Page, type FetchPage } from "@smsgate/core/pagination";
export { createLogger, type Logger } from "@smsgate/core/logger";
export {
  SmsClient,
  ExecutionDriver,
  type SmsClientOptions,
  type BackgroundHandle,
} from "@smsgate/runtime";
export { createProgram } from "./program.js";
