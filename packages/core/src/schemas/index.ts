export {
  DEFAULTS,
  LogLevel,
  ClientConfigSchema,
  WebSocketConfigSchema,
  HttpConfigSchema,
  type ClientConfig,
  type ClientConfigInput,
  type WebSocketConfig,
  type HttpConfig,
  type LoggingConfig,
} from "./client-config.js";
export {
  SmsStoredMessageSchema,
  SmsDeliveryReportSchema,
  LatestNumberSchema,
  SmsSendResponseSchema,
  NetworkStatusSchema,
  SignalStrengthSchema,
  NetworkOperatorSchema,
  BatteryLevelSchema,
  type SmsStoredMessage,
  type SmsDeliveryReport,
  type LatestNumber,
  type SmsSendResponse,
  type NetworkStatus,
  type SignalStrength,
  type NetworkOperator,
  type BatteryLevel,
  type SmsOutgoingMessage,
  type PaginationOptions,
} from "./sms.js";
