export {
  SmsClientError,
  ConfigError,
  TlsError,
  MissingClientError,
  ConnectError,
  UnauthorizedError,
  ChannelClosedError,
  ReconnectLimitError,
  AlreadyRunningError,
  NotRunningError,
  HttpStatusError,
  ApiError,
  ResponseFormatError,
  PaginationFetchError,
} from "./catalog.js";
