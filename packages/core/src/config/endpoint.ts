import type {
  ClientConfig,
  HttpConfig,
  LoggingConfig,
  WebSocketConfig,
} from "../schemas/client-config.js";
import { expandHomePath } from "./paths.js";

/**
 * Per-channel settings after the shared authorization token has been applied.
 * Frozen: a client never changes its endpoints once built.
 */
export interface EndpointConfig {
  readonly websocket: Readonly<WebSocketConfig> | null;
  readonly http: Readonly<HttpConfig> | null;
  /** Absolute certificate path, or null for the default trust store. */
  readonly certificate: string | null;
  readonly logging: Readonly<LoggingConfig>;
}

export function resolveEndpointConfig(config: ClientConfig): EndpointConfig {
  const shared = config.authorization;

  const websocket = config.websocket
    ? Object.freeze({
        ...config.websocket,
        authorization: config.websocket.authorization ?? shared,
        filteredEvents: config.websocket.filteredEvents
          ? [...config.websocket.filteredEvents]
          : null,
      })
    : null;

  const http = config.http
    ? Object.freeze({
        ...config.http,
        authorization: config.http.authorization ?? shared,
      })
    : null;

  return Object.freeze({
    websocket,
    http,
    certificate: config.certificate ? expandHomePath(config.certificate) : null,
    logging: Object.freeze({ ...config.logging }),
  });
}
