/**
 * Typed error catalog for the SMS gateway client.
 *
 * Transport failures (ConnectError, ChannelClosedError) are normally handled
 * by the reconnect policy and only reach the caller when reconnecting is off
 * or has been given up. Misuse and request failures are always surfaced.
 */

export class SmsClientError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Configuration

export class ConfigError extends SmsClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", `Missing/invalid configuration: ${message}`, details);
  }
}

export class TlsError extends SmsClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("TLS_ERROR", message, undefined, options);
  }
}

export class MissingClientError extends SmsClientError {
  constructor(public readonly channel: "http" | "websocket") {
    super(
      "MISSING_CLIENT",
      channel === "http"
        ? "No HTTP client configured"
        : "No WebSocket client configured",
      { channel },
    );
  }
}

// Event channel

export class ConnectError extends SmsClientError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super("CONNECT_FAILED", message, details, options);
  }
}

export class UnauthorizedError extends SmsClientError {
  constructor(details?: Record<string, unknown>) {
    super("UNAUTHORIZED", "The event channel connection was unauthorized", details);
  }
}

export class ChannelClosedError extends SmsClientError {
  constructor(
    public readonly closeCode: number,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(
      "CHANNEL_CLOSED",
      reason
        ? `Event channel closed (${closeCode}): ${reason}`
        : `Event channel closed (${closeCode})`,
      { closeCode, reason },
      options,
    );
  }
}

export class ReconnectLimitError extends SmsClientError {
  constructor(attempts: number, options?: ErrorOptions) {
    super(
      "RECONNECT_LIMIT",
      `Gave up reconnecting after ${attempts} attempts`,
      { attempts },
      options,
    );
  }
}

export class AlreadyRunningError extends SmsClientError {
  constructor(state: string) {
    super("ALREADY_RUNNING", `Already running (state: ${state})`, { state });
  }
}

export class NotRunningError extends SmsClientError {
  constructor(state: string) {
    super("NOT_RUNNING", `Not running (state: ${state})`, { state });
  }
}

// Request channel

export class HttpStatusError extends SmsClientError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super("HTTP_STATUS", `HTTP ${status}: ${body}`, { status });
  }
}

export class ApiError extends SmsClientError {
  constructor(message: string) {
    super("API_ERROR", `API responded with success=false: ${message}`);
  }
}

export class ResponseFormatError extends SmsClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("RESPONSE_FORMAT", message, undefined, options);
  }
}

// Pagination

export class PaginationFetchError extends SmsClientError {
  constructor(cursor: unknown, options?: ErrorOptions) {
    super(
      "PAGINATION_FETCH",
      `Failed to fetch page at cursor ${JSON.stringify(cursor)}`,
      undefined,
      options,
    );
  }
}
