/**
 * Gateway response envelopes.
 *
 * Every JSON response is `{ success, response?, error? }`. Modem queries
 * wrap their payload once more as `{ type, data }`, with `type` naming the
 * kind of reading so a mismatched route is caught.
 */

import { z } from "zod";
import {
  ApiError,
  HttpStatusError,
  ResponseFormatError,
} from "../errors/catalog.js";
import type { RawResponse } from "../transport/request-channel.js";

const EnvelopeSchema = z.object({
  success: z.boolean().optional(),
  response: z.unknown().optional(),
  error: z.string().nullish(),
});

const ModemEnvelopeSchema = z.object({
  type: z.string(),
  data: z.unknown(),
});

function isJson(raw: RawResponse): boolean {
  return raw.contentType?.includes("application/json") ?? false;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function validate<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ResponseFormatError(
      `Unexpected ${what} payload: ${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Unwrap the envelope and validate its `response` field.
 * A JSON body decides the outcome even on an error status, since the
 * gateway reports its own errors that way.
 */
export function readEnvelope<T>(
  raw: RawResponse,
  schema: z.ZodType<T>,
  what = "response",
): T {
  if (!isJson(raw)) {
    if (!isSuccessStatus(raw.status)) {
      throw new HttpStatusError(raw.status, raw.body);
    }
    throw new ResponseFormatError("Missing response field");
  }

  let body: unknown;
  try {
    body = JSON.parse(raw.body);
  } catch (err) {
    throw new ResponseFormatError("Response body is not valid JSON", { cause: err });
  }

  const envelope = validate(EnvelopeSchema, body, "envelope");
  if (envelope.success !== true) {
    throw new ApiError(envelope.error ?? "Unknown API error!");
  }
  if (envelope.response === undefined) {
    throw new ResponseFormatError("Missing response field");
  }
  return validate(schema, envelope.response, what);
}

/** Unwrap a modem reading, checking that its type is the one asked for. */
export function readModemResponse<T>(
  raw: RawResponse,
  expectedType: string,
  schema: z.ZodType<T>,
): T {
  const modem = readEnvelope(raw, ModemEnvelopeSchema, "modem response");
  if (modem.type !== expectedType) {
    throw new ResponseFormatError(
      `Response type mismatch: expected ${expectedType}, got ${modem.type}`,
    );
  }
  return validate(schema, modem.data, expectedType);
}
