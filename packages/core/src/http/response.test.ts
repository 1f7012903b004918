import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  ApiError,
  HttpStatusError,
  ResponseFormatError,
} from "../errors/catalog.js";
import { readEnvelope, readModemResponse } from "./response.js";

function json(body: unknown, status = 200) {
  return { status, contentType: "application/json", body: JSON.stringify(body) };
}

describe("readEnvelope", () => {
  it("returns the validated response field", () => {
    expect(readEnvelope(json({ success: true, response: "1.2.0" }), z.string())).toBe(
      "1.2.0",
    );
  });

  it("accepts a null response when the schema allows it", () => {
    expect(
      readEnvelope(json({ success: true, response: null }), z.string().nullable()),
    ).toBeNull();
  });

  it("throws ApiError with the gateway's message", () => {
    expect(() =>
      readEnvelope(json({ success: false, error: "Invalid phone number" }, 400), z.string()),
    ).toThrow("API responded with success=false: Invalid phone number");
  });

  it("treats a missing success flag as a failure", () => {
    expect(() => readEnvelope(json({ response: "x" }), z.string())).toThrow(
      new ApiError("Unknown API error!"),
    );
  });

  it("throws when the response field is missing", () => {
    expect(() => readEnvelope(json({ success: true }), z.string())).toThrow(
      "Missing response field",
    );
  });

  it("throws ResponseFormatError when the payload does not match", () => {
    expect(() =>
      readEnvelope(json({ success: true, response: 42 }), z.string()),
    ).toThrow(ResponseFormatError);
  });

  it("throws HttpStatusError for a non-JSON error status", () => {
    const raw = { status: 502, contentType: "text/plain", body: "Bad Gateway" };
    expect(() => readEnvelope(raw, z.string())).toThrow(new HttpStatusError(502, "Bad Gateway"));
    expect(() => readEnvelope(raw, z.string())).toThrow("HTTP 502: Bad Gateway");
  });

  it("throws for a non-JSON success response", () => {
    const raw = { status: 200, contentType: null, body: "ok" };
    expect(() => readEnvelope(raw, z.string())).toThrow(ResponseFormatError);
  });

  it("throws for a body that claims JSON but is not", () => {
    const raw = { status: 200, contentType: "application/json; charset=utf-8", body: "{" };
    expect(() => readEnvelope(raw, z.string())).toThrow("Response body is not valid JSON");
  });
});

describe("readModemResponse", () => {
  const schema = z.object({ rssi: z.number(), ber: z.number() });

  it("returns the data of a matching type", () => {
    const raw = json({
      success: true,
      response: { type: "SignalStrength", data: { rssi: 20, ber: 99 } },
    });
    expect(readModemResponse(raw, "SignalStrength", schema)).toEqual({ rssi: 20, ber: 99 });
  });

  it("rejects a mismatched type", () => {
    const raw = json({
      success: true,
      response: { type: "BatteryLevel", data: { rssi: 20, ber: 99 } },
    });
    expect(() => readModemResponse(raw, "SignalStrength", schema)).toThrow(
      "Response type mismatch: expected SignalStrength, got BatteryLevel",
    );
  });

  it("rejects a response without a type", () => {
    const raw = json({ success: true, response: { data: {} } });
    expect(() => readModemResponse(raw, "SignalStrength", schema)).toThrow(
      ResponseFormatError,
    );
  });
});
