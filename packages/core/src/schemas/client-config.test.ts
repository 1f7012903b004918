import { describe, it, expect } from "vitest";
import { ClientConfigSchema, WebSocketConfigSchema } from "./client-config.js";
import { SmsStoredMessageSchema } from "./sms.js";

describe("ClientConfigSchema", () => {
  it("fills websocket defaults", () => {
    const config = ClientConfigSchema.parse({
      websocket: { url: "ws://192.168.1.2:3000/ws" },
    });

    expect(config.websocket).toEqual({
      url: "ws://192.168.1.2:3000/ws",
      autoReconnect: true,
      reconnectIntervalMs: 5_000,
      maxReconnectDelayMs: 60_000,
      reconnectJitterMs: 1_000,
      maxReconnectAttempts: null,
      pingIntervalMs: 10_000,
      pingTimeoutMs: 30_000,
      filteredEvents: null,
    });
    expect(config.http).toBeUndefined();
    expect(config.logging).toEqual({ level: "info", pretty: false });
  });

  it("fills http defaults", () => {
    const config = ClientConfigSchema.parse({
      http: { url: "http://192.168.1.2:3000" },
    });

    expect(config.http).toEqual({
      url: "http://192.168.1.2:3000",
      baseTimeoutMs: 5_000,
      modemTimeoutMs: 20_000,
    });
  });

  it("rejects a config with neither channel", () => {
    const result = ClientConfigSchema.safeParse({ authorization: "test-token" });
    expect(result.success).toBe(false);
  });

  it("rejects an http url on the websocket channel", () => {
    const result = WebSocketConfigSchema.safeParse({ url: "http://localhost:3000" });
    expect(result.success).toBe(false);
  });

  it("accepts wss urls and explicit overrides", () => {
    const config = WebSocketConfigSchema.parse({
      url: "wss://gateway.example.com/ws",
      autoReconnect: false,
      maxReconnectAttempts: 5,
      filteredEvents: ["incoming"],
    });

    expect(config.autoReconnect).toBe(false);
    expect(config.maxReconnectAttempts).toBe(5);
    expect(config.filteredEvents).toEqual(["incoming"]);
  });

  it("rejects an empty filter list", () => {
    const result = WebSocketConfigSchema.safeParse({
      url: "ws://localhost:3000/ws",
      filteredEvents: [],
    });
    expect(result.success).toBe(false);
  });

  it("rejects non-positive timeouts", () => {
    const result = ClientConfigSchema.safeParse({
      http: { url: "http://localhost:3000", baseTimeoutMs: 0 },
    });
    expect(result.success).toBe(false);
  });
});

describe("SmsStoredMessageSchema", () => {
  it("accepts null optional fields", () => {
    const message = SmsStoredMessageSchema.parse({
      message_id: 7,
      phone_number: "+447700900123",
      message_content: "hello",
      message_reference: null,
      is_outgoing: false,
      status: "received",
      created_at: 1_760_000_000,
      completed_at: null,
    });

    expect(message.message_id).toBe(7);
    expect(message.completed_at).toBeNull();
  });

  it("rejects a message without content", () => {
    const result = SmsStoredMessageSchema.safeParse({
      message_id: 7,
      phone_number: "+447700900123",
      is_outgoing: false,
      status: "received",
    });
    expect(result.success).toBe(false);
  });
});
