import { describe, it, expect } from "vitest";
import { formatEvent, formatMessage, formatStatus } from "./format.js";

const message = {
  message_id: 4,
  phone_number: "+10000000001",
  message_content: "hello there",
  message_reference: null,
  is_outgoing: false,
  status: "Received",
  created_at: 1_700_000_000,
  completed_at: null,
};

describe("formatMessage", () => {
  it("prints time, direction, number, status and text", () => {
    expect(formatMessage(message)).toBe(
      "2023-11-14T22:13:20.000Z <- +10000000001 [Received] hello there",
    );
  });

  it("marks outgoing messages and missing timestamps", () => {
    expect(
      formatMessage({ ...message, is_outgoing: true, status: "Sent", created_at: null }),
    ).toBe("- -> +10000000001 [Sent] hello there");
  });
});

describe("formatEvent", () => {
  const receivedAt = new Date(0);

  it("formats each event kind", () => {
    expect(formatEvent({ kind: "incoming_message", message, receivedAt })).toBe(
      "incoming 2023-11-14T22:13:20.000Z <- +10000000001 [Received] hello there",
    );
    expect(
      formatEvent({
        kind: "gateway_status",
        type: "modem_status_update",
        data: { online: true },
        receivedAt,
      }),
    ).toBe('modem_status_update {"online":true}');
  });

  it("describes connection updates", () => {
    const update = (connected: boolean, reconnect: boolean) =>
      formatEvent({ kind: "connection_update", connected, reconnect, receivedAt });

    expect(update(true, false)).toBe("connected");
    expect(update(false, true)).toBe("disconnected, reconnecting");
    expect(update(false, false)).toBe("disconnected");
  });
});

describe("formatStatus", () => {
  it("lists every reading", () => {
    expect(
      formatStatus({
        version: "0.0.1+test",
        phoneNumber: null,
        network: { registration: 1, technology: 7 },
        signal: { rssi: 18, ber: 99 },
        battery: { status: 0, charge: 87, voltage: 4.1 },
      }),
    ).toBe(
      [
        "version:      0.0.1+test",
        "phone number: -",
        "network:      registration 1, technology 7",
        "signal:       rssi 18, ber 99",
        "battery:      87% (4.1 V)",
      ].join("\n"),
    );
  });
});
