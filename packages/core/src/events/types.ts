import { z } from "zod";
import {
  SmsStoredMessageSchema,
  type SmsStoredMessage,
} from "../schemas/sms.js";

/** An SMS received by the gateway. */
export interface IncomingMessageEvent {
  kind: "incoming_message";
  message: SmsStoredMessage;
  receivedAt: Date;
}

/**
 * Any other gateway notification (outgoing, delivery, modem_status_update,
 * gnss_position_report, or a type this client does not know). Not examined.
 */
export interface GatewayStatusEvent {
  kind: "gateway_status";
  type: string;
  data: unknown;
  receivedAt: Date;
}

/** Emitted locally whenever the event channel comes up or goes down. */
export interface ConnectionUpdateEvent {
  kind: "connection_update";
  connected: boolean;
  /** True when the drop will be followed by a reconnect attempt. */
  reconnect: boolean;
  receivedAt: Date;
}

export type GatewayEvent =
  | IncomingMessageEvent
  | GatewayStatusEvent
  | ConnectionUpdateEvent;

const FrameSchema = z.object({
  type: z.string(),
  data: z.unknown().optional(),
});

export type FrameParseResult =
  | { ok: true; event: IncomingMessageEvent | GatewayStatusEvent }
  | { ok: false; reason: string };

/** Decode one text frame from the event channel. */
export function parseGatewayFrame(
  text: string,
  receivedAt: Date = new Date(),
): FrameParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const frame = FrameSchema.safeParse(raw);
  if (!frame.success) {
    return { ok: false, reason: z.prettifyError(frame.error) };
  }

  const { type, data } = frame.data;
  if (type !== "incoming") {
    return { ok: true, event: { kind: "gateway_status", type, data, receivedAt } };
  }

  const message = SmsStoredMessageSchema.safeParse(data);
  if (!message.success) {
    return {
      ok: false,
      reason: `Invalid incoming message: ${z.prettifyError(message.error)}`,
    };
  }
  return {
    ok: true,
    event: { kind: "incoming_message", message: message.data, receivedAt },
  };
}

export function connectionUpdate(
  connected: boolean,
  reconnect: boolean,
): ConnectionUpdateEvent {
  return { kind: "connection_update", connected, reconnect, receivedAt: new Date() };
}
