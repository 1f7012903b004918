import type { GatewayEvent } from "@smsgate/core/events";
import type {
  BatteryLevel,
  NetworkStatus,
  SignalStrength,
  SmsStoredMessage,
} from "@smsgate/core/schemas";

function timestamp(seconds: number | null | undefined): string {
  return seconds == null ? "-" : new Date(seconds * 1_000).toISOString();
}

/** One line per stored message: time, direction, number, status, text. */
export function formatMessage(message: SmsStoredMessage): string {
  const direction = message.is_outgoing ? "->" : "<-";
  return `${timestamp(message.created_at)} ${direction} ${message.phone_number} [${message.status}] ${message.message_content}`;
}

export function formatEvent(event: GatewayEvent): string {
  switch (event.kind) {
    case "incoming_message":
      return `incoming ${formatMessage(event.message)}`;
    case "gateway_status":
      return `${event.type} ${JSON.stringify(event.data)}`;
    case "connection_update":
      if (event.connected) return "connected";
      return event.reconnect ? "disconnected, reconnecting" : "disconnected";
  }
}

export interface StatusReport {
  version: string;
  phoneNumber: string | null;
  network: NetworkStatus;
  signal: SignalStrength;
  battery: BatteryLevel;
}

export function formatStatus(report: StatusReport): string {
  return [
    `version:      ${report.version}`,
    `phone number: ${report.phoneNumber ?? "-"}`,
    `network:      registration ${report.network.registration}, technology ${report.network.technology}`,
    `signal:       rssi ${report.signal.rssi}, ber ${report.signal.ber}`,
    `battery:      ${report.battery.charge}% (${report.battery.voltage} V)`,
  ].join("\n");
}
