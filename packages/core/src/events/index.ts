export {
  parseGatewayFrame,
  connectionUpdate,
  type GatewayEvent,
  type IncomingMessageEvent,
  type GatewayStatusEvent,
  type ConnectionUpdateEvent,
  type FrameParseResult,
} from "./types.js";
export { DispatchRegistry, type EventCallback } from "./dispatch.js";
export {
  EventConnection,
  type EventConnectionOptions,
  type ConnectionInfo,
} from "./connection.js";
