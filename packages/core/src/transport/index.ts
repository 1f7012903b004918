import {
  openEventChannel,
  type EventChannel,
  type EventChannelOptions,
} from "./event-channel.js";
import {
  openRequestChannel,
  type RequestChannel,
  type RequestChannelOptions,
} from "./request-channel.js";

export {
  openEventChannel,
  buildEventUrl,
  type EventChannel,
  type EventChannelOptions,
} from "./event-channel.js";
export {
  openRequestChannel,
  joinUrl,
  type RequestChannel,
  type RequestChannelOptions,
  type RequestMethod,
  type RequestOptions,
  type RawResponse,
} from "./request-channel.js";
export { loadCertificate, verifyCertificatePath } from "./tls.js";

/** Seam between the client and the network, replaced by fakes in tests. */
export interface TransportAdapter {
  openEventChannel(
    options: EventChannelOptions,
    signal?: AbortSignal,
  ): Promise<EventChannel>;
  openRequestChannel(options: RequestChannelOptions): RequestChannel;
}

export const defaultTransport: TransportAdapter = {
  openEventChannel,
  openRequestChannel,
};
