export {
  FakeEventChannel,
  FakeTransport,
  FakeRequestChannel,
  type RecordedRequest,
} from "./fake-transport.js";
export { waitForState, flushMicrotasks } from "./wait.js";
