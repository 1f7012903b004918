export {
  ConnectionStateMachine,
  type ConnectionState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
export { computeBackoffDelay, sleep, type BackoffOptions } from "./backoff.js";
