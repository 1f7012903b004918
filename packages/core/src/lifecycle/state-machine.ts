/**
 * State machine for one event-channel connection.
 *
 * States:
 * - idle: Built, never started
 * - connecting: Opening the event channel
 * - open: Channel up, reading and dispatching events
 * - reconnecting: Waiting out the backoff before the next attempt
 * - closed: Stopped or failed for good (terminal)
 */

export type ConnectionState =
  | "idle"
  | "connecting"
  | "open"
  | "reconnecting"
  | "closed";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<ConnectionState, ReadonlySet<ConnectionState>> = {
  idle: new Set(["connecting", "closed"]),
  connecting: new Set(["open", "reconnecting", "closed"]),
  open: new Set(["reconnecting", "closed"]),
  reconnecting: new Set(["connecting", "closed"]),
  closed: new Set(),
};

export interface StateTransitionEvent {
  from: ConnectionState;
  to: ConnectionState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class ConnectionStateMachine {
  private state: ConnectionState = "idle";
  private listeners: StateChangeListener[] = [];

  /** Get the current state. */
  getState(): ConnectionState {
    return this.state;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: ConnectionState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: ConnectionState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${to}`);
    }

    const event: StateTransitionEvent = {
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
