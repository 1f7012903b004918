import type {
  ConnectionState,
  StateChangeListener,
} from "../lifecycle/state-machine.js";

interface Observable {
  getState(): ConnectionState;
  onStateChange(listener: StateChangeListener): () => void;
}

/** Resolves once target reaches state (immediately if it already has). */
export function waitForState(
  target: Observable,
  state: ConnectionState,
): Promise<void> {
  if (target.getState() === state) return Promise.resolve();
  return new Promise((resolve) => {
    const unsubscribe = target.onStateChange((event) => {
      if (event.to === state) {
        unsubscribe();
        resolve();
      }
    });
  });
}

/** Let queued promise callbacks run. */
export async function flushMicrotasks(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
