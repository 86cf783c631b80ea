// src/core/errors/signals.ts
// Internal control signals. These are host errors, never script exceptions,
// and are absorbed at a fixed boundary (producer loop, iterator driver).

/**
 * Thrown by a flow builder's `emit` once the consumer has cancelled the
 * iteration or the channel is closed.
 */
export class FlowNoLongerCollected extends Error {
  constructor() {
    super("flow is no longer collected");
    this.name = "FlowNoLongerCollected";
  }
}

/**
 * Ends an `enumerate` loop early from inside its callback.
 */
export class IterationFinished extends Error {
  constructor() {
    super("iteration finished");
    this.name = "IterationFinished";
  }
}

export function isControlSignal(e: unknown): e is FlowNoLongerCollected | IterationFinished {
  return e instanceof FlowNoLongerCollected || e instanceof IterationFinished;
}
