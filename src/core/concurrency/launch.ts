// src/core/concurrency/launch.ts
// Independently scheduled tasks

import { setImmediate } from "node:timers";

export type TaskOutcome = { tag: "completed" } | { tag: "failed"; error: unknown };

export type Task = {
  id: string;
  name: string;
  /** Settles when the body finishes; never rejects. */
  done: Promise<TaskOutcome>;
};

let nextTaskId = 0;

/**
 * Reset task ids (for testing).
 */
export function resetTaskIds(): void {
  nextTaskId = 0;
}

/**
 * Run `body` on a later turn of the event loop, off the caller's stack.
 * A failure is reported through `done`, not thrown.
 */
export function launch(name: string, body: () => Promise<void>): Task {
  const id = `task-${nextTaskId++}`;
  const done = new Promise<void>((resolve) => setImmediate(() => resolve()))
    .then(body)
    .then(
      (): TaskOutcome => ({ tag: "completed" }),
      (error: unknown): TaskOutcome => ({ tag: "failed", error })
    );
  return { id, name, done };
}
