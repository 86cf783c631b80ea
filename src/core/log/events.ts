// src/core/log/events.ts
// Runtime events: definitions, instantiations and flow transitions.

// ─────────────────────────────────────────────────────────────────
// Event types
// ─────────────────────────────────────────────────────────────────

export type RuntimeEvent =
  | { tag: "classDefined"; className: string; classId: number; parents: string[]; timestamp: number }
  | { tag: "memberDeclared"; className: string; name: string; isStatic: boolean; layoutVersion: number; timestamp: number }
  | { tag: "instanceCreated"; className: string; timestamp: number }
  | { tag: "exceptionClassRegistered"; className: string; timestamp: number }
  | { tag: "flowStarted"; flowId: number; timestamp: number }
  | { tag: "flowCompleted"; flowId: number; timestamp: number }
  | { tag: "flowCancelled"; flowId: number; timestamp: number }
  | { tag: "producerFailed"; flowId: number; message: string; timestamp: number };

export type RuntimeEventTag = RuntimeEvent["tag"];

export type EventHook = (event: RuntimeEvent) => void;

// ─────────────────────────────────────────────────────────────────
// Event ledger
// ─────────────────────────────────────────────────────────────────

export type EventLedger = {
  events: RuntimeEvent[];
  record: EventHook;
};

/**
 * Create an event ledger; pass `ledger.record` as a runtime's `onEvent`.
 */
export function createEventLedger(): EventLedger {
  const events: RuntimeEvent[] = [];
  return {
    events,
    record: (event) => {
      events.push(event);
    },
  };
}

/**
 * Count events per tag.
 */
export function summarizeEvents(events: readonly RuntimeEvent[]): Partial<Record<RuntimeEventTag, number>> {
  const counts: Partial<Record<RuntimeEventTag, number>> = {};
  for (const e of events) {
    counts[e.tag] = (counts[e.tag] ?? 0) + 1;
  }
  return counts;
}

/**
 * Events of one tag, narrowed.
 */
export function eventsOfTag<T extends RuntimeEventTag>(
  events: readonly RuntimeEvent[],
  tag: T
): Extract<RuntimeEvent, { tag: T }>[] {
  return events.filter((e): e is Extract<RuntimeEvent, { tag: T }> => e.tag === tag);
}
