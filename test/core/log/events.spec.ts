// test/core/log/events.spec.ts

import { describe, it, expect } from "vitest";
import { createEventLedger, eventsOfTag, summarizeEvents } from "../../../src/core/log/events";

describe("event ledger", () => {
  it("records events in order and summarizes them by tag", () => {
    const ledger = createEventLedger();
    ledger.record({ tag: "flowStarted", flowId: 1, timestamp: 10 });
    ledger.record({ tag: "instanceCreated", className: "Point", timestamp: 11 });
    ledger.record({ tag: "flowStarted", flowId: 2, timestamp: 12 });

    expect(ledger.events.map((e) => e.tag)).toEqual(["flowStarted", "instanceCreated", "flowStarted"]);
    expect(summarizeEvents(ledger.events)).toEqual({ flowStarted: 2, instanceCreated: 1 });
    expect(eventsOfTag(ledger.events, "flowStarted").map((e) => e.flowId)).toEqual([1, 2]);
    expect(eventsOfTag(ledger.events, "producerFailed")).toEqual([]);
  });
});
