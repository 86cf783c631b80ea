// src/index.ts
// marl runtime - Public API
//
// Object model, exceptions and cold flows for an embeddable scripting
// language, driven from host code.

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME CONTEXT
// ═══════════════════════════════════════════════════════════════════════════════

export { Runtime, RuntimeConfigError, createRuntime, type RuntimeOptions, type FlowProducer } from "./core/runtime";
export { createServices, defaultServices, type RuntimeServices } from "./core/runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES & CLASSES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/obj";
export { Source, Pos } from "./core/pos";

// ═══════════════════════════════════════════════════════════════════════════════
// SCOPES
// ═══════════════════════════════════════════════════════════════════════════════

export { Scope, ClosureScope, Arguments, evaluateArguments, statement, type Statement, type ChildScopeOptions } from "./core/scope";

// ═══════════════════════════════════════════════════════════════════════════════
// EXCEPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// ITERATION & FLOWS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/iter";
export { ObjFlow, ObjFlowBuilder, ObjFlowIterator } from "./core/flow";
export { Mutex, RendezvousChannel, ChannelClosedError, launch, type ReceiveResult, type Task, type TaskOutcome } from "./core/concurrency";

// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/codec";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export * from "./core/log";
