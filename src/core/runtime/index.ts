// src/core/runtime/index.ts
export { Runtime, RuntimeConfigError, createRuntime, type RuntimeOptions, type FlowProducer } from "./runtime";
export { createServices, defaultServices, type RuntimeServices } from "./services";
