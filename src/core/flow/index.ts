// src/core/flow/index.ts
export { ObjFlow, ObjFlowBuilder, ObjFlowIterator, resetFlowIds } from "./flow";
