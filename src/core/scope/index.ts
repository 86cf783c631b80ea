// src/core/scope/index.ts
export { Scope, ClosureScope, type ChildScopeOptions } from "./scope";
export { Arguments, evaluateArguments } from "./arguments";
export { statement, type Statement } from "./statement";
