// src/core/pos/index.ts
export { Source, Pos } from "./source";
