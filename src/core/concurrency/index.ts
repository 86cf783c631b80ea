// src/core/concurrency/index.ts
export { Mutex, resetMutexIds } from "./mutex";
export {
  type ReceiveResult,
  RendezvousChannel,
  ChannelClosedError,
  resetChannelIds,
} from "./channel";
export { type Task, type TaskOutcome, launch, resetTaskIds } from "./launch";
