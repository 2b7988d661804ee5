export { type MemoryAdapterOptions, memoryAdapter } from "./adapter.js";
export { KeyedLockManager } from "./locks.js";
