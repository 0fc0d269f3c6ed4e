export { type StateBackend, isExpired } from "./backend.js";
export { LocalBackend, type LocalBackendConfig } from "./local.js";
export { MemoryBackend, type MemoryBackendOptions } from "./memory.js";
