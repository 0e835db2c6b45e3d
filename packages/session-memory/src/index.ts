export type { MemorySessionRepositoryOptions } from "./memory-session-repository.js";
export { MemorySessionRepository, createMemorySessionRepository } from "./memory-session-repository.js";
