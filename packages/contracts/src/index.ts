export * from "./types/domain-error.js";
export * from "./errors.js";

export * from "./ports/sessions/session.js";
export * from "./ports/sessions/session-id-generator-port.js";
export * from "./ports/sessions/index-resolver-port.js";
export * from "./ports/sessions/session-events-port.js";
export * from "./ports/sessions/session-repository-port.js";
