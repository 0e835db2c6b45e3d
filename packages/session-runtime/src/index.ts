export type {
  SessionRuntime,
  SessionRuntimeOverrides,
  SessionRuntimeRepository,
} from "./runtime.js";
export { createSessionRuntime } from "./runtime.js";
