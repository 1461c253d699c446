export { Runtime, NEGOTIATION_TIMEOUT_MS } from "./runtime.js";
export type { RuntimeDeps, RuntimeHandle } from "./runtime.js";
