/**
 * Metrics Module
 *
 * Prometheus exposition of one collection cycle.
 */

export { Exposition } from "./exposition.js";
export type { ExpositionOptions } from "./exposition.js";
