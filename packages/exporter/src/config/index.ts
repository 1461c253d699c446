export {
  ENV_KEYS,
  buildSnapshot,
  fromEnv,
  loadConfig,
  parseDuration,
  readConfigFile,
} from "./load-config.js";
export type { Env } from "./load-config.js";
export { deepFreeze, describeSnapshot, maskCredential, withApiVersion } from "./snapshot.js";
export { RawConfig, DURATION_PATTERN } from "./config.schemas.js";
