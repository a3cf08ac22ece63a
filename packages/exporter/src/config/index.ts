export { parseFlags, DEFAULT_FLAGS, USAGE } from "./flags.js";
export type { CliFlags } from "./flags.js";
export {
  loadConfig,
  resolveConfig,
  parseConfigFile,
  parseListenAddress,
  normalizeMetricsPath,
} from "./load-config.js";
export { parseDuration } from "./duration.js";
export { ConfigFile } from "./config.schemas.js";
