export { createProgram, runProbe } from "./program.js";
export type { RunDependencies } from "./program.js";
export {
  cliOptionsSchema,
  parseCliOptions,
  parseDuration,
  toPingerOptions,
} from "./config.js";
export type { CliConfig, RawCliOptions } from "./config.js";
export { loadUrls, normalizeUrl, parseUrlList } from "./urls.js";
export {
  formatClock,
  formatDuration,
  formatResult,
  formatSummary,
  printResult,
  printSummary,
} from "./formatter.js";
export { onShutdownSignal } from "./signals.js";
