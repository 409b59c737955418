// SDK - probing engine
export {
  AdmissionGate,
  Aggregator,
  CancellationController,
  CancelledError,
  ConfigError,
  ErrorCode,
  Pinger,
  ProbeError,
  RateLimiter,
  ResultChannel,
  TimeoutError,
  TransportError,
  backoffDelay,
  dispatchRounds,
  isAggregateSuccess,
  isCancelledError,
  isRetryWorthy,
  probeOnce,
  probeWithRetries,
  sleep,
} from "./sdk/index.js";
export type {
  AggregateStats,
  Fetcher,
  PingerOptions,
  ProbeResult,
  ProbeSummary,
  ResultCallback,
} from "./sdk/index.js";

// CLI - command-line surface
export { createProgram, runProbe } from "./cli/index.js";
export type { RawCliOptions, RunDependencies } from "./cli/index.js";
