export { Pinger } from "./pinger.js";
export { probeOnce } from "./prober.js";
export { backoffDelay, probeWithRetries } from "./retry.js";
export { RateLimiter } from "./rateLimiter.js";
export { AdmissionGate } from "./admissionGate.js";
export { ResultChannel } from "./channel.js";
export { Aggregator } from "./aggregator.js";
export { dispatchRounds } from "./dispatcher.js";
export {
  CancellationController,
  MAX_TIMER_DELAY_MS,
  sleep,
} from "./cancellation.js";
export { isAggregateSuccess, isRetryWorthy } from "./classify.js";
export {
  CancelledError,
  ConfigError,
  ErrorCode,
  ProbeError,
  TimeoutError,
  TransportError,
  isCancelledError,
} from "./errors.js";
export type {
  AggregateStats,
  Fetcher,
  PingerOptions,
  ProbeResult,
  ProbeSummary,
  ResultCallback,
} from "./types.js";
export type { AttemptResult, ProbeOptions } from "./prober.js";
export type { RetriedResult, RetryOptions } from "./retry.js";
export type { DispatchOptions, DispatchReport } from "./dispatcher.js";
export type { Release } from "./admissionGate.js";
