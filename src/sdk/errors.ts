export enum ErrorCode {
  TRANSPORT = "TRANSPORT",
  TIMEOUT = "TIMEOUT",
  CANCELLED = "CANCELLED",
  INVALID_CONFIG = "INVALID_CONFIG",
}

/**
 * Base class for every error fleetping produces.
 */
export class ProbeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string,
  ) {
    super(message || code);
    this.name = code;
  }
}

/**
 * No HTTP response was obtained (connection refused, DNS failure, reset...).
 */
export class TransportError extends ProbeError {
  constructor(message: string) {
    super(ErrorCode.TRANSPORT, message);
  }
}

export class TimeoutError extends ProbeError {
  constructor(public readonly timeoutMs: number) {
    super(ErrorCode.TIMEOUT, `Timeout after ${timeoutMs}ms`);
  }
}

export class CancelledError extends ProbeError {
  constructor(reason?: string) {
    super(ErrorCode.CANCELLED, reason ?? "Run cancelled");
  }
}

export class ConfigError extends ProbeError {
  constructor(message: string) {
    super(ErrorCode.INVALID_CONFIG, message);
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof ProbeError && error.code === ErrorCode.CANCELLED;
}

/**
 * Turn an abort reason into the CancelledError that results carry.
 */
export function toCancelledError(reason: unknown): CancelledError {
  if (isCancelledError(reason)) {
    return reason;
  }
  if (typeof reason === "string") {
    return new CancelledError(reason);
  }
  return new CancelledError();
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
