import { describe, it, expect } from "@jest/globals";
import { isAggregateSuccess, isRetryWorthy } from "./classify.js";
import { TransportError } from "./errors.js";

describe("classification", () => {
  const transport = new TransportError("fetch failed");

  it("should retry on errors and 5xx only", () => {
    expect(isRetryWorthy({ statusCode: 0, error: transport })).toBe(true);
    expect(isRetryWorthy({ statusCode: 500 })).toBe(true);
    expect(isRetryWorthy({ statusCode: 503 })).toBe(true);
    expect(isRetryWorthy({ statusCode: 499 })).toBe(false);
    expect(isRetryWorthy({ statusCode: 404 })).toBe(false);
    expect(isRetryWorthy({ statusCode: 200 })).toBe(false);
  });

  it("should count only error-free statuses below 400 as success", () => {
    expect(isAggregateSuccess({ statusCode: 200 })).toBe(true);
    expect(isAggregateSuccess({ statusCode: 399 })).toBe(true);
    expect(isAggregateSuccess({ statusCode: 400 })).toBe(false);
    expect(isAggregateSuccess({ statusCode: 503 })).toBe(false);
    expect(isAggregateSuccess({ statusCode: 0, error: transport })).toBe(false);
  });

  it("should treat an error-free zero status as success", () => {
    expect(isAggregateSuccess({ statusCode: 0 })).toBe(true);
  });

  it("should leave 4xx neither retried nor successful", () => {
    const outcome = { statusCode: 430 };
    expect(isRetryWorthy(outcome)).toBe(false);
    expect(isAggregateSuccess(outcome)).toBe(false);
  });
});
