import { describe, expect, it, vi } from "vitest";
import { calculateBackOff, withRetry } from "./retry";

const options = {
  maxAttempts: 5,
  initialDelay: 100,
  maxDelay: 1000,
  backoffFactor: 2,
  jitter: 0,
  isRetryable: () => true,
  onRetry: () => {},
};

describe("calculateBackOff", () => {
  it("should grow exponentially and stop at the maximum delay", () => {
    expect(calculateBackOff(0, options)).toBe(100);
    expect(calculateBackOff(1, options)).toBe(200);
    expect(calculateBackOff(3, options)).toBe(800);
    expect(calculateBackOff(4, options)).toBe(1000);
  });

  it("should stay constant with a factor of one", () => {
    expect(calculateBackOff(7, { ...options, backoffFactor: 1 })).toBe(100);
  });
});

describe("withRetry", () => {
  it("should return the result of the first successful attempt", async () => {
    // GIVEN
    const operation = vi.fn(async () => "ok");

    // WHEN
    const outcome = await withRetry(operation);

    // THEN
    expect(outcome).toMatchObject({ successful: true, result: "ok", attempts: 1 });
    expect(operation).toHaveBeenCalledWith(1);
  });

  it("should retry until the operation succeeds", async () => {
    // GIVEN
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new Error(`attempt ${attempt} failed`);
      }
      return attempt;
    });
    const onRetry = vi.fn();

    // WHEN
    const outcome = await withRetry(operation, {
      initialDelay: 0,
      maxAttempts: 5,
      onRetry,
    });

    // THEN
    expect(outcome).toMatchObject({ successful: true, result: 3, attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, 0, new Error("attempt 1 failed"));
  });

  it("should make exactly maxAttempts attempts before giving up", async () => {
    // GIVEN
    const operation = vi.fn(async () => {
      throw new Error("still down");
    });

    // WHEN
    const outcome = await withRetry(operation, { maxAttempts: 3, initialDelay: 0 });

    // THEN
    expect(operation).toHaveBeenCalledTimes(3);
    expect(outcome.successful).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.successful) {
      expect(outcome.lastError.message).toBe("still down");
    }
  });

  it("should stop at the first error that is not retryable", async () => {
    // GIVEN
    const operation = vi.fn(async () => {
      throw new TypeError("fatal");
    });

    // WHEN
    const outcome = await withRetry(operation, {
      maxAttempts: 5,
      initialDelay: 0,
      isRetryable: (error) => !(error instanceof TypeError),
    });

    // THEN
    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome.successful).toBe(false);
  });

  it("should wrap values thrown that are not errors", async () => {
    // GIVEN
    const operation = async (): Promise<never> => {
      throw "plain string";
    };

    // WHEN
    const outcome = await withRetry(operation, { maxAttempts: 1 });

    // THEN
    expect(outcome.successful).toBe(false);
    if (!outcome.successful) {
      expect(outcome.lastError).toBeInstanceOf(Error);
      expect(outcome.lastError.message).toBe("plain string");
    }
  });
});
