import { describe, expect, it, vi } from "vitest";
import { ProviderError } from "../entities/errors.js";
import {
    backoffDelay,
    DEFAULT_RETRY_POLICY,
    RetryAbortedError,
    RetryDeadlineError,
    type RetryPolicy,
    withRetry,
} from "./retry-policy.js";

const policy: RetryPolicy = {
    maxAttempts: 4,
    initialDelayMs: 100,
    maxDelayMs: 300,
    multiplier: 2,
};

function throttled() {
    return new ProviderError("Rate exceeded", { transient: true });
}

describe("backoffDelay", () => {
    it("should grow exponentially up to the cap", () => {
        const delays = [1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt));

        expect(delays).toEqual([100, 200, 300, 300]);
    });

    it("should start the default policy at 250ms", () => {
        expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(250);
    });
});

describe("withRetry", () => {
    describe("given an operation that succeeds after transient failures", () => {
        it("should retry with backoff and report the attempts", async () => {
            const sleep = vi.fn().mockResolvedValue(undefined);
            const onRetry = vi.fn();
            const operation = vi
                .fn<(attempt: number) => Promise<string>>()
                .mockRejectedValueOnce(throttled())
                .mockRejectedValueOnce(throttled())
                .mockResolvedValue("done");

            const result = await withRetry(operation, { policy, sleep, onRetry });

            expect(result).toEqual({ value: "done", attempts: 3 });
            expect(sleep.mock.calls).toEqual([[100, undefined], [200, undefined]]);
            expect(onRetry).toHaveBeenCalledTimes(2);
        });
    });

    describe("given a permanent failure", () => {
        it("should rethrow without retrying", async () => {
            const sleep = vi.fn().mockResolvedValue(undefined);
            const failure = new ProviderError("Invalid parameter", { transient: false });
            const operation = vi.fn().mockRejectedValue(failure);

            await expect(withRetry(operation, { policy, sleep })).rejects.toBe(failure);
            expect(operation).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });
    });

    describe("given an error that is not a provider error", () => {
        it("should rethrow without retrying", async () => {
            const sleep = vi.fn().mockResolvedValue(undefined);
            const operation = vi.fn().mockRejectedValue(new TypeError("bad input"));

            await expect(withRetry(operation, { policy, sleep })).rejects.toThrow("bad input");
            expect(operation).toHaveBeenCalledTimes(1);
        });
    });

    describe("given transient failures on every attempt", () => {
        it("should give up after the attempt limit with the last error", async () => {
            const sleep = vi.fn().mockResolvedValue(undefined);
            const operation = vi.fn().mockRejectedValue(throttled());

            await expect(withRetry(operation, { policy, sleep })).rejects.toThrow(
                "Rate exceeded",
            );
            expect(operation).toHaveBeenCalledTimes(4);
            expect(sleep).toHaveBeenCalledTimes(3);
        });
    });

    describe("given a cancelled run", () => {
        it("should stop retrying", async () => {
            const controller = new AbortController();
            controller.abort();
            const sleep = vi.fn().mockResolvedValue(undefined);
            const operation = vi.fn().mockRejectedValue(throttled());

            await expect(
                withRetry(operation, { policy, sleep, signal: controller.signal }),
            ).rejects.toBeInstanceOf(RetryAbortedError);
            expect(operation).toHaveBeenCalledTimes(1);
        });
    });

    describe("given a deadline shorter than the backoff", () => {
        it("should shorten the last sleep and stop at the deadline", async () => {
            let clock = 0;
            const sleep = vi.fn(async (ms: number) => {
                clock += ms;
            });
            const operation = vi.fn().mockRejectedValue(throttled());

            const error = await withRetry(operation, {
                policy,
                sleep,
                deadline: 150,
                now: () => clock,
            }).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(RetryDeadlineError);
            expect(error).toMatchObject({ attempts: 2 });
            expect(operation).toHaveBeenCalledTimes(2);
            expect(sleep.mock.calls).toEqual([
                [100, undefined],
                [50, undefined],
            ]);
        });
    });
});
