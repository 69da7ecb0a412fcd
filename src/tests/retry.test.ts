import { describe, it, expect } from "vitest";
import { OperationCancelledError, RetryExhaustedError, StoreUnavailableError, VersionConflictError } from "../errors";
import { DEFAULT_RETRY_POLICY, backoffDelay, withConflictRetry } from "../retry";

const conflict = () => new VersionConflictError({ partition: "balance#u1", sort: "current" }, 1, 2);
const policy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000 };

describe("DEFAULT_RETRY_POLICY", () => {
    it("allows five attempts with a 25ms base and a 1s cap", () => {
        expect(DEFAULT_RETRY_POLICY).toEqual({ maxAttempts: 5, baseDelayMs: 25, maxDelayMs: 1000 });
    });
});

describe("backoffDelay", () => {
    it("draws from the upper half of a doubling ceiling", () => {
        expect(backoffDelay(1, policy, () => 0)).toBe(50);
        expect(backoffDelay(1, policy, () => 1)).toBe(100);
        expect(backoffDelay(4, policy, () => 0.5)).toBe(600);
    });

    it("never exceeds the cap", () => {
        expect(backoffDelay(10, policy, () => 0)).toBe(500);
        expect(backoffDelay(10, policy, () => 1)).toBe(1000);
    });
});

describe("withConflictRetry", () => {
    it("retries version conflicts with backoff until the step lands", async () => {
        const sleeps: number[] = [];
        let calls = 0;
        const result = await withConflictRetry("test", async () => {
            calls++;
            if (calls < 3) throw conflict();
            return "done";
        }, { baseDelayMs: 10, maxDelayMs: 100, random: () => 0, sleep: async (ms) => { sleeps.push(ms); } });

        expect(result).toBe("done");
        expect(calls).toBe(3);
        expect(sleeps).toEqual([5, 10]);
    });

    it("gives up with RetryExhaustedError after the attempt ceiling", async () => {
        let calls = 0;
        const run = withConflictRetry("ledger.credit", async () => {
            calls++;
            throw conflict();
        }, { maxAttempts: 3, sleep: async () => {} });

        await expect(run).rejects.toBeInstanceOf(RetryExhaustedError);
        await expect(run).rejects.toMatchObject({ operation: "ledger.credit", attempts: 3, retryable: true });
        expect(calls).toBe(3);
    });

    it("does not retry other errors", async () => {
        let calls = 0;
        const run = withConflictRetry("test", async () => {
            calls++;
            throw new StoreUnavailableError("get");
        }, { sleep: async () => {} });

        await expect(run).rejects.toBeInstanceOf(StoreUnavailableError);
        expect(calls).toBe(1);
    });

    it("never starts when the signal is already aborted", async () => {
        const controller = new AbortController();
        controller.abort();
        let calls = 0;

        await expect(withConflictRetry("test", async () => { calls++; }, { signal: controller.signal }))
            .rejects.toBeInstanceOf(OperationCancelledError);
        expect(calls).toBe(0);
    });

    it("stops retrying once the signal aborts", async () => {
        const controller = new AbortController();
        let calls = 0;
        const run = withConflictRetry("test", async () => {
            calls++;
            throw conflict();
        }, { signal: controller.signal, sleep: async () => controller.abort() });

        await expect(run).rejects.toBeInstanceOf(OperationCancelledError);
        expect(calls).toBe(1);
    });
});
