import { describe, expect, it, vi } from "vitest";
import { retryWithFixedDelay } from "../src/core/runtime/retry";
import { Interrupted, isInterrupted, sleepMs, throwIfAborted } from "../src/core/runtime/sleep";
import { Deferred, race } from "../src/core/runtime/structuredConcurrency";

describe("sleepMs", () => {
    it("resolves after the delay", async () => {
        vi.useFakeTimers();
        try {
            let done = false;
            const p = sleepMs(50).then(() => {
                done = true;
            });
            await vi.advanceTimersByTimeAsync(49);
            expect(done).toBe(false);
            await vi.advanceTimersByTimeAsync(1);
            await p;
            expect(done).toBe(true);
        } finally {
            vi.useRealTimers();
        }
    });

    it("rejects with Interrupted when aborted", async () => {
        const ac = new AbortController();
        const p = sleepMs(10_000, ac.signal);
        ac.abort();
        await expect(p).rejects.toBeInstanceOf(Interrupted);
    });

    it("rejects at once on an aborted signal", async () => {
        await expect(sleepMs(1, AbortSignal.abort())).rejects.toBeInstanceOf(Interrupted);
        expect(() => throwIfAborted(AbortSignal.abort())).toThrow(Interrupted);
        expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
        expect(isInterrupted(new Error("x"))).toBe(false);
    });
});

describe("race", () => {
    it("returns the winner and aborts the loser", async () => {
        let loserSignal: AbortSignal | undefined;
        const v = await race(
            async () => "fast",
            (s) => {
                loserSignal = s;
                return sleepMs(10_000, s).then(() => "slow");
            },
        );
        expect(v).toBe("fast");
        expect(loserSignal?.aborted).toBe(true);
    });

    it("propagates the first failure", async () => {
        await expect(
            race(
                () => Promise.reject(new Error("left")),
                (s) => sleepMs(10_000, s),
            ),
        ).rejects.toThrow("left");
    });

    it("interrupts both sides when the parent aborts", async () => {
        const ac = new AbortController();
        const p = race(
            (s) => sleepMs(10_000, s),
            (s) => sleepMs(10_000, s),
            ac.signal,
        );
        ac.abort();
        await expect(p).rejects.toBeInstanceOf(Interrupted);
    });
});

describe("Deferred", () => {
    it("resolves once with the first value", async () => {
        const d = new Deferred<number>();
        expect(d.isDone).toBe(false);
        d.succeed(1);
        d.succeed(2);
        expect(d.isDone).toBe(true);
        await expect(d.promise).resolves.toBe(1);
    });
});

describe("retryWithFixedDelay", () => {
    const retryable = (e: unknown) => e instanceof Error && e.message === "again";

    it("retries retryable failures until the attempt succeeds", async () => {
        let calls = 0;
        const retries: number[] = [];
        const v = await retryWithFixedDelay(
            () => {
                calls++;
                if (calls < 3) throw new Error("again");
                return "ok";
            },
            { delayMs: 1, isRetryable: retryable, onRetry: (_e, n) => retries.push(n) },
        );
        expect(v).toBe("ok");
        expect(calls).toBe(3);
        expect(retries).toEqual([1, 2]);
    });

    it("gives up on other errors at once", async () => {
        let calls = 0;
        await expect(
            retryWithFixedDelay(
                () => {
                    calls++;
                    throw new Error("fatal");
                },
                { delayMs: 1, isRetryable: retryable },
            ),
        ).rejects.toThrow("fatal");
        expect(calls).toBe(1);
    });

    it("is interrupted through its signal", async () => {
        const ac = new AbortController();
        const p = retryWithFixedDelay(
            () => {
                throw new Error("again");
            },
            { delayMs: 5, isRetryable: retryable, onRetry: () => ac.abort() },
            ac.signal,
        );
        await expect(p).rejects.toBeInstanceOf(Interrupted);
    });
});
