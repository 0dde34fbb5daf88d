import { sleepMs } from "./sleep";

export type RetryPolicy = {
    /** Espera fija antes de cada intento. */
    delayMs: number;
    isRetryable: (e: unknown) => boolean;
    onRetry?: (e: unknown, attempt: number) => void;
};

/**
 * Reintenta `attempt` con una espera fija. No hay backoff: el que llama corta el
 * loop abortando `signal`.
 */
export async function retryWithFixedDelay<A>(
    attempt: () => A | Promise<A>,
    p: RetryPolicy,
    signal?: AbortSignal,
): Promise<A> {
    for (let n = 1; ; n++) {
        await sleepMs(p.delayMs, signal);
        try {
            return await attempt();
        } catch (e) {
            if (!p.isRetryable(e)) throw e;
            p.onRetry?.(e, n);
        }
    }
}
