// src/core/runtime/sleep.ts

export class Interrupted extends Error {
    readonly _tag = "Interrupt";

    constructor(message = "interrupted") {
        super(message);
        this.name = "Interrupted";
    }
}

export const isInterrupted = (e: unknown): e is Interrupted => e instanceof Interrupted;

/** Tira `Interrupted` si la señal ya fue abortada. */
export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw new Interrupted();
}

/** sleep cancelable: si se aborta la señal, se limpia el timer y rechaza con `Interrupted` */
export const sleepMs = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) return reject(new Interrupted());

        const onAbort = () => {
            clearTimeout(id);
            reject(new Interrupted());
        };

        const id = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);

        signal?.addEventListener("abort", onAbort, { once: true });
    });
