import type { Logger } from "../core/runtime/logger";
import { sleepMs, throwIfAborted } from "../core/runtime/sleep";
import { race } from "../core/runtime/structuredConcurrency";
import type { ProcessLauncher } from "./process";

/** Abre la traza (que sigue creciendo) en un visualizador y espera a que se cierre. */
export type Viewer = (tracefile: string, signal: AbortSignal) => Promise<void>;

export function commandViewer(command: readonly string[], launcher: ProcessLauncher, logger: Logger): Viewer {
    return async (tracefile, signal) => {
        throwIfAborted(signal);
        const child = await launcher.spawn([...command, tracefile], process.env);
        const onAbort = () => child.kill("SIGTERM");
        signal.addEventListener("abort", onAbort, { once: true });
        try {
            const exit = await child.exited;
            if (exit.code !== 0) logger.warn("viewer exited abnormally", { code: exit.code, signal: exit.signal });
        } finally {
            signal.removeEventListener("abort", onAbort);
        }
    };
}

export type HandOffOptions = {
    viewer: Viewer;
    tracefile: string;
    /** Se resuelve con el primer evento traducido. */
    firstEvent: Promise<void>;
    waitMs: number;
    signal: AbortSignal;
    logger: Logger;
};

/**
 * Le da al hijo hasta `waitMs` para producir algo antes de mostrar la traza.
 * Best effort: si el visualizador falla se loguea y la grabación sigue.
 */
export async function handOffToViewer(o: HandOffOptions): Promise<void> {
    await race(
        () => o.firstEvent,
        (s) => sleepMs(o.waitMs, s),
        o.signal,
    );
    o.logger.debug("opening viewer", { tracefile: o.tracefile });
    try {
        await o.viewer(o.tracefile, o.signal);
    } catch (e) {
        if (o.signal.aborted) throw e;
        o.logger.warn("viewer failed", { error: e instanceof Error ? e.message : String(e) });
    }
}
