import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { dumpRegistry } from "../core/runtime/dump";
import { silentLogger, type Logger } from "../core/runtime/logger";
import { retryWithFixedDelay } from "../core/runtime/retry";
import { acquireRelease, Scope } from "../core/runtime/scope";
import { sleepMs, throwIfAborted } from "../core/runtime/sleep";
import { Deferred, race } from "../core/runtime/structuredConcurrency";
import { EventTranslator } from "../core/runtime/translator";
import { CursorUnavailableError, fileEventSource, type EventCursor, type EventSource } from "../core/stream/cursor";
import { FxtWriter } from "../core/trace/fxt";
import { FileSink } from "../core/trace/sink";
import type { TraceWriter } from "../core/trace/writer";
import { Exit } from "../core/types/effect";
import { pollDelayMs, type SessionConfig } from "./config";
import { exitFromError, SessionFailure, type SessionError } from "./errors";
import { nodeLauncher, traceEnv, type ChildExit, type ChildHandle, type ProcessLauncher } from "./process";
import { handOffToViewer, type Viewer } from "./viewer";

export type SessionState = "spawning" | "waiting-for-cursor" | "polling" | "draining" | "closed";

const NEXT: Record<SessionState, readonly SessionState[]> = {
    spawning: ["waiting-for-cursor"],
    "waiting-for-cursor": ["polling"],
    polling: ["draining"],
    draining: [],
    closed: [],
};

/** Lleva el estado de la sesión; `closed` se alcanza desde cualquier estado. */
export class SessionStateMachine {
    private state_: SessionState = "spawning";

    constructor(
        private readonly logger: Logger,
        private readonly onState?: (s: SessionState) => void,
    ) {
        onState?.(this.state_);
    }

    get state(): SessionState {
        return this.state_;
    }

    to(next: SessionState): void {
        if (next === this.state_) return;
        if (next !== "closed" && !NEXT[this.state_].includes(next)) {
            throw new Error(`invalid session transition ${this.state_} -> ${next}`);
        }
        this.logger.debug(`session ${this.state_} -> ${next}`);
        this.state_ = next;
        this.onState?.(next);
    }
}

export type SessionSummary = {
    pid: number;
    child: ChildExit;
    tracefile: string;
    events: number;
    lostEvents: number;
    rings: number;
    fibers: number;
};

export type SessionDeps = {
    launcher?: ProcessLauncher;
    source?: EventSource;
    openWriter?: (tracefile: string) => TraceWriter;
    viewer?: Viewer;
    logger?: Logger;
    signal?: AbortSignal;
    onState?: (s: SessionState) => void;
};

export const openFxtFile = (tracefile: string): TraceWriter => new FxtWriter(new FileSink(tracefile));

/**
 * Records one run of `config.argv`.
 *
 * Never throws: the outcome, including cancellation through `deps.signal`, is in the
 * returned `Exit`. The temporary directory is gone and the writer closed by the time
 * the promise settles.
 */
export async function recordSession(
    config: SessionConfig,
    deps: SessionDeps = {},
): Promise<Exit<SessionError, SessionSummary>> {
    const logger = deps.logger ?? silentLogger;
    const machine = new SessionStateMachine(logger, deps.onState);
    const scope = new Scope();

    // controller propio: se aborta desde afuera o cuando falla un strand
    const ac = new AbortController();
    const onAbort = () => ac.abort();
    if (deps.signal?.aborted) ac.abort();
    else deps.signal?.addEventListener("abort", onAbort, { once: true });

    let exit: Exit<SessionError, SessionSummary>;
    try {
        exit = Exit.succeed(await runSession(config, deps, logger, machine, scope, ac));
    } catch (e) {
        ac.abort();
        exit = exitFromError(e);
    } finally {
        deps.signal?.removeEventListener("abort", onAbort);
    }

    const errors = await scope.close(exit);
    machine.to("closed");
    for (const e of errors) {
        if (exit._tag === "Success") exit = exitFromError(e);
        else logger.error("cleanup failed", { error: e instanceof Error ? e.message : String(e) });
    }
    return exit;
}

async function runSession(
    config: SessionConfig,
    deps: SessionDeps,
    logger: Logger,
    machine: SessionStateMachine,
    scope: Scope,
    ac: AbortController,
): Promise<SessionSummary> {
    const signal = ac.signal;
    throwIfAborted(signal);

    const tmpDir = await acquireRelease(
        scope,
        () => mkdtempSync(join(config.tmpRoot ?? tmpdir(), "fiber-trace-")),
        (dir) => rmSync(dir, { recursive: true, force: true }),
    );

    const tracefile = config.tracefile ?? join(tmpDir, "trace.fxt");
    const writer = await acquireRelease(
        scope,
        () => (deps.openWriter ?? openFxtFile)(tracefile),
        (w) => w.close(),
    );
    logger.info(`Recording to ${tracefile}`);

    const launcher = deps.launcher ?? nodeLauncher({ logger });
    const child = await acquireRelease(
        scope,
        () => spawnChild(launcher, config.argv, tmpDir),
        (c) => stopChild(c, config.killGraceMs, logger),
    );
    logger.debug("child started", { pid: child.pid });

    const translator = new EventTranslator({ pid: BigInt(child.pid), writer, logger });

    // process-wait strand: solo escribe el flag
    let childFinished = false;
    const waited = child.exited.then((status) => {
        childFinished = true;
        logger.debug("child exited", { pid: child.pid, code: status.code, signal: status.signal });
        return status;
    });

    const source = deps.source ?? fileEventSource(logger);
    const polling = async (): Promise<void> => {
        machine.to("waiting-for-cursor");
        const open = (): Promise<EventCursor> => retryWithFixedDelay(
            () => source.open(tmpDir, child.pid),
            {
                delayMs: config.cursorRetryMs,
                isRetryable: (e) => e instanceof CursorUnavailableError,
                onRetry: (e, attempt) => {
                    const msg = e instanceof Error ? e.message : String(e);
                    logger.warn(`${msg} (will retry)`, {
                        attempt,
                        childExited: childFinished ? true : undefined,
                    });
                },
            },
            signal,
        );
        const cursor = await acquireRelease(scope, open, (c) => c.close());

        const callbacks = translator.callbacks();
        machine.to("polling");
        for (;;) {
            if (childFinished) {
                // una lectura más para lo que quedó entre el último poll y el exit
                machine.to("draining");
                cursor.read(callbacks);
                writer.flush();
                return;
            }
            cursor.read(callbacks);
            writer.flush();
            await sleepMs(pollDelayMs(config), signal);
        }
    };

    const strands: Array<Promise<void>> = [polling()];

    const viewer = deps.viewer;
    if (viewer) {
        const first = new Deferred<void>();
        translator.onFirstEvent(() => first.succeed());
        strands.push(
            handOffToViewer({
                viewer,
                tracefile,
                firstEvent: first.promise,
                waitMs: config.uiWaitMs,
                signal,
                logger,
            }),
        );
    }

    await Promise.all(strands);
    const status = await waited;

    logger.debug(dumpRegistry(translator.registry));
    return {
        pid: child.pid,
        child: status,
        tracefile,
        events: translator.eventsSeen,
        lostEvents: translator.lostEvents,
        rings: translator.registry.rings.size,
        fibers: translator.registry.fibers.size,
    };
}

async function spawnChild(launcher: ProcessLauncher, argv: readonly string[], tmpDir: string): Promise<ChildHandle> {
    try {
        return await launcher.spawn(argv, traceEnv(tmpDir));
    } catch (e) {
        throw new SessionFailure({
            _tag: "SpawnFailed",
            command: argv[0] ?? "",
            message: e instanceof Error ? e.message : String(e),
        });
    }
}

async function stopChild(child: ChildHandle, graceMs: number, logger: Logger): Promise<void> {
    if (child.hasExited) return;
    logger.warn("terminating child", { pid: child.pid });
    child.kill("SIGTERM");
    const gone = await race(
        () => child.exited.then(() => true),
        (s) => sleepMs(graceMs, s).then(() => false),
    );
    if (!gone) {
        child.kill("SIGKILL");
        await child.exited;
    }
}
