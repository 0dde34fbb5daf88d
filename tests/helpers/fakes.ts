import { join } from "node:path";
import type { CursorCallbacks } from "../../src/core/runtime/events";
import { Deferred } from "../../src/core/runtime/structuredConcurrency";
import { CursorUnavailableError, type EventCursor, type EventSource } from "../../src/core/stream/cursor";
import type { ChildExit, ChildHandle, ProcessLauncher } from "../../src/session/process";

export class FakeChild implements ChildHandle {
    readonly pid: number;
    readonly kills: NodeJS.Signals[] = [];
    private readonly done = new Deferred<ChildExit>();
    private readonly obeys: readonly NodeJS.Signals[];

    constructor(pid = 4242, obeys: readonly NodeJS.Signals[] = ["SIGTERM", "SIGKILL"]) {
        this.pid = pid;
        this.obeys = obeys;
    }

    get exited(): Promise<ChildExit> {
        return this.done.promise;
    }

    get hasExited(): boolean {
        return this.done.isDone;
    }

    exit(code: number | null, signal: NodeJS.Signals | null = null): void {
        this.done.succeed({ code, signal });
    }

    kill(signal: NodeJS.Signals = "SIGTERM"): void {
        this.kills.push(signal);
        if (this.obeys.includes(signal)) this.exit(null, signal);
    }
}

export type SpawnCall = { argv: readonly string[]; env: NodeJS.ProcessEnv };

export function fakeLauncher(child: FakeChild): ProcessLauncher & { calls: SpawnCall[] } {
    const calls: SpawnCall[] = [];
    return {
        calls,
        spawn: async (argv, env) => {
            calls.push({ argv, env });
            return child;
        },
    };
}

export const failingLauncher: ProcessLauncher = {
    spawn: async (argv) => {
        throw new Error(`spawn ${argv[0] ?? ""} ENOENT`);
    },
};

export type Batch = (cb: CursorCallbacks) => void;

export type ScriptedSource = EventSource & {
    opens: Array<[string, number]>;
    reads: number;
    closed: boolean;
};

/**
 * Fuente de eventos en memoria: falla `unavailable` veces al abrir y después entrega
 * un batch por lectura (lecturas de más no entregan nada).
 */
export function scriptedSource(batches: Batch[], unavailable = 0): ScriptedSource {
    const src: ScriptedSource = {
        opens: [],
        reads: 0,
        closed: false,
        open(dir, pid) {
            src.opens.push([dir, pid]);
            if (src.opens.length <= unavailable) {
                throw new CursorUnavailableError(join(dir, `${pid}.events`), new Error("ENOENT"));
            }
            const cursor: EventCursor = {
                read(cb) {
                    const batch = batches[src.reads];
                    src.reads++;
                    batch?.(cb);
                    return 0;
                },
                close() {
                    src.closed = true;
                },
            };
            return cursor;
        },
    };
    return src;
}
