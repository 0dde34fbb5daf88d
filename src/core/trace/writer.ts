import type { Timestamp } from "../runtime/events";
import type { Koid } from "./koid";

export type ThreadRef = {
    readonly pid: Koid;
    readonly tid: Koid;
};

export type TraceArg =
    | { readonly kind: "int"; readonly value: bigint }
    | { readonly kind: "string"; readonly value: string }
    | { readonly kind: "pointer"; readonly value: bigint }
    | { readonly kind: "koid"; readonly value: Koid };

export type TraceArgs = Readonly<Record<string, TraceArg>>;

export const arg = {
    int: (value: number | bigint): TraceArg => ({ kind: "int", value: BigInt(value) }),
    string: (value: string): TraceArg => ({ kind: "string", value }),
    pointer: (value: number | bigint): TraceArg => ({ kind: "pointer", value: BigInt(value) }),
    koid: (value: Koid): TraceArg => ({ kind: "koid", value }),
};

/**
 * Destino de los records de traza. Los errores de escritura se propagan (son fatales
 * para la sesión).
 */
export interface TraceWriter {
    registerThread(thread: ThreadRef, name: string, args?: TraceArgs): void;
    durationBegin(thread: ThreadRef, name: string, category: string, ts: Timestamp, args?: TraceArgs): void;
    durationEnd(thread: ThreadRef, name: string, category: string, ts: Timestamp, args?: TraceArgs): void;
    instantEvent(thread: ThreadRef, name: string, category: string, ts: Timestamp, args?: TraceArgs): void;
    /** `tid` es el thread que se despierta en `cpu`. */
    wakeup(cpu: number, ts: Timestamp, tid: Koid): void;
    nameObject(thread: ThreadRef, name: string, objectId: bigint): void;
    /** Deja en disco todo lo escrito hasta ahora (la traza se lee mientras crece). */
    flush(): void;
    close(): void;
}
