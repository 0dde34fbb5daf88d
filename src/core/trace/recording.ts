import type { Timestamp } from "../runtime/events";
import type { Koid } from "./koid";
import type { ThreadRef, TraceArgs, TraceWriter } from "./writer";

export type TraceRecord =
    | { op: "registerThread"; thread: ThreadRef; name: string; args: TraceArgs }
    | { op: "durationBegin"; thread: ThreadRef; name: string; category: string; ts: Timestamp; args: TraceArgs }
    | { op: "durationEnd"; thread: ThreadRef; name: string; category: string; ts: Timestamp; args: TraceArgs }
    | { op: "instantEvent"; thread: ThreadRef; name: string; category: string; ts: Timestamp; args: TraceArgs }
    | { op: "wakeup"; cpu: number; ts: Timestamp; tid: Koid }
    | { op: "nameObject"; thread: ThreadRef; name: string; objectId: bigint };

/** Keeps every record in memory, in call order. */
export class RecordingTraceWriter implements TraceWriter {
    readonly records: TraceRecord[] = [];
    closed = false;
    flushes = 0;

    registerThread(thread: ThreadRef, name: string, args: TraceArgs = {}): void {
        this.push({ op: "registerThread", thread, name, args });
    }

    durationBegin(thread: ThreadRef, name: string, category: string, ts: Timestamp, args: TraceArgs = {}): void {
        this.push({ op: "durationBegin", thread, name, category, ts, args });
    }

    durationEnd(thread: ThreadRef, name: string, category: string, ts: Timestamp, args: TraceArgs = {}): void {
        this.push({ op: "durationEnd", thread, name, category, ts, args });
    }

    instantEvent(thread: ThreadRef, name: string, category: string, ts: Timestamp, args: TraceArgs = {}): void {
        this.push({ op: "instantEvent", thread, name, category, ts, args });
    }

    wakeup(cpu: number, ts: Timestamp, tid: Koid): void {
        this.push({ op: "wakeup", cpu, ts, tid });
    }

    nameObject(thread: ThreadRef, name: string, objectId: bigint): void {
        this.push({ op: "nameObject", thread, name, objectId });
    }

    flush(): void {
        this.flushes++;
    }

    close(): void {
        this.closed = true;
    }

    private push(rec: TraceRecord): void {
        if (this.closed) throw new Error("RecordingTraceWriter: write after close");
        this.records.push(rec);
    }
}
