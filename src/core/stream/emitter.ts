import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { join } from "node:path";
import type { RawEvent, RingId, Timestamp } from "../runtime/events";
import { ENV, encodeEvent, encodeLost, eventFileName } from "./wire";

/**
 * Producer side of an event file, for instrumented Node programs and tests.
 * Each call appends one complete line.
 */
export class EventFileEmitter {
    private fd: number | null;
    readonly path: string;

    constructor(dir: string, pid: number = process.pid) {
        mkdirSync(dir, { recursive: true });
        this.path = join(dir, eventFileName(pid));
        this.fd = openSync(this.path, "a");
    }

    /** Devuelve un emitter si el proceso fue lanzado por el recorder. */
    static fromEnv(env: NodeJS.ProcessEnv = process.env, pid: number = process.pid): EventFileEmitter | undefined {
        const dir = env[ENV.dir];
        if (env[ENV.start] !== "1" || !dir) return undefined;
        return new EventFileEmitter(dir, pid);
    }

    emit(ringId: RingId, ts: Timestamp, ev: RawEvent): void {
        this.line(encodeEvent(ringId, ts, ev));
    }

    lost(ringId: RingId, count: number): void {
        this.line(encodeLost(ringId, count));
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        closeSync(fd);
    }

    private line(s: string): void {
        if (this.fd === null) throw new Error(`emitter ${this.path} is closed`);
        writeSync(this.fd, s + "\n");
    }
}
