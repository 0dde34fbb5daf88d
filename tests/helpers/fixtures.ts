import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RawEvent, RingId } from "../../src/core/runtime/events";
import { fiberKoid, ringKoid } from "../../src/core/trace/koid";
import type { ThreadRef } from "../../src/core/trace/writer";

export const PID = 1234n;

export const ringThread = (id: number): ThreadRef => ({ pid: PID, tid: ringKoid(id) });
export const fiberThread = (id: number): ThreadRef => ({ pid: PID, tid: fiberKoid(id) });

export type Step = [ring: RingId, ts: number, ev: RawEvent];

export const ev = {
    scheduled: (fiberId: number): RawEvent => ({ type: "fiber.scheduled", fiberId }),
    created: (fiberId: number, scopeId = 0): RawEvent => ({ type: "fiber.created", fiberId, scopeId }),
    exited: (fiberId: number): RawEvent => ({ type: "fiber.exited", fiberId }),
    suspending: (operation: string): RawEvent => ({ type: "fiber.suspending", operation }),
    gc: (phase: "begin" | "end", name: string): RawEvent => ({ type: "gc", phase, name }),
    idle: (phase: "begin" | "end"): RawEvent => ({ type: "ring.idle", phase }),
};

export function tempDir(prefix = "fiber-trace-test-"): string {
    return mkdtempSync(join(tmpdir(), prefix));
}
