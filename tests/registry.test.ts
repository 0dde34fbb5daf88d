import { describe, expect, it } from "vitest";
import { dumpRegistry } from "../src/core/runtime/dump";
import { Registry } from "../src/core/runtime/registry";
import { PushStatus, RingBuffer } from "../src/core/runtime/ringBuffer";
import { EventTranslator } from "../src/core/runtime/translator";
import { RecordingTraceWriter } from "../src/core/trace/recording";
import { PID, ev } from "./helpers/fixtures";

describe("RingBuffer", () => {
    it("grows up to its maximum and then overwrites the oldest", () => {
        const rb = new RingBuffer<number>(2, 4);
        expect(rb.push(1)).toBe(PushStatus.Ok);
        expect(rb.push(2)).toBe(PushStatus.Ok);
        expect(rb.push(3)).toBe(PushStatus.Grew);
        expect(rb.push(4)).toBe(PushStatus.Ok);
        expect(rb.push(5)).toBe(PushStatus.Overwrote);
        expect(rb.push(6)).toBe(PushStatus.Overwrote);
        expect(rb.toArray()).toEqual([3, 4, 5, 6]);
    });
});

describe("Registry", () => {
    it("creates rings once and reports it", () => {
        const reg = new Registry();
        expect(reg.ring(1).created).toBe(true);
        expect(reg.ring(1).created).toBe(false);
        expect(reg.fiber(3)).toBe(reg.fiber(3));
    });

    it("bounds the recent-event history", () => {
        const reg = new Registry(4);
        for (let i = 0; i < 10; i++) reg.remember({ ringId: 0, ts: BigInt(i), event: ev.scheduled(i) });
        expect(reg.getRecentEvents().map((r) => r.ts)).toEqual([6n, 7n, 8n, 9n]);
    });
});

describe("dumpRegistry", () => {
    it("lists rings, fibers and recent events", () => {
        const t = new EventTranslator({ pid: PID, writer: new RecordingTraceWriter() });
        t.handle(1, 10n, ev.created(2, 0));
        t.handle(0, 11n, ev.scheduled(3));
        t.handle(0, 12n, ev.suspending("read"));
        t.handle(0, 13n, { type: "log", message: "hi" });

        expect(dumpRegistry(t.registry).split("\n")).toEqual([
            "=== Rings (2) ===",
            "ring0 current=-",
            "ring1 current=fiber2",
            "=== Fibers (2) ===",
            "fiber2 registered=true",
            "fiber3 registered=false suspended=read",
            "=== Recent Events ===",
            "10 ring1 fiber.created fiber=2 scope=0",
            "11 ring0 fiber.scheduled fiber=3",
            "12 ring0 fiber.suspending op=read",
            '13 ring0 log "hi"',
        ]);
        expect(dumpRegistry(t.registry, 1).split("\n").slice(-1)).toEqual(['13 ring0 log "hi"']);
    });
});
