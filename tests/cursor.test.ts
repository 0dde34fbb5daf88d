import { appendFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CursorCallbacks, RawEvent, RingId, Timestamp } from "../src/core/runtime/events";
import { memoryLogger } from "../src/core/runtime/logger";
import { CursorUnavailableError, FileEventCursor, fileEventSource } from "../src/core/stream/cursor";
import { EventFileEmitter } from "../src/core/stream/emitter";
import { ENV } from "../src/core/stream/wire";
import { tempDir } from "./helpers/fixtures";

type Seen = Array<[RingId, Timestamp, RawEvent] | ["lost", RingId, number]>;

function collector(): { seen: Seen; callbacks: CursorCallbacks } {
    const seen: Seen = [];
    return {
        seen,
        callbacks: {
            onEvent: (ring, ts, ev) => seen.push([ring, ts, ev]),
            onLost: (ring, count) => seen.push(["lost", ring, count]),
        },
    };
}

describe("FileEventCursor", () => {
    let dir: string;
    let path: string;

    beforeEach(() => {
        dir = tempDir();
        path = join(dir, "42.events");
    });
    afterEach(() => rmSync(dir, { recursive: true, force: true }));

    it("fails as unavailable while the file does not exist", () => {
        expect(() => fileEventSource().open(dir, 42)).toThrow(CursorUnavailableError);
    });

    it("delivers complete lines and keeps a partial one for the next read", () => {
        writeFileSync(path, '{"ring":0,"ts":1,"type":"fiber.scheduled","fiber":1}\n{"ring":0,"ts":2,"ty');
        const cursor = new FileEventCursor(path);
        const { seen, callbacks } = collector();

        expect(cursor.read(callbacks)).toBe(1);
        expect(seen).toEqual([[0, 1n, { type: "fiber.scheduled", fiberId: 1 }]]);

        appendFileSync(path, 'pe":"span.exited"}\n');
        expect(cursor.read(callbacks)).toBe(1);
        expect(seen[1]).toEqual([0, 2n, { type: "span.exited" }]);

        expect(cursor.read(callbacks)).toBe(0);
        cursor.close();
    });

    it("keeps multi-byte characters split across reads intact", () => {
        const line = Buffer.from('{"ring":0,"ts":1,"type":"log","message":"año"}\n');
        const cut = line.indexOf(0xc3) + 1;
        writeFileSync(path, line.subarray(0, cut));
        const cursor = new FileEventCursor(path);
        const { seen, callbacks } = collector();

        cursor.read(callbacks);
        appendFileSync(path, line.subarray(cut));
        cursor.read(callbacks);

        expect(seen).toEqual([[0, 1n, { type: "log", message: "año" }]]);
        cursor.close();
    });

    it("reports lost events and skips malformed lines with a warning", () => {
        writeFileSync(
            path,
            [
                '{"ring":1,"type":"lost","count":7}',
                "garbage",
                "",
                '{"ring":1,"ts":3,"type":"something.new"}',
                "",
            ].join("\n"),
        );
        const logger = memoryLogger();
        const cursor = new FileEventCursor(path, logger);
        const { seen, callbacks } = collector();

        expect(cursor.read(callbacks)).toBe(1);
        expect(seen).toEqual([
            ["lost", 1, 7],
            [1, 3n, { type: "unrecognized", kind: "something.new" }],
        ]);
        expect(cursor.malformed).toBe(1);
        expect(logger.records.map((r) => r.msg)).toEqual(["skipping malformed event line"]);
        cursor.close();
    });

    it("refuses to read once closed", () => {
        writeFileSync(path, "");
        const cursor = new FileEventCursor(path);
        cursor.close();
        cursor.close();
        expect(() => cursor.read(collector().callbacks)).toThrow("is closed");
    });

    it("reads what an emitter appends", () => {
        const emitter = new EventFileEmitter(dir, 42);
        const cursor = fileEventSource().open(dir, 42);
        const { seen, callbacks } = collector();

        emitter.emit(2, 10n, { type: "fiber.created", fiberId: 5, scopeId: 1 });
        emitter.lost(2, 3);
        cursor.read(callbacks);
        emitter.emit(2, 11n, { type: "gc", phase: "begin", name: "minor" });
        cursor.read(callbacks);
        emitter.close();
        cursor.close();

        expect(seen).toEqual([
            [2, 10n, { type: "fiber.created", fiberId: 5, scopeId: 1 }],
            ["lost", 2, 3],
            [2, 11n, { type: "gc", phase: "begin", name: "minor" }],
        ]);
    });
});

describe("EventFileEmitter.fromEnv", () => {
    it("is only enabled when the recorder asked for events", () => {
        const dir = tempDir();
        try {
            expect(EventFileEmitter.fromEnv({}, 1)).toBeUndefined();
            expect(EventFileEmitter.fromEnv({ [ENV.dir]: dir }, 1)).toBeUndefined();
            expect(EventFileEmitter.fromEnv({ [ENV.start]: "1" }, 1)).toBeUndefined();

            const emitter = EventFileEmitter.fromEnv({ [ENV.start]: "1", [ENV.dir]: dir }, 77);
            expect(emitter?.path).toBe(join(dir, "77.events"));
            emitter?.close();
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });
});
