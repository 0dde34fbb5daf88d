import type { Timestamp } from "../runtime/events";
import type { Koid } from "./koid";
import type { ByteSink } from "./sink";
import type { ThreadRef, TraceArg, TraceArgs, TraceWriter } from "./writer";

/**
 * Fuchsia Trace Format encoder.
 *
 * Every record is a sequence of little-endian 64-bit words; the first word is the
 * record header (type in bits 0..3, size in words in bits 4..15). Strings are interned
 * in the string table and referenced by index; threads always go inline.
 */

export const FXT_MAGIC = 0x0016547846040010n;

export const TICKS_PER_SECOND = 1_000_000_000n;

export const enum RecordType {
    Metadata = 0,
    Initialization = 1,
    String = 2,
    Thread = 3,
    Event = 4,
    UserspaceObject = 6,
    KernelObject = 7,
    Scheduling = 8,
}

export const enum EventType {
    Instant = 0,
    DurationBegin = 2,
    DurationEnd = 3,
}

export const enum ArgType {
    Int64 = 3,
    String = 6,
    Pointer = 7,
    Koid = 8,
}

const ZX_OBJ_TYPE_THREAD = 2n;
const THREAD_WAKEUP = 2n;

const MAX_STRING_INDEX = 0x7fff;
export const MAX_STRING_BYTES = 32000;
const MAX_ARGS = 15;

const u64 = (v: bigint): bigint => BigInt.asUintN(64, v);

function paddedWords(bytes: Uint8Array): bigint[] {
    const n = Math.ceil(bytes.length / 8);
    const buf = Buffer.alloc(n * 8);
    buf.set(bytes);
    const words: bigint[] = [];
    for (let i = 0; i < n; i++) words.push(buf.readBigUInt64LE(i * 8));
    return words;
}

function encodeWords(words: readonly bigint[]): Buffer {
    const buf = Buffer.alloc(words.length * 8);
    words.forEach((w, i) => buf.writeBigUInt64LE(u64(w), i * 8));
    return buf;
}

/** Como mucho `MAX_STRING_BYTES`, sin partir un code point. */
export function utf8Truncated(s: string): Buffer {
    const bytes = Buffer.from(s, "utf8");
    if (bytes.length <= MAX_STRING_BYTES) return bytes;
    let end = MAX_STRING_BYTES;
    // 0b10xxxxxx: byte de continuación
    while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) end--;
    return bytes.subarray(0, end);
}

export class FxtWriter implements TraceWriter {
    private readonly strings = new Map<string, number>();
    private readonly byIndex: Array<string | undefined> = [];
    private nextIndex = 1;
    private closed = false;

    constructor(private readonly sink: ByteSink) {
        this.emit([FXT_MAGIC]);
        this.record(BigInt(RecordType.Initialization), [TICKS_PER_SECOND]);
    }

    registerThread(thread: ThreadRef, name: string, args: TraceArgs = {}): void {
        const nameRef = this.stringRef(name);
        const argWords = this.encodeArgs({ process: { kind: "koid", value: thread.pid }, ...args });
        const header =
            BigInt(RecordType.KernelObject) |
            (ZX_OBJ_TYPE_THREAD << 16n) |
            (BigInt(nameRef) << 24n) |
            (BigInt(argWords.count) << 40n);
        this.record(header, [thread.tid, ...argWords.words]);
    }

    durationBegin(thread: ThreadRef, name: string, category: string, ts: Timestamp, args?: TraceArgs): void {
        this.event(EventType.DurationBegin, thread, name, category, ts, args);
    }

    durationEnd(thread: ThreadRef, name: string, category: string, ts: Timestamp, args?: TraceArgs): void {
        this.event(EventType.DurationEnd, thread, name, category, ts, args);
    }

    instantEvent(thread: ThreadRef, name: string, category: string, ts: Timestamp, args?: TraceArgs): void {
        this.event(EventType.Instant, thread, name, category, ts, args);
    }

    wakeup(cpu: number, ts: Timestamp, tid: Koid): void {
        const header =
            BigInt(RecordType.Scheduling) |
            (BigInt(cpu & 0xffff) << 20n) |
            (THREAD_WAKEUP << 60n);
        this.record(header, [ts, tid]);
    }

    nameObject(thread: ThreadRef, name: string, objectId: bigint): void {
        const nameRef = this.stringRef(name);
        // thread ref 0 = inline
        const header = BigInt(RecordType.UserspaceObject) | (BigInt(nameRef) << 24n);
        this.record(header, [objectId, thread.pid, thread.tid]);
    }

    flush(): void {
        if (this.closed) return;
        this.sink.flush();
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.sink.close();
    }

    private event(
        type: EventType,
        thread: ThreadRef,
        name: string,
        category: string,
        ts: Timestamp,
        args: TraceArgs = {},
    ): void {
        const categoryRef = this.stringRef(category);
        const nameRef = this.stringRef(name);
        const argWords = this.encodeArgs(args);
        const header =
            BigInt(RecordType.Event) |
            (BigInt(type) << 16n) |
            (BigInt(argWords.count) << 20n) |
            (BigInt(categoryRef) << 32n) |
            (BigInt(nameRef) << 48n);
        this.record(header, [ts, thread.pid, thread.tid, ...argWords.words]);
    }

    private encodeArgs(args: TraceArgs): { count: number; words: bigint[] } {
        const entries = Object.entries(args);
        if (entries.length > MAX_ARGS) {
            throw new RangeError(`too many trace arguments (${entries.length} > ${MAX_ARGS})`);
        }
        const words: bigint[] = [];
        for (const [key, value] of entries) words.push(...this.encodeArg(key, value));
        return { count: entries.length, words };
    }

    private encodeArg(key: string, a: TraceArg): bigint[] {
        const nameRef = BigInt(this.stringRef(key)) << 16n;
        switch (a.kind) {
            case "int":
                return [BigInt(ArgType.Int64) | (2n << 4n) | nameRef, a.value];
            case "pointer":
                return [BigInt(ArgType.Pointer) | (2n << 4n) | nameRef, a.value];
            case "koid":
                return [BigInt(ArgType.Koid) | (2n << 4n) | nameRef, a.value];
            case "string": {
                const valueRef = BigInt(this.stringRef(a.value)) << 32n;
                return [BigInt(ArgType.String) | (1n << 4n) | nameRef | valueRef];
            }
        }
    }

    /** Interna `s` en la tabla de strings (emitiendo el record si hace falta). */
    private stringRef(s: string): number {
        if (s === "") return 0;
        const known = this.strings.get(s);
        if (known !== undefined) return known;

        const index = this.nextIndex;
        this.nextIndex = index === MAX_STRING_INDEX ? 1 : index + 1;

        // tabla llena: el índice se recicla y pisa al string anterior
        const evicted = this.byIndex[index];
        if (evicted !== undefined) this.strings.delete(evicted);
        this.byIndex[index] = s;
        this.strings.set(s, index);

        const bytes = utf8Truncated(s);
        const header =
            BigInt(RecordType.String) |
            (BigInt(index) << 16n) |
            (BigInt(bytes.length) << 32n);
        this.record(header, paddedWords(bytes));
        return index;
    }

    private record(header: bigint, body: readonly bigint[]): void {
        const size = BigInt(body.length + 1);
        this.emit([header | (size << 4n), ...body]);
    }

    private emit(words: readonly bigint[]): void {
        if (this.closed) throw new Error("FxtWriter: write after close");
        this.sink.write(encodeWords(words));
    }
}
