import type { CursorCallbacks, RawEvent, RingId, Timestamp } from "./events";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { Registry, type FiberState, type RingState } from "./registry";
import { fiberKoid, ringKoid, type Koid } from "../trace/koid";
import { arg, type ThreadRef, type TraceWriter } from "../trace/writer";

export const CATEGORY = {
    runtime: "runtime",
    suspend: "suspend",
    span: "span",
    gc: "gc",
} as const;

export type TranslatorOptions = {
    /** pid del proceso trazado, como koid. */
    pid: Koid;
    writer: TraceWriter;
    registry?: Registry;
    logger?: Logger;
};

/**
 * Turns raw runtime events into trace records.
 *
 * Events are attributed to the fiber currently scheduled on their ring, or to the
 * ring itself when it is idle. Ring idling and GC phases always go to the ring.
 * Writer errors propagate to the caller.
 */
export class EventTranslator {
    readonly registry: Registry;

    private readonly pid: Koid;
    private readonly writer: TraceWriter;
    private readonly logger: Logger;

    private eventsSeen_ = 0;
    private lostEvents_ = 0;
    private firstEventListeners: Array<() => void> = [];

    constructor(opts: TranslatorOptions) {
        this.pid = opts.pid;
        this.writer = opts.writer;
        this.registry = opts.registry ?? new Registry();
        this.logger = opts.logger ?? silentLogger;
    }

    get eventsSeen(): number { return this.eventsSeen_; }
    get lostEvents(): number { return this.lostEvents_; }

    /** Se llama una sola vez, con el primer evento procesado. */
    onFirstEvent(f: () => void): void {
        if (this.eventsSeen_ > 0) f();
        else this.firstEventListeners.push(f);
    }

    callbacks(): CursorCallbacks {
        return {
            onEvent: (ringId, ts, ev) => this.handle(ringId, ts, ev),
            onLost: (ringId, count) => this.lost(ringId, count),
        };
    }

    handle(ringId: RingId, ts: Timestamp, ev: RawEvent): void {
        this.registry.remember({ ringId, ts, event: ev });
        const ring = this.ringFor(ringId);

        // se resuelve con el estado previo al evento
        const thread = ring.current ? this.fiberThread(ring.current.id) : this.ringThread(ringId);

        switch (ev.type) {
            case "fiber.scheduled": {
                const fiber = this.schedule(ring, ev.fiberId);
                this.writer.wakeup(ringId, ts, fiberKoid(fiber.id));
                if (fiber.op !== undefined) {
                    this.writer.durationEnd(this.fiberThread(fiber.id), fiber.op, CATEGORY.suspend, ts);
                    fiber.op = undefined;
                }
                break;
            }

            case "fiber.created": {
                const fiber = this.registry.fiber(ev.fiberId);
                if (!fiber.registered) {
                    this.writer.registerThread(this.fiberThread(fiber.id), `fiber${fiber.id}`);
                    fiber.registered = true;
                }
                this.schedule(ring, fiber.id);
                this.writer.instantEvent(this.fiberThread(fiber.id), "create-fiber", CATEGORY.runtime, ts, {
                    id: arg.pointer(fiber.id),
                    scope: arg.pointer(ev.scopeId),
                });
                break;
            }

            case "scope.opened":
                this.writer.durationBegin(thread, "cc", CATEGORY.runtime, ts, {
                    id: arg.pointer(ev.scopeId),
                    kind: arg.string(ev.kind),
                    ring: arg.int(ringId),
                });
                break;

            case "object.created":
                break;

            case "fiber.exited":
                this.writer.instantEvent(thread, "exit-fiber", CATEGORY.runtime, ts, {
                    id: arg.pointer(ev.fiberId),
                });
                break;

            case "object.named":
                this.writer.nameObject(thread, ev.name, BigInt(ev.objectId));
                break;

            case "fiber.suspending":
                if (ring.current) ring.current.op = ev.operation;
                this.writer.durationBegin(thread, ev.operation, CATEGORY.suspend, ts);
                ring.current = undefined;
                break;

            case "span.entered":
                this.writer.durationBegin(thread, ev.name, CATEGORY.span, ts);
                break;

            case "span.exited":
                // el par begin/end lo resuelve el visualizador con su stack por thread
                this.writer.durationEnd(thread, "", CATEGORY.span, ts);
                break;

            case "scope.closed":
                this.writer.durationEnd(thread, "cc", CATEGORY.runtime, ts);
                break;

            case "log":
                this.writer.instantEvent(thread, "log", CATEGORY.runtime, ts, {
                    message: arg.string(ev.message),
                });
                break;

            case "ring.idle":
                if (ev.phase === "begin") {
                    this.writer.durationBegin(this.ringThread(ringId), "suspend-domain", CATEGORY.runtime, ts);
                } else {
                    this.writer.durationEnd(this.ringThread(ringId), "suspend-domain", CATEGORY.runtime, ts);
                }
                break;

            case "gc":
                if (ev.phase === "begin") {
                    this.writer.durationBegin(this.ringThread(ringId), ev.name, CATEGORY.gc, ts);
                } else {
                    this.writer.durationEnd(this.ringThread(ringId), ev.name, CATEGORY.gc, ts);
                }
                break;

            case "unrecognized":
                break;
        }

        this.eventsSeen_++;
        if (this.eventsSeen_ === 1) this.fireFirstEvent();
    }

    lost(ringId: RingId, count: number): void {
        this.lostEvents_ += count;
        this.logger.warn(`ring ${ringId} lost ${count} events`, { ring: ringId, lost: count });
    }

    private ringFor(id: RingId): RingState {
        const { ring, created } = this.registry.ring(id);
        if (created) this.writer.registerThread(this.ringThread(id), `ring${id}`);
        return ring;
    }

    private schedule(ring: RingState, fiberId: number): FiberState {
        const fiber = this.registry.fiber(fiberId);
        ring.current = fiber;
        return fiber;
    }

    private ringThread(id: RingId): ThreadRef {
        return { pid: this.pid, tid: ringKoid(id) };
    }

    private fiberThread(id: number): ThreadRef {
        return { pid: this.pid, tid: fiberKoid(id) };
    }

    private fireFirstEvent(): void {
        const listeners = this.firstEventListeners;
        this.firstEventListeners = [];
        for (const f of listeners) f();
    }
}
