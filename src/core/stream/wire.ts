import { z } from "zod";
import type { RawEvent, RawEventType, RingId, Timestamp } from "../runtime/events";

/**
 * Line format of an event file: one JSON object per line.
 *
 *   {"ring":0,"ts":1200,"type":"fiber.scheduled","fiber":3}
 *   {"ring":1,"type":"lost","count":12}
 *
 * `ts` is in nanoseconds, as a JSON integer or a decimal string.
 */

export const ENV = {
    start: "FIBER_TRACE_START",
    dir: "FIBER_TRACE_DIR",
    preserve: "FIBER_TRACE_PRESERVE",
} as const;

export const eventFileName = (pid: number): string => `${pid}.events`;

const id = z.number().int().nonnegative();

const TimestampSchema = z
    .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
    .transform((v) => BigInt(v));

const Phase = z.enum(["begin", "end"]);

export const LineHeader = z
    .object({
        ring: id,
        type: z.string().min(1),
    })
    .passthrough();

export const LostLine = z.object({ count: z.number().int().nonnegative() });

export const EventLine = z.object({ ts: TimestampSchema });

type KnownType = Exclude<RawEventType, "unrecognized">;

const EVENT_SCHEMAS: Record<KnownType, z.ZodType<RawEvent, z.ZodTypeDef, unknown>> = {
    "fiber.scheduled": z
        .object({ fiber: id })
        .transform((p): RawEvent => ({ type: "fiber.scheduled", fiberId: p.fiber })),
    "fiber.created": z
        .object({ fiber: id, scope: id })
        .transform((p): RawEvent => ({ type: "fiber.created", fiberId: p.fiber, scopeId: p.scope })),
    "scope.opened": z
        .object({ scope: id, kind: z.string() })
        .transform((p): RawEvent => ({ type: "scope.opened", scopeId: p.scope, kind: p.kind })),
    "object.created": z
        .object({ id, kind: z.string() })
        .transform((p): RawEvent => ({ type: "object.created", objectId: p.id, kind: p.kind })),
    "fiber.exited": z
        .object({ fiber: id })
        .transform((p): RawEvent => ({ type: "fiber.exited", fiberId: p.fiber })),
    "object.named": z
        .object({ id, name: z.string() })
        .transform((p): RawEvent => ({ type: "object.named", objectId: p.id, name: p.name })),
    "fiber.suspending": z
        .object({ op: z.string() })
        .transform((p): RawEvent => ({ type: "fiber.suspending", operation: p.op })),
    "span.entered": z
        .object({ name: z.string() })
        .transform((p): RawEvent => ({ type: "span.entered", name: p.name })),
    "span.exited": z.object({}).transform((): RawEvent => ({ type: "span.exited" })),
    "scope.closed": z.object({}).transform((): RawEvent => ({ type: "scope.closed" })),
    log: z
        .object({ message: z.string() })
        .transform((p): RawEvent => ({ type: "log", message: p.message })),
    "ring.idle": z
        .object({ phase: Phase })
        .transform((p): RawEvent => ({ type: "ring.idle", phase: p.phase })),
    gc: z
        .object({ phase: Phase, name: z.string() })
        .transform((p): RawEvent => ({ type: "gc", phase: p.phase, name: p.name })),
};

const isKnownType = (t: string): t is KnownType => Object.prototype.hasOwnProperty.call(EVENT_SCHEMAS, t);

export type DecodedLine =
    | { kind: "event"; ringId: RingId; ts: Timestamp; event: RawEvent }
    | { kind: "lost"; ringId: RingId; count: number }
    | { kind: "malformed"; reason: string };

export function decodeLine(line: string): DecodedLine {
    let json: unknown;
    try {
        json = JSON.parse(line);
    } catch (e) {
        return { kind: "malformed", reason: e instanceof Error ? e.message : String(e) };
    }

    const header = LineHeader.safeParse(json);
    if (!header.success) return { kind: "malformed", reason: header.error.issues[0]?.message ?? "bad header" };
    const { ring, type } = header.data;

    if (type === "lost") {
        const lost = LostLine.safeParse(json);
        if (!lost.success) return { kind: "malformed", reason: `lost: ${lost.error.issues[0]?.message}` };
        return { kind: "lost", ringId: ring, count: lost.data.count };
    }

    const base = EventLine.safeParse(json);
    if (!base.success) return { kind: "malformed", reason: `${type}: ts ${base.error.issues[0]?.message}` };

    if (!isKnownType(type)) {
        return { kind: "event", ringId: ring, ts: base.data.ts, event: { type: "unrecognized", kind: type } };
    }

    const payload = EVENT_SCHEMAS[type].safeParse(json);
    if (!payload.success) return { kind: "malformed", reason: `${type}: ${payload.error.issues[0]?.message}` };
    return { kind: "event", ringId: ring, ts: base.data.ts, event: payload.data };
}

function payloadOf(ev: RawEvent): Record<string, unknown> {
    switch (ev.type) {
        case "fiber.scheduled":
        case "fiber.exited":
            return { type: ev.type, fiber: ev.fiberId };
        case "fiber.created":
            return { type: ev.type, fiber: ev.fiberId, scope: ev.scopeId };
        case "scope.opened":
            return { type: ev.type, scope: ev.scopeId, kind: ev.kind };
        case "object.created":
            return { type: ev.type, id: ev.objectId, kind: ev.kind };
        case "object.named":
            return { type: ev.type, id: ev.objectId, name: ev.name };
        case "fiber.suspending":
            return { type: ev.type, op: ev.operation };
        case "span.entered":
            return { type: ev.type, name: ev.name };
        case "log":
            return { type: ev.type, message: ev.message };
        case "ring.idle":
            return { type: ev.type, phase: ev.phase };
        case "gc":
            return { type: ev.type, phase: ev.phase, name: ev.name };
        case "unrecognized":
            return { type: ev.kind };
        case "span.exited":
        case "scope.closed":
            return { type: ev.type };
    }
}

export function encodeEvent(ringId: RingId, ts: Timestamp, ev: RawEvent): string {
    // ts como string: no perdemos precisión por encima de 2^53
    return JSON.stringify({ ring: ringId, ts: ts.toString(), ...payloadOf(ev) });
}

export function encodeLost(ringId: RingId, count: number): string {
    return JSON.stringify({ ring: ringId, type: "lost", count });
}
