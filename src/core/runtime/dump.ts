import type { RawEvent } from "./events";
import { Registry } from "./registry";

function describe(ev: RawEvent): string {
    switch (ev.type) {
        case "fiber.scheduled":
        case "fiber.exited":
            return `${ev.type} fiber=${ev.fiberId}`;
        case "fiber.created":
            return `${ev.type} fiber=${ev.fiberId} scope=${ev.scopeId}`;
        case "scope.opened":
            return `${ev.type} scope=${ev.scopeId} kind=${ev.kind}`;
        case "object.created":
            return `${ev.type} id=${ev.objectId} kind=${ev.kind}`;
        case "object.named":
            return `${ev.type} id=${ev.objectId} name=${JSON.stringify(ev.name)}`;
        case "fiber.suspending":
            return `${ev.type} op=${ev.operation}`;
        case "span.entered":
            return `${ev.type} name=${ev.name}`;
        case "log":
            return `${ev.type} ${JSON.stringify(ev.message)}`;
        case "ring.idle":
            return `${ev.type} ${ev.phase}`;
        case "gc":
            return `${ev.type} ${ev.phase} ${ev.name}`;
        case "unrecognized":
            return `${ev.type} kind=${ev.kind}`;
        case "span.exited":
        case "scope.closed":
            return ev.type;
    }
}

export function dumpRegistry(reg: Registry, recentLimit = 80): string {
    const lines: string[] = [];
    lines.push(`=== Rings (${reg.rings.size}) ===`);
    for (const r of [...reg.rings.values()].sort((a, b) => a.id - b.id)) {
        lines.push(`ring${r.id} current=${r.current ? `fiber${r.current.id}` : "-"}`);
    }

    lines.push(`=== Fibers (${reg.fibers.size}) ===`);
    for (const f of [...reg.fibers.values()].sort((a, b) => a.id - b.id)) {
        lines.push(`fiber${f.id} registered=${f.registered}${f.op !== undefined ? ` suspended=${f.op}` : ""}`);
    }

    lines.push(`=== Recent Events ===`);
    for (const rec of reg.getRecentEvents().slice(-recentLimit)) {
        lines.push(`${rec.ts} ring${rec.ringId} ${describe(rec.event)}`);
    }
    return lines.join("\n");
}
