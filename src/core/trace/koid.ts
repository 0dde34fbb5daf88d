import type { FiberId, RingId } from "../runtime/events";

/**
 * Flat thread ids ("koids") for the trace file.
 *
 * Rings and fibers are numbered independently, so both ids are shifted left by two
 * and tagged in the low bits. The two low bits are reserved: a third id space needs
 * a wider shift, not a third tag.
 */
export type Koid = bigint;

export type IdSpace = "ring" | "fiber";

const TAG: Record<IdSpace, bigint> = {
    ring: 1n,
    fiber: 2n,
};

export function flatId(n: number, space: IdSpace): Koid {
    return (BigInt(n) << 2n) | TAG[space];
}

export const ringKoid = (id: RingId): Koid => flatId(id, "ring");

export const fiberKoid = (id: FiberId): Koid => flatId(id, "fiber");
