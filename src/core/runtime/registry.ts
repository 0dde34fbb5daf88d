import type { FiberId, RawEventRecord, RingId } from "./events";
import { RingBuffer } from "./ringBuffer";

export type FiberState = {
    readonly id: FiberId;
    /** Operación por la que está suspendido (si lo está). */
    op?: string;
    /** Ya tiene su thread en la traza. */
    registered: boolean;
};

export type RingState = {
    readonly id: RingId;
    current?: FiberState;
};

/**
 * Rings and fibers seen during one session. Records are never evicted; only the
 * recent-event history is bounded.
 */
export class Registry {
    readonly rings = new Map<RingId, RingState>();
    readonly fibers = new Map<FiberId, FiberState>();

    private readonly recent: RingBuffer<RawEventRecord>;

    constructor(recentCap = 2048) {
        this.recent = new RingBuffer<RawEventRecord>(Math.min(64, recentCap), recentCap);
    }

    /** Devuelve el ring y si es la primera vez que lo vemos. */
    ring(id: RingId): { ring: RingState; created: boolean } {
        const known = this.rings.get(id);
        if (known) return { ring: known, created: false };

        const ring: RingState = { id };
        this.rings.set(id, ring);
        return { ring, created: true };
    }

    /** Get-or-create. Solo bookkeeping: no registra nada en la traza. */
    fiber(id: FiberId): FiberState {
        const known = this.fibers.get(id);
        if (known) return known;

        const fiber: FiberState = { id, registered: false };
        this.fibers.set(id, fiber);
        return fiber;
    }

    remember(rec: RawEventRecord): void {
        this.recent.push(rec);
    }

    getRecentEvents(): RawEventRecord[] {
        return this.recent.toArray();
    }
}
