// ringBuffer.ts
export const enum PushStatus {
    Ok = 0,
    Grew = 1 << 0,
    Overwrote = 1 << 1,
}

/**
 * Buffer circular que crece hasta `maxCapacity` y después pisa el elemento más viejo.
 */
export class RingBuffer<T> {
    private buf: (T | undefined)[];
    private head = 0;
    private tail = 0;
    private size_ = 0;
    private readonly maxCap: number;

    constructor(initialCapacity: number = 64, maxCapacity: number = initialCapacity) {
        const init = Math.max(2, this.nextPow2(initialCapacity));
        const max = Math.max(init, this.nextPow2(maxCapacity));
        this.buf = new Array<T | undefined>(init);
        this.maxCap = max;
    }

    push(value: T): PushStatus {
        let status = PushStatus.Ok;
        if (this.size_ === this.buf.length) {
            if (this.buf.length < this.maxCap) {
                this.grow();
                status |= PushStatus.Grew;
            } else {
                // lleno: descartamos el más viejo
                this.buf[this.head] = undefined;
                this.head = (this.head + 1) & (this.buf.length - 1);
                this.size_--;
                status |= PushStatus.Overwrote;
            }
        }

        this.buf[this.tail] = value;
        this.tail = (this.tail + 1) & (this.buf.length - 1);
        this.size_++;
        return status;
    }

    /** Oldest first. */
    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.size_; i++) {
            const v = this.buf[(this.head + i) & (this.buf.length - 1)];
            if (v !== undefined) out.push(v);
        }
        return out;
    }

    private grow(): void {
        const old = this.buf;
        const newBuf = new Array<T | undefined>(Math.min(old.length * 2, this.maxCap));

        for (let i = 0; i < this.size_; i++) {
            newBuf[i] = old[(this.head + i) & (old.length - 1)];
        }

        this.buf = newBuf;
        this.head = 0;
        this.tail = this.size_;
    }

    private nextPow2(n: number): number {
        let x = 1;
        while (x < n) x <<= 1;
        return x;
    }
}
