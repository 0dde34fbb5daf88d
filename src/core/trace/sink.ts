import { closeSync, openSync, writeSync } from "node:fs";

export interface ByteSink {
    write(chunk: Uint8Array): void;
    flush(): void;
    close(): void;
}

export class TraceWriteError extends Error {
    constructor(readonly path: string, readonly cause: unknown) {
        super(`cannot write trace file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = "TraceWriteError";
    }
}

const FLUSH_THRESHOLD = 64 * 1024;

/**
 * Sink a archivo con buffer propio. Escribe de forma sincrónica: un error de disco
 * sale como excepción en el mismo record que lo provocó.
 */
export class FileSink implements ByteSink {
    private fd: number | null;
    private pending: Uint8Array[] = [];
    private pendingBytes = 0;

    constructor(readonly path: string) {
        try {
            this.fd = openSync(path, "w", 0o644);
        } catch (e) {
            throw new TraceWriteError(path, e);
        }
    }

    write(chunk: Uint8Array): void {
        if (this.fd === null) throw new TraceWriteError(this.path, new Error("sink is closed"));
        this.pending.push(chunk);
        this.pendingBytes += chunk.length;
        if (this.pendingBytes >= FLUSH_THRESHOLD) this.flush();
    }

    flush(): void {
        if (this.fd === null || this.pendingBytes === 0) return;
        const data = Buffer.concat(this.pending, this.pendingBytes);
        this.pending = [];
        this.pendingBytes = 0;
        try {
            let off = 0;
            while (off < data.length) off += writeSync(this.fd, data, off, data.length - off);
        } catch (e) {
            throw new TraceWriteError(this.path, e);
        }
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        try {
            this.flush();
        } finally {
            this.fd = null;
            closeSync(fd);
        }
    }
}

/** Sink en memoria (tests, replays). */
export class MemorySink implements ByteSink {
    private chunks: Uint8Array[] = [];
    closed = false;
    flushes = 0;

    write(chunk: Uint8Array): void {
        this.chunks.push(chunk);
    }

    flush(): void {
        this.flushes++;
    }

    close(): void {
        this.closed = true;
    }

    bytes(): Buffer {
        return Buffer.concat(this.chunks);
    }
}
