import { closeSync, openSync, readSync } from "node:fs";
import { join } from "node:path";
import { StringDecoder } from "node:string_decoder";
import type { CursorCallbacks } from "../runtime/events";
import { silentLogger, type Logger } from "../runtime/logger";
import { decodeLine, eventFileName } from "./wire";

export class CursorUnavailableError extends Error {
    constructor(readonly path: string, readonly cause: unknown) {
        super(`no event buffer at ${path} yet`);
        this.name = "CursorUnavailableError";
    }
}

export interface EventCursor {
    /** Entrega sincrónicamente todo lo disponible. Devuelve cuántos eventos entregó. */
    read(callbacks: CursorCallbacks): number;
    close(): void;
}

export interface EventSource {
    /** Falla con `CursorUnavailableError` mientras el proceso no creó su buffer. */
    open(dir: string, pid: number): EventCursor;
}

const CHUNK = 64 * 1024;

/**
 * Reads the `<pid>.events` file a traced process appends to. A trailing line without
 * its newline stays buffered until the producer finishes it.
 */
export class FileEventCursor implements EventCursor {
    private fd: number | null;
    private offset = 0;
    private partial = "";
    private readonly decoder = new StringDecoder("utf8");
    private readonly chunk = Buffer.alloc(CHUNK);

    malformed = 0;

    constructor(readonly path: string, private readonly logger: Logger = silentLogger) {
        try {
            this.fd = openSync(path, "r");
        } catch (e) {
            throw new CursorUnavailableError(path, e);
        }
    }

    read(callbacks: CursorCallbacks): number {
        if (this.fd === null) throw new Error(`cursor ${this.path} is closed`);

        let text = "";
        for (;;) {
            const n = readSync(this.fd, this.chunk, 0, CHUNK, this.offset);
            if (n === 0) break;
            this.offset += n;
            text += this.decoder.write(this.chunk.subarray(0, n));
        }
        if (text === "") return 0;

        const lines = (this.partial + text).split("\n");
        this.partial = lines.pop() ?? "";

        let delivered = 0;
        for (const raw of lines) {
            const line = raw.trim();
            if (line === "") continue;

            const decoded = decodeLine(line);
            switch (decoded.kind) {
                case "event":
                    callbacks.onEvent(decoded.ringId, decoded.ts, decoded.event);
                    delivered++;
                    break;
                case "lost":
                    callbacks.onLost(decoded.ringId, decoded.count);
                    break;
                case "malformed":
                    this.malformed++;
                    this.logger.warn("skipping malformed event line", { reason: decoded.reason, path: this.path });
                    break;
            }
        }
        return delivered;
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        closeSync(fd);
    }
}

export function fileEventSource(logger: Logger = silentLogger): EventSource {
    return {
        open: (dir, pid) => new FileEventCursor(join(dir, eventFileName(pid)), logger),
    };
}
