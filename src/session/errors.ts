import { Cause, Exit } from "../core/types/effect";
import { isInterrupted } from "../core/runtime/sleep";
import { TraceWriteError } from "../core/trace/sink";

export type SessionError =
    | { readonly _tag: "InvalidConfig"; readonly issues: readonly string[] }
    | { readonly _tag: "SpawnFailed"; readonly command: string; readonly message: string }
    | { readonly _tag: "WriterFailed"; readonly path: string; readonly message: string };

/** Lleva un `SessionError` a través de código async que solo sabe tirar excepciones. */
export class SessionFailure extends Error {
    constructor(readonly error: SessionError) {
        super(describeSessionError(error));
        this.name = "SessionFailure";
    }
}

export function describeSessionError(e: SessionError): string {
    switch (e._tag) {
        case "InvalidConfig":
            return `invalid configuration: ${e.issues.join("; ")}`;
        case "SpawnFailed":
            return `cannot start ${e.command}: ${e.message}`;
        case "WriterFailed":
            return `trace output ${e.path} failed: ${e.message}`;
    }
}

export function exitFromError<A>(e: unknown): Exit<SessionError, A> {
    if (isInterrupted(e)) return Exit.interrupt();
    if (e instanceof SessionFailure) return Exit.fail(e.error);
    if (e instanceof TraceWriteError) {
        const message = e.cause instanceof Error ? e.cause.message : String(e.cause);
        return Exit.fail({ _tag: "WriterFailed", path: e.path, message });
    }
    return Exit.failCause(Cause.die(e));
}
