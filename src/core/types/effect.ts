export type Cause<E> =
    | { readonly _tag: "Fail"; readonly error: E }
    | { readonly _tag: "Interrupt" }
    | { readonly _tag: "Die"; readonly defect: unknown };

export const Cause = {
    fail: <E>(error: E): Cause<E> => ({ _tag: "Fail", error }),
    interrupt: <E = never>(): Cause<E> => ({ _tag: "Interrupt" }),
    die: <E = never>(defect: unknown): Cause<E> => ({ _tag: "Die", defect }),
};

export type Exit<E, A> =
    | { readonly _tag: "Success"; readonly value: A }
    | { readonly _tag: "Failure"; readonly cause: Cause<E> };

export const Exit = {
    succeed: <E = never, A = never>(value: A): Exit<E, A> => ({
        _tag: "Success",
        value,
    }),

    failCause: <E = never, A = never>(cause: Cause<E>): Exit<E, A> => ({
        _tag: "Failure",
        cause,
    }),

    fail: <E, A = never>(error: E): Exit<E, A> => ({
        _tag: "Failure",
        cause: Cause.fail(error),
    }),

    interrupt: <E = never, A = never>(): Exit<E, A> => ({
        _tag: "Failure",
        cause: Cause.interrupt(),
    }),
};

/** Texto corto para logs: "success", "interrupted", "failed: ..." */
export function describeCause<E>(cause: Cause<E>, describeError: (e: E) => string): string {
    switch (cause._tag) {
        case "Fail":
            return `failed: ${describeError(cause.error)}`;
        case "Interrupt":
            return "interrupted";
        case "Die":
            return `died: ${cause.defect instanceof Error ? cause.defect.message : String(cause.defect)}`;
    }
}
