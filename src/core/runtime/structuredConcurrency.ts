// src/core/runtime/structuredConcurrency.ts

/**
 * Un lado de una carrera: recibe la señal que lo cancela cuando pierde.
 */
export type Racer<A> = (signal: AbortSignal) => Promise<A>;

/**
 * race(A, B):
 *   - corre A y B en paralelo
 *   - el primero que termine (bien o mal) gana
 *   - el otro es cancelado vía su AbortSignal
 */
export function race<A, B>(left: Racer<A>, right: Racer<B>, parent?: AbortSignal): Promise<A | B> {
    // cada carrera tiene su propio controller, enganchado al del padre
    const ac = new AbortController();
    const onParentAbort = () => ac.abort();
    if (parent?.aborted) ac.abort();
    else parent?.addEventListener("abort", onParentAbort, { once: true });

    const settle = () => {
        parent?.removeEventListener("abort", onParentAbort);
        ac.abort();
    };

    return new Promise<A | B>((resolve, reject) => {
        let done = false;
        const onValue = (v: A | B) => {
            if (done) return;
            done = true;
            settle();
            resolve(v);
        };
        const onError = (e: unknown) => {
            if (done) return;
            done = true;
            settle();
            reject(e);
        };

        left(ac.signal).then(onValue, onError);
        right(ac.signal).then(onValue, onError);
    });
}

/**
 * Promesa que se resuelve una sola vez desde afuera.
 */
export class Deferred<A> {
    readonly promise: Promise<A>;
    private readonly resolve_: (a: A) => void;
    private done = false;

    constructor() {
        let resolve: (a: A) => void = () => {};
        // el executor corre sincrónicamente
        this.promise = new Promise<A>((r) => {
            resolve = r;
        });
        this.resolve_ = resolve;
    }

    get isDone(): boolean {
        return this.done;
    }

    succeed(a: A): void {
        if (this.done) return;
        this.done = true;
        this.resolve_(a);
    }
}
