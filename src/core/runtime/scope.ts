// src/core/runtime/scope.ts
import { Exit } from "../types/effect";

export type Finalizer = (exit: Exit<unknown, unknown>) => void | Promise<void>;

/**
 * Dueño de recursos: al cerrar corre los finalizers en orden LIFO. Un finalizer que
 * falla no impide correr a los demás.
 */
export class Scope {
    private closed = false;

    private readonly finalizers: Finalizer[] = [];

    /** registra un finalizer (LIFO) */
    addFinalizer(f: Finalizer): void {
        if (this.closed) {
            throw new Error("Trying to add finalizer to closed scope");
        }
        this.finalizers.push(f);
    }

    /**
     * Cierra el scope una sola vez. Devuelve los errores de los finalizers (vacío si
     * todo cerró bien); un segundo close devuelve [].
     */
    async close(exit: Exit<unknown, unknown> = Exit.succeed(undefined)): Promise<unknown[]> {
        if (this.closed) return [];
        this.closed = true;

        const errors: unknown[] = [];

        let fin = this.finalizers.pop();
        while (fin) {
            try {
                await fin(exit);
            } catch (e) {
                errors.push(e);
            }
            fin = this.finalizers.pop();
        }
        return errors;
    }
}

export async function acquireRelease<A>(
    scope: Scope,
    acquire: () => A | Promise<A>,
    release: (res: A, exit: Exit<unknown, unknown>) => void | Promise<void>,
): Promise<A> {
    const resource = await acquire();
    scope.addFinalizer((exit) => release(resource, exit));
    return resource;
}
