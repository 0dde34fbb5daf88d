import { z } from "zod";
import { Exit } from "../core/types/effect";
import type { SessionError } from "./errors";

export const DEFAULT_FREQ = 10;
export const DEFAULT_CURSOR_RETRY_MS = 100;
export const DEFAULT_UI_WAIT_MS = 1000;

export const SessionConfigSchema = z.object({
    /** Programa instrumentado y sus argumentos. */
    argv: z.array(z.string()).min(1, "a program to run is required"),
    /** Lecturas por segundo mientras el hijo corre. */
    freq: z.number().finite().positive().default(DEFAULT_FREQ),
    /** Sin valor, la traza queda dentro del directorio temporal (solo sirve con `ui`). */
    tracefile: z.string().min(1).optional(),
    /** Comando del visualizador; recibe la ruta de la traza como último argumento. */
    ui: z.array(z.string()).min(1).optional(),
    cursorRetryMs: z.number().int().positive().default(DEFAULT_CURSOR_RETRY_MS),
    uiWaitMs: z.number().int().nonnegative().default(DEFAULT_UI_WAIT_MS),
    killGraceMs: z.number().int().nonnegative().default(2000),
    tmpRoot: z.string().min(1).optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    logFormat: z.enum(["text", "json"]).default("text"),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

export function parseSessionConfig(input: unknown): Exit<SessionError, SessionConfig> {
    const parsed = SessionConfigSchema.safeParse(input);
    if (parsed.success) return Exit.succeed(parsed.data);
    return Exit.fail({
        _tag: "InvalidConfig",
        issues: parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)),
    });
}

export const pollDelayMs = (config: Pick<SessionConfig, "freq">): number => 1000 / config.freq;
