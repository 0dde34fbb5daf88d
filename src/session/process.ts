import { spawn } from "node:child_process";
import { silentLogger, type Logger } from "../core/runtime/logger";
import { ENV } from "../core/stream/wire";

export type ChildExit = {
    code: number | null;
    signal: NodeJS.Signals | null;
};

export interface ChildHandle {
    readonly pid: number;
    /** Se resuelve cuando el proceso termina; nunca rechaza. */
    readonly exited: Promise<ChildExit>;
    readonly hasExited: boolean;
    kill(signal?: NodeJS.Signals): void;
}

export interface ProcessLauncher {
    /** Rechaza si el proceso no pudo arrancar (p.ej. ENOENT). */
    spawn(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<ChildHandle>;
}

/** Entorno del hijo: el del operador más las variables que activan los eventos. */
export function traceEnv(dir: string, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    return {
        ...base,
        [ENV.start]: "1",
        [ENV.dir]: dir,
        [ENV.preserve]: "1",
    };
}

export type NodeLauncherOptions = {
    logger?: Logger;
    stdio?: "inherit" | "ignore";
};

export function nodeLauncher(opts: NodeLauncherOptions = {}): ProcessLauncher {
    const logger = opts.logger ?? silentLogger;
    return {
        spawn: (argv, env) =>
            new Promise<ChildHandle>((resolve, reject) => {
                const [command, ...args] = argv;
                if (command === undefined) {
                    reject(new Error("empty command line"));
                    return;
                }

                const child = spawn(command, args, { env, stdio: opts.stdio ?? "inherit" });

                let hasExited = false;
                const exited = new Promise<ChildExit>((res) => {
                    child.once("exit", (code, signal) => {
                        hasExited = true;
                        res({ code, signal });
                    });
                });

                child.once("error", reject);
                child.once("spawn", () => {
                    child.removeListener("error", reject);
                    child.on("error", (e) => logger.warn("child process error", { error: e.message }));

                    const pid = child.pid;
                    if (pid === undefined) {
                        reject(new Error(`${command} started without a pid`));
                        return;
                    }
                    resolve({
                        pid,
                        exited,
                        get hasExited() {
                            return hasExited;
                        },
                        kill: (signal = "SIGTERM") => {
                            child.kill(signal);
                        },
                    });
                });
            }),
    };
}
