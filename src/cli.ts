#!/usr/bin/env node
/**
 * fiber-trace command line.
 *
 *   fiber-trace record [options] -- PROG [ARGS...]
 */

import chalk from "chalk";
import { consoleJsonLoggerSink, consoleTextLoggerSink, makeLogger, type LogLevel } from "./core/runtime/logger";
import { describeCause } from "./core/types/effect";
import { parseSessionConfig, type SessionConfigInput } from "./session/config";
import { describeSessionError } from "./session/errors";
import { nodeLauncher } from "./session/process";
import { recordSession } from "./session/session";
import { commandViewer } from "./session/viewer";

export const VERSION = "0.1.0";

export const DEFAULT_OUTPUT = "trace.fxt";

export type CliCommand =
    | { kind: "help" }
    | { kind: "version" }
    | { kind: "record"; config: SessionConfigInput }
    | { kind: "usage-error"; message: string };

const USAGE = `Usage: fiber-trace record [options] -- PROG [ARGS...]

Runs PROG with runtime events enabled and writes its fiber schedule as a
Fuchsia trace (.fxt).

Options:
  -o, --output FILE     trace file (default: ${DEFAULT_OUTPUT}, env FIBER_TRACE_OUTPUT)
  -F, --freq HZ         event polls per second (default: 10, env FIBER_TRACE_FREQ)
      --ui CMD          run "CMD <tracefile>" once the first events arrive
      --log-format FMT  text | json (default: text)
  -v, --verbose         debug logging
  -h, --help            show this help
      --version         print the version
`;

/**
 * Parse command-line arguments. Pure: reads only `args` and `env`.
 */
export function parseCliArgs(args: readonly string[], env: NodeJS.ProcessEnv = {}): CliCommand {
    const first = args[0];
    if (first === undefined || first === "-h" || first === "--help") return { kind: "help" };
    if (first === "--version") return { kind: "version" };
    if (first !== "record") return { kind: "usage-error", message: `unknown command: ${first}` };

    const config: SessionConfigInput = { argv: [], tracefile: env.FIBER_TRACE_OUTPUT || DEFAULT_OUTPUT };
    if (env.FIBER_TRACE_FREQ) config.freq = Number(env.FIBER_TRACE_FREQ);

    let i = 1;
    const next = (): string | undefined => args[++i];

    // las opciones terminan en "--" o en el primer argumento que no empieza con "-"
    for (; i < args.length; i++) {
        const a = args[i];
        if (a === undefined || a === "--") {
            i++;
            break;
        }
        if (!a.startsWith("-")) break;

        switch (a) {
            case "-h":
            case "--help":
                return { kind: "help" };
            case "-o":
            case "--output": {
                const v = next();
                if (v === undefined) return { kind: "usage-error", message: `${a} needs a file` };
                config.tracefile = v;
                break;
            }
            case "-F":
            case "--freq": {
                const v = next();
                if (v === undefined) return { kind: "usage-error", message: `${a} needs a number` };
                config.freq = Number(v);
                break;
            }
            case "--ui": {
                const v = next();
                if (v === undefined) return { kind: "usage-error", message: `${a} needs a command` };
                config.ui = v.split(/\s+/).filter((s) => s !== "");
                break;
            }
            case "--log-format": {
                const v = next();
                if (v !== "text" && v !== "json") return { kind: "usage-error", message: `${a} must be text or json` };
                config.logFormat = v;
                break;
            }
            case "-v":
            case "--verbose":
                config.logLevel = "debug";
                break;
            default:
                return { kind: "usage-error", message: `unknown option: ${a}` };
        }
    }

    config.argv = args.slice(i);
    return { kind: "record", config };
}

export async function main(args: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    const cmd = parseCliArgs(args, env);
    switch (cmd.kind) {
        case "help":
            process.stdout.write(USAGE);
            return 0;
        case "version":
            process.stdout.write(`${VERSION}\n`);
            return 0;
        case "usage-error":
            process.stderr.write(`${chalk.red("error:")} ${cmd.message}\n\n${USAGE}`);
            return 1;
        case "record":
            break;
    }

    const parsed = parseSessionConfig(cmd.config);
    if (parsed._tag === "Failure") {
        const msg = parsed.cause._tag === "Fail" ? describeSessionError(parsed.cause.error) : "invalid configuration";
        process.stderr.write(`${chalk.red("error:")} ${msg}\n`);
        return 1;
    }
    const config = parsed.value;

    const level: LogLevel = config.logLevel;
    const logger = makeLogger(config.logFormat === "json" ? consoleJsonLoggerSink() : consoleTextLoggerSink(), level);

    const ac = new AbortController();
    const onSignal = (sig: NodeJS.Signals) => {
        logger.warn(`received ${sig}, stopping`);
        ac.abort();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    const launcher = nodeLauncher({ logger });
    const viewer = config.ui ? commandViewer(config.ui, launcher, logger) : undefined;

    try {
        const exit = await recordSession(config, { launcher, viewer, logger, signal: ac.signal });
        if (exit._tag === "Success") {
            const s = exit.value;
            logger.info(`Trace written to ${s.tracefile}`, {
                events: s.events,
                lost: s.lostEvents > 0 ? s.lostEvents : undefined,
                rings: s.rings,
                fibers: s.fibers,
                exitCode: s.child.code ?? undefined,
                signal: s.child.signal ?? undefined,
            });
            return 0;
        }
        logger.error(`recording ${describeCause(exit.cause, describeSessionError)}`);
        return exit.cause._tag === "Interrupt" ? 130 : 1;
    } finally {
        process.removeListener("SIGINT", onSignal);
        process.removeListener("SIGTERM", onSignal);
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then(
        (code) => process.exit(code),
        (e: unknown) => {
            process.stderr.write(`fiber-trace: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
            process.exit(1);
        },
    );
}
