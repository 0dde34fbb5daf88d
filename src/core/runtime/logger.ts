import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type LogRecord = {
    level: LogLevel;
    msg: string;
    wallTs: number;
    fields: LogFields;
};

export type LogSink = (rec: LogRecord) => void;

export interface Logger {
    debug(msg: string, fields?: LogFields): void;
    info(msg: string, fields?: LogFields): void;
    warn(msg: string, fields?: LogFields): void;
    error(msg: string, fields?: LogFields): void;
}

const ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// bigint no serializa en JSON
const jsonReplacer = (_key: string, value: unknown): unknown =>
    typeof value === "bigint" ? value.toString() : value;

type Out = { write(line: string): unknown };

/** Un objeto JSON por línea. */
export function consoleJsonLoggerSink(out: Out = process.stderr): LogSink {
    return (rec) => {
        const line = { level: rec.level, msg: rec.msg, wallTs: rec.wallTs, ...rec.fields };
        out.write(JSON.stringify(line, jsonReplacer) + "\n");
    };
}

const LEVEL_STYLE: Record<LogLevel, (s: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red.bold,
};

export function formatFields(fields: LogFields): string {
    return Object.entries(fields)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v, jsonReplacer)}`)
        .join(" ");
}

/** Texto para humanos, con color si la terminal lo soporta. */
export function consoleTextLoggerSink(out: Out = process.stderr): LogSink {
    return (rec) => {
        const extra = formatFields(rec.fields);
        const tag = LEVEL_STYLE[rec.level](rec.level.padEnd(5));
        out.write(`${tag} ${rec.msg}${extra ? " " + chalk.dim(extra) : ""}\n`);
    };
}

export function makeLogger(sink: LogSink, minLevel: LogLevel = "info"): Logger {
    const log = (level: LogLevel) => (msg: string, fields: LogFields = {}) => {
        if (ORDER[level] < ORDER[minLevel]) return;
        sink({ level, msg, wallTs: Date.now(), fields });
    };
    return {
        debug: log("debug"),
        info: log("info"),
        warn: log("warn"),
        error: log("error"),
    };
}

export const silentLogger: Logger = makeLogger(() => {}, "error");

/** Guarda todo en memoria. */
export function memoryLogger(minLevel: LogLevel = "debug"): Logger & { records: LogRecord[] } {
    const records: LogRecord[] = [];
    return Object.assign(makeLogger((rec) => records.push(rec), minLevel), { records });
}
