import type { LogFormat, LogLevel } from "./config";

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

type Context = Record<string, unknown>;

let currentLevel: LogLevel = "info";
let currentFormat: LogFormat = "json";

export function setLogLevel(level: LogLevel) {
    currentLevel = level;
}

export function setLogFormat(format: LogFormat) {
    currentFormat = format;
}

function render(value: unknown): string {
    if (typeof value === "string") return value;
    if (value instanceof Error) return value.message;
    return JSON.stringify(value) ?? String(value);
}

export function formatLine(level: LogLevel, msg: string, ctx: Context, at: string): string {
    if (currentFormat === "text") {
        const pairs = Object.entries(ctx).map(([k, v]) => `${k}=${render(v)}`);
        return [at, level.toUpperCase(), msg, ...pairs].join(" ");
    }
    return JSON.stringify({ t: at, level, msg, ...ctx });
}

export function log(level: LogLevel, msg: string, ctx: Context = {}) {
    if (LEVELS[level] < LEVELS[currentLevel]) return;
    const line = formatLine(level, msg, ctx, new Date().toISOString());
    if (level === "error") console.error(line);
    else console.log(line);
}

export type Logger = {
    debug: (m: string, c?: Context) => void;
    info: (m: string, c?: Context) => void;
    warn: (m: string, c?: Context) => void;
    error: (m: string, c?: Context) => void;
    child: (bound: Context) => Logger;
};

function bind(bound: Context): Logger {
    return {
        debug: (m, c) => log("debug", m, { ...bound, ...c }),
        info: (m, c) => log("info", m, { ...bound, ...c }),
        warn: (m, c) => log("warn", m, { ...bound, ...c }),
        error: (m, c) => log("error", m, { ...bound, ...c }),
        child: (more) => bind({ ...bound, ...more }),
    };
}

export const logger: Logger = bind({});
