import "dotenv/config";
import { z } from "zod";
import type { RetryPolicy } from "./retry";

const intFromEnv = (fallback: number, min: number) =>
    z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FORMAT: z.enum(["json", "text"]).default("json"),
    STORE_DRIVER: z.enum(["memory", "file"]).default("file"),
    DATA_DIR: z.string().min(1).default("./data"),
    STATE_FILE: z.string().min(1).default("store.json"),
    CATALOG_FILE: z.string().optional(),
    LEDGER_MAX_ATTEMPTS: intFromEnv(5, 1),
    LEDGER_BACKOFF_BASE_MS: intFromEnv(25, 0),
    LEDGER_BACKOFF_CAP_MS: intFromEnv(1000, 0),
    LEDGER_APPLIED_WINDOW: intFromEnv(256, 1),
    DISPLAY_TZ: z.string().min(1).default("America/New_York"),
    ADMIN_USER_IDS: z.string().default(""),
    SLACK_BOT_TOKEN: z.string().optional(),
    SLACK_APP_TOKEN: z.string().optional(),
    SLACK_SIGNING_SECRET: z.string().optional(),
    PORT: intFromEnv(3000, 1),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];
export type LogFormat = z.infer<typeof EnvSchema>["LOG_FORMAT"];

export type AppConfig = {
    logLevel: LogLevel;
    logFormat: LogFormat;
    storeDriver: "memory" | "file";
    dataDir: string;
    stateFile: string;
    catalogFile?: string;
    retry: RetryPolicy;
    appliedWindow: number;
    displayTz: string;
    adminUserIds: string[];
    slack: {
        botToken?: string;
        appToken?: string;
        signingSecret?: string;
        port: number;
    };
};

// Blank values in .env count as unset.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(env)) {
        if (v !== undefined && v.trim() !== "") out[k] = v.trim();
    }
    return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
        throw new Error(`Invalid configuration: ${issues.join("; ")}`);
    }
    const e = parsed.data;
    if (e.LEDGER_BACKOFF_CAP_MS < e.LEDGER_BACKOFF_BASE_MS) {
        throw new Error("Invalid configuration: LEDGER_BACKOFF_CAP_MS must be >= LEDGER_BACKOFF_BASE_MS");
    }

    return {
        logLevel: e.LOG_LEVEL,
        logFormat: e.LOG_FORMAT,
        storeDriver: e.STORE_DRIVER,
        dataDir: e.DATA_DIR,
        stateFile: e.STATE_FILE,
        catalogFile: e.CATALOG_FILE,
        retry: {
            maxAttempts: e.LEDGER_MAX_ATTEMPTS,
            baseDelayMs: e.LEDGER_BACKOFF_BASE_MS,
            maxDelayMs: e.LEDGER_BACKOFF_CAP_MS,
        },
        appliedWindow: e.LEDGER_APPLIED_WINDOW,
        displayTz: e.DISPLAY_TZ,
        adminUserIds: e.ADMIN_USER_IDS.split(",").map((s) => s.trim()).filter(Boolean),
        slack: {
            botToken: e.SLACK_BOT_TOKEN,
            appToken: e.SLACK_APP_TOKEN,
            signingSecret: e.SLACK_SIGNING_SECRET,
            port: e.PORT,
        },
    };
}

export const CONFIG = loadConfig();
