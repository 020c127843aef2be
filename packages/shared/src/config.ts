import { config as dotenvConfig } from "dotenv";
import { resolve } from "node:path";
import { existsSync } from "node:fs";
import { LOG_LEVELS, parseLogLevel, type LogLevel } from "./utils/logger.js";

export const DEFAULT_GRAPHQL_URL = "http://localhost:9999/graphql";
export const DEFAULT_SCRAPE_INTERVAL_SECONDS = 30;
export const DEFAULT_LISTEN_PORT = 9100;
export const DEFAULT_LISTEN_HOST = "0.0.0.0";

const MAX_DEFAULT_TIMEOUT_MS = 10_000;

export interface ExporterConfig {
    readonly stash: {
        readonly graphqlUrl: string;
        readonly apiKey: string;
    };
    readonly scrape: {
        readonly intervalMs: number;
        /** Always strictly below intervalMs */
        readonly timeoutMs: number;
    };
    readonly exporter: {
        readonly port: number;
        readonly host: string;
    };
    readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
    readonly problems: readonly string[];
    constructor(problems: string[]) {
        super(`Invalid configuration: ${problems.join("; ")}`);
        this.name = "ConfigError";
        this.problems = problems;
    }
}

type Env = Record<string, string | undefined>;

/**
 * Load .env from the working directory or its parents (monorepo root first
 * found wins). Variables already set in the environment are left alone.
 */
export function loadEnvFiles(cwd: string = process.cwd()): string | null {
    const envPaths = [
        resolve(cwd, ".env"),
        resolve(cwd, "..", ".env"),
        resolve(cwd, "..", "..", ".env"),
    ];
    for (const envPath of envPaths) {
        if (existsSync(envPath)) {
            dotenvConfig({ path: envPath });
            return envPath;
        }
    }
    return null;
}

function getEnvOrDefault(env: Env, name: string, defaultValue: string): string {
    const value = env[name]?.trim();
    return value ? value : defaultValue;
}

/**
 * Build the validated configuration once at startup. Every problem is
 * collected so the operator sees them all in a single ConfigError.
 */
export function loadConfig(env: Env = process.env): ExporterConfig {
    const problems: string[] = [];

    const graphqlUrl = getEnvOrDefault(env, "STASH_GRAPHQL_URL", DEFAULT_GRAPHQL_URL);
    if (!URL.canParse(graphqlUrl) || !/^https?:$/.test(new URL(graphqlUrl).protocol)) {
        problems.push(`STASH_GRAPHQL_URL must be an http(s) URL, got "${graphqlUrl}"`);
    }

    const apiKey = env.STASH_API_KEY?.trim() ?? "";
    if (!apiKey) {
        problems.push("Missing required environment variable: STASH_API_KEY");
    }

    const intervalRaw = getEnvOrDefault(env, "SCRAPE_INTERVAL_SECONDS", String(DEFAULT_SCRAPE_INTERVAL_SECONDS));
    const intervalSeconds = Number(intervalRaw);
    const intervalValid = Number.isInteger(intervalSeconds) && intervalSeconds > 0;
    if (!intervalValid) {
        problems.push(`SCRAPE_INTERVAL_SECONDS must be a positive integer, got "${intervalRaw}"`);
    }
    const intervalMs = intervalValid ? intervalSeconds * 1000 : DEFAULT_SCRAPE_INTERVAL_SECONDS * 1000;

    let timeoutMs = Math.min(MAX_DEFAULT_TIMEOUT_MS, Math.max(intervalMs - 1000, intervalMs / 2));
    const timeoutRaw = env.SCRAPE_TIMEOUT_SECONDS?.trim();
    if (timeoutRaw) {
        const timeoutSeconds = Number(timeoutRaw);
        if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
            problems.push(`SCRAPE_TIMEOUT_SECONDS must be a positive number, got "${timeoutRaw}"`);
        } else if (timeoutSeconds * 1000 >= intervalMs) {
            problems.push(
                `SCRAPE_TIMEOUT_SECONDS (${timeoutRaw}) must be shorter than SCRAPE_INTERVAL_SECONDS (${intervalMs / 1000})`,
            );
        } else {
            timeoutMs = Math.round(timeoutSeconds * 1000);
        }
    }

    const portRaw = getEnvOrDefault(env, "EXPORTER_LISTEN_PORT", String(DEFAULT_LISTEN_PORT));
    const port = Number(portRaw);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        problems.push(`EXPORTER_LISTEN_PORT must be an integer between 1 and 65535, got "${portRaw}"`);
    }

    const host = getEnvOrDefault(env, "EXPORTER_LISTEN_HOST", DEFAULT_LISTEN_HOST);

    const levelRaw = getEnvOrDefault(env, "LOG_LEVEL", "info").toLowerCase();
    const parsedLevel = parseLogLevel(levelRaw);
    if (parsedLevel === null) {
        problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${levelRaw}"`);
    }
    const logLevel: LogLevel = parsedLevel ?? "info";

    if (problems.length > 0) {
        throw new ConfigError(problems);
    }

    return Object.freeze({
        stash: Object.freeze({ graphqlUrl, apiKey }),
        scrape: Object.freeze({ intervalMs, timeoutMs }),
        exporter: Object.freeze({ port, host }),
        logLevel,
    });
}
