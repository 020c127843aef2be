import {
    createLogger,
    type LibraryStats,
    type ScrapeFailure,
    type ScrapeFailureKind,
    type ScrapeResult,
} from "@stash-exporter/shared";
import { LIBRARY_STATS_OPERATION, LIBRARY_STATS_QUERY } from "./queries.js";

const logger = createLogger("stash-client");

// Longest slice of an error response body kept in a failure message
const MAX_DETAIL_LENGTH = 200;

export interface FetchStatsOptions {
    timeoutMs: number;
}

/**
 * Anything that can produce one round of library statistics. The scheduler
 * only depends on this, so tests can hand it a stub.
 */
export interface StatsSource {
    fetchStats(options: FetchStatsOptions): Promise<ScrapeResult>;
}

export interface StashClientOptions {
    graphqlUrl: string;
    apiKey: string;
    fetch?: typeof fetch;
}

interface StashStatsPayload {
    scene_count: number;
    scenes_size: number;
    image_count: number;
    images_size: number;
    performer_count: number;
    studio_count: number;
}

const COUNT_FIELDS = ["scene_count", "image_count", "performer_count", "studio_count"] as const;
const SIZE_FIELDS = ["scenes_size", "images_size"] as const;

function okResult(stats: LibraryStats): ScrapeResult {
    return { ok: true, stats };
}

function errorResult(kind: ScrapeFailureKind, message: string, status?: number): ScrapeResult {
    const error: ScrapeFailure = status === undefined ? { kind, message } : { kind, message, status };
    return { ok: false, error };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorName(err: unknown): string | undefined {
    return isRecord(err) && typeof err.name === "string" ? err.name : undefined;
}

function isAbortError(err: unknown): boolean {
    const name = errorName(err);
    return name === "TimeoutError" || name === "AbortError";
}

function describeError(err: unknown): string {
    if (!(err instanceof Error)) return String(err);
    // undici wraps socket errors as TypeError("fetch failed") with the reason in cause
    if (err.cause instanceof Error) return `${err.message}: ${err.cause.message}`;
    return err.message;
}

function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isNonNegativeNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function extractGraphqlErrors(errors: unknown[]): string {
    return errors
        .map((e) => (isRecord(e) && typeof e.message === "string" ? e.message : JSON.stringify(e)))
        .join("; ");
}

function readPayload(stats: Record<string, unknown>): StashStatsPayload | string {
    const { scene_count, scenes_size, image_count, images_size, performer_count, studio_count } = stats;
    if (
        isNonNegativeInteger(scene_count) &&
        isNonNegativeInteger(image_count) &&
        isNonNegativeInteger(performer_count) &&
        isNonNegativeInteger(studio_count) &&
        isNonNegativeNumber(scenes_size) &&
        isNonNegativeNumber(images_size)
    ) {
        return { scene_count, scenes_size, image_count, images_size, performer_count, studio_count };
    }
    const invalid = [
        ...COUNT_FIELDS.filter((field) => !isNonNegativeInteger(stats[field])),
        ...SIZE_FIELDS.filter((field) => !isNonNegativeNumber(stats[field])),
    ];
    return `Missing or invalid fields: ${invalid.map((field) => `stats.${field}`).join(", ")}`;
}

/**
 * Turn a decoded GraphQL response body into library stats. Files are the
 * primary files of scenes and images; their sizes arrive as floats.
 */
export function parseStatsResponse(body: unknown): ScrapeResult {
    if (!isRecord(body)) {
        return errorResult("malformed", "Response body is not a JSON object");
    }
    if (Array.isArray(body.errors) && body.errors.length > 0) {
        return errorResult("graphql", extractGraphqlErrors(body.errors));
    }
    const data = body.data;
    if (!isRecord(data) || !isRecord(data.stats)) {
        return errorResult("malformed", "Response has no data.stats object");
    }
    const payload = readPayload(data.stats);
    if (typeof payload === "string") {
        return errorResult("malformed", payload);
    }
    return okResult({
        scenesTotal: payload.scene_count,
        imagesTotal: payload.image_count,
        performersTotal: payload.performer_count,
        studiosTotal: payload.studio_count,
        filesTotal: payload.scene_count + payload.image_count,
        filesSizeBytes: Math.round(payload.scenes_size + payload.images_size),
    });
}

/**
 * Client for the Stash GraphQL API. One call is one request: failures come
 * back as classified results and are never retried here.
 */
export class StashClient implements StatsSource {
    private readonly graphqlUrl: string;
    private readonly apiKey: string;
    private readonly fetchFn: typeof fetch;
    constructor(options: StashClientOptions) {
        this.graphqlUrl = options.graphqlUrl;
        this.apiKey = options.apiKey;
        this.fetchFn = options.fetch ?? globalThis.fetch;
    }
    async fetchStats({ timeoutMs }: FetchStatsOptions): Promise<ScrapeResult> {
        const started = performance.now();
        const signal = AbortSignal.timeout(timeoutMs);
        let response: Response;
        try {
            response = await this.fetchFn(this.graphqlUrl, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    Accept: "application/json",
                    ApiKey: this.apiKey,
                },
                body: JSON.stringify({
                    operationName: LIBRARY_STATS_OPERATION,
                    query: LIBRARY_STATS_QUERY,
                }),
                signal,
            });
        } catch (err) {
            if (isAbortError(err)) {
                return errorResult("timeout", `No response from Stash within ${timeoutMs}ms`);
            }
            return errorResult("network", describeError(err));
        }
        if (!response.ok) {
            const detail = await response.text().then(
                (text) => text.slice(0, MAX_DETAIL_LENGTH).trim(),
                () => "",
            );
            const message = detail
                ? `Stash responded with HTTP ${response.status}: ${detail}`
                : `Stash responded with HTTP ${response.status}`;
            return errorResult("http_status", message, response.status);
        }
        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            if (isAbortError(err)) {
                return errorResult("timeout", `Response body from Stash not received within ${timeoutMs}ms`);
            }
            return errorResult("malformed", `Response body is not valid JSON: ${describeError(err)}`);
        }
        const result = parseStatsResponse(body);
        logger.debug(
            { url: this.graphqlUrl, ok: result.ok, durationMs: Math.round(performance.now() - started) },
            "Stash stats request finished",
        );
        return result;
    }
}
