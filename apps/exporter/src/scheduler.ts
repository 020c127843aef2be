import {
    createLogger,
    type ScrapeFailure,
    type ScrapeResult,
    type SchedulerState,
    type SchedulerStatus,
} from "@stash-exporter/shared";
import type { SnapshotStore } from "./snapshot-store.js";
import type { StatsSource } from "./stash-client.js";

const logger = createLogger("scheduler");

export interface ScrapeSchedulerOptions {
    intervalMs: number;
    /** Per-scrape request timeout, must be shorter than intervalMs */
    timeoutMs: number;
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Polls the stats source on a fixed interval and keeps the snapshot store
 * current. A tick that fires while the previous scrape is still running is
 * dropped, so at most one scrape is ever in flight.
 */
export class ScrapeScheduler {
    private readonly source: StatsSource;
    private readonly store: SnapshotStore;
    private readonly intervalMs: number;
    private readonly timeoutMs: number;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<ScrapeResult> | null = null;
    private state: SchedulerState = "idle";
    private lastAttemptAt: Date | null = null;
    private lastSuccessAt: Date | null = null;
    private consecutiveFailures = 0;
    private lastFailure: ScrapeFailure | null = null;
    private skippedTicks = 0;
    constructor(source: StatsSource, store: SnapshotStore, options: ScrapeSchedulerOptions) {
        if (!(options.intervalMs > 0)) {
            throw new RangeError(`Scrape interval must be positive, got ${options.intervalMs}ms`);
        }
        if (!(options.timeoutMs > 0) || options.timeoutMs >= options.intervalMs) {
            throw new RangeError(
                `Scrape timeout (${options.timeoutMs}ms) must be positive and shorter than the interval (${options.intervalMs}ms)`,
            );
        }
        this.source = source;
        this.store = store;
        this.intervalMs = options.intervalMs;
        this.timeoutMs = options.timeoutMs;
    }
    get running(): boolean {
        return this.timer !== null;
    }
    get skipped(): number {
        return this.skippedTicks;
    }
    /** Scrape right away, then on every tick until stop(). */
    start(): void {
        if (this.timer) return;
        logger.info({ intervalMs: this.intervalMs, timeoutMs: this.timeoutMs }, "Scrape scheduler starting");
        this.timer = setInterval(() => this.onTick(), this.intervalMs);
        this.onTick();
    }
    /**
     * Stop ticking and wait for a scrape that is already running. That wait is
     * bounded by the request timeout.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            logger.info("Scrape scheduler stopping");
        }
        if (this.inFlight) {
            logger.info("Waiting for in-flight scrape to complete...");
            await this.inFlight;
        }
    }
    /**
     * Run one scrape now. Resolves to null without scraping when another
     * scrape is still in flight.
     */
    async scrape(): Promise<ScrapeResult | null> {
        if (this.inFlight) {
            this.skippedTicks++;
            logger.debug({ skippedTicks: this.skippedTicks }, "Previous scrape still in flight, skipping tick");
            return null;
        }
        const attempt = this.runScrape();
        this.inFlight = attempt;
        try {
            return await attempt;
        } finally {
            this.inFlight = null;
        }
    }
    status(): SchedulerStatus {
        return {
            state: this.state,
            running: this.running,
            intervalMs: this.intervalMs,
            lastAttemptAt: this.lastAttemptAt?.toISOString() ?? null,
            lastSuccessAt: this.lastSuccessAt?.toISOString() ?? null,
            consecutiveFailures: this.consecutiveFailures,
            lastFailure: this.lastFailure ? { ...this.lastFailure } : null,
        };
    }
    private onTick(): void {
        this.scrape().catch((err) => {
            logger.error({ err }, "Scrape tick failed");
        });
    }
    private async runScrape(): Promise<ScrapeResult> {
        this.state = "scraping";
        this.lastAttemptAt = new Date();
        const started = performance.now();
        let result: ScrapeResult;
        try {
            result = await this.source.fetchStats({ timeoutMs: this.timeoutMs });
        } catch (err) {
            result = { ok: false, error: { kind: "unexpected", message: describeError(err) } };
        } finally {
            this.state = "idle";
        }
        const durationMs = Math.round(performance.now() - started);
        if (result.ok) {
            this.store.replace(result.stats);
            if (this.consecutiveFailures > 0) {
                logger.info({ failures: this.consecutiveFailures, durationMs }, "Scrape recovered");
            }
            this.lastSuccessAt = new Date();
            this.consecutiveFailures = 0;
            this.lastFailure = null;
            logger.debug({ ...result.stats, durationMs }, "Scrape succeeded");
        } else {
            this.store.markDown();
            this.consecutiveFailures++;
            this.lastFailure = result.error;
            logger.warn(
                {
                    kind: result.error.kind,
                    status: result.error.status,
                    reason: result.error.message,
                    consecutiveFailures: this.consecutiveFailures,
                    durationMs,
                },
                "Scrape failed, serving last known values with stash_up 0",
            );
        }
        return result;
    }
}
