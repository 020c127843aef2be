import net from "node:net";
import type { LibraryStats, ScrapeResult } from "@stash-exporter/shared";
import type { FetchStatsOptions, StatsSource } from "../src/stash-client.js";

export const EXAMPLE_STATS: LibraryStats = {
    scenesTotal: 10,
    imagesTotal: 20,
    performersTotal: 3,
    studiosTotal: 2,
    filesTotal: 100,
    filesSizeBytes: 123456,
};

/** Every count set to the same value, so a mixed read is easy to spot. */
export function uniformStats(value: number): LibraryStats {
    return {
        scenesTotal: value,
        imagesTotal: value,
        performersTotal: value,
        studiosTotal: value,
        filesTotal: value,
        filesSizeBytes: value,
    };
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export type StubStep = ScrapeResult | Error | (() => Promise<ScrapeResult>);

/**
 * Stats source that replays the given steps in order and repeats the last
 * one. Records concurrency so overlap tests can check it.
 */
export class StubStatsSource implements StatsSource {
    calls: FetchStatsOptions[] = [];
    active = 0;
    maxActive = 0;
    private readonly steps: StubStep[];
    constructor(...steps: StubStep[]) {
        this.steps = steps.length > 0 ? steps : [{ ok: true, stats: EXAMPLE_STATS }];
    }
    async fetchStats(options: FetchStatsOptions): Promise<ScrapeResult> {
        const step = this.steps[Math.min(this.calls.length, this.steps.length - 1)];
        this.calls.push(options);
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            if (step instanceof Error) throw step;
            return typeof step === "function" ? await step() : step;
        } finally {
            this.active--;
        }
    }
}

/** Value lines of an exposition body, keyed by metric name. */
export function metricValues(body: string): Map<string, string> {
    const values = new Map<string, string>();
    for (const line of body.split("\n")) {
        if (!line || line.startsWith("#")) continue;
        const [name, value] = line.split(" ");
        values.set(name, value);
    }
    return values;
}

/** A port that was free a moment ago on the loopback interface. */
export function freePort(): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = net.createServer();
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            const port = address !== null && typeof address === "object" ? address.port : 0;
            server.close(() => resolve(port));
        });
    });
}
