import type http from "node:http";
import { createLogger, loadConfig, setLogLevel, type ExporterConfig } from "@stash-exporter/shared";
import { ScrapeScheduler } from "./scheduler.js";
import { closeServer, createApp, startServer } from "./server.js";
import { SnapshotStore } from "./snapshot-store.js";
import { StashClient } from "./stash-client.js";

const logger = createLogger("exporter");

export interface ExporterDependencies {
    fetch?: typeof fetch;
}

export interface RunningExporter {
    readonly config: ExporterConfig;
    readonly store: SnapshotStore;
    readonly scheduler: ScrapeScheduler;
    readonly server: http.Server;
    stop(): Promise<void>;
}

/**
 * Validate configuration, bind the metrics server and start polling.
 * Throws ConfigError before anything is created when the configuration is
 * invalid, so no scrape runs and no port is bound.
 */
export async function startExporter(
    env: Record<string, string | undefined> = process.env,
    deps: ExporterDependencies = {},
): Promise<RunningExporter> {
    const config = loadConfig(env);
    setLogLevel(config.logLevel);
    logger.info(
        {
            graphqlUrl: config.stash.graphqlUrl,
            intervalMs: config.scrape.intervalMs,
            timeoutMs: config.scrape.timeoutMs,
            logLevel: config.logLevel,
        },
        "Starting Stash Prometheus exporter",
    );

    const client = new StashClient({
        graphqlUrl: config.stash.graphqlUrl,
        apiKey: config.stash.apiKey,
        fetch: deps.fetch,
    });
    const store = new SnapshotStore();
    const scheduler = new ScrapeScheduler(client, store, {
        intervalMs: config.scrape.intervalMs,
        timeoutMs: config.scrape.timeoutMs,
    });
    const server = await startServer(createApp({ store, scheduler }), config.exporter);
    scheduler.start();

    let stopping: Promise<void> | null = null;
    const stop = (): Promise<void> => {
        stopping ??= (async () => {
            await scheduler.stop();
            await closeServer(server);
            logger.info("Exporter stopped");
        })();
        return stopping;
    };

    return { config, store, scheduler, server, stop };
}
