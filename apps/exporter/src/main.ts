import { ConfigError, createLogger, loadEnvFiles } from "@stash-exporter/shared";
import { startExporter, type RunningExporter } from "./exporter.js";

const logger = createLogger("main");

async function main(): Promise<void> {
    const envFile = loadEnvFiles();
    if (envFile) {
        logger.debug({ envFile }, "Loaded environment file");
    }
    let exporter: RunningExporter;
    try {
        exporter = await startExporter();
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.error({ problems: err.problems }, "Failed to load configuration");
        } else {
            logger.error({ err }, "Failed to start exporter");
        }
        process.exit(1);
    }

    let isShuttingDown = false;
    async function shutdown(signal: NodeJS.Signals): Promise<void> {
        if (isShuttingDown) return;
        isShuttingDown = true;
        logger.info({ signal }, "Initiating graceful shutdown...");
        try {
            await exporter.stop();
            process.exit(0);
        } catch (err) {
            logger.error({ err }, "Error during shutdown");
            process.exit(1);
        }
    }
    process.on("SIGINT", (signal) => void shutdown(signal));
    process.on("SIGTERM", (signal) => void shutdown(signal));
    logger.info({ host: exporter.config.exporter.host, port: exporter.config.exporter.port }, "Exporter ready");
}

main().catch((err) => {
    logger.error({ err }, "Unhandled error");
    process.exit(1);
});
