import http from "node:http";
import { Hono } from "hono";
import { getRequestListener } from "@hono/node-server";
import { createLogger, type SchedulerStatus } from "@stash-exporter/shared";
import { renderSnapshot, type MetricsRenderer } from "./metrics.js";
import type { SnapshotStore } from "./snapshot-store.js";

const logger = createLogger("server");

export interface AppDependencies {
    store: SnapshotStore;
    scheduler?: { status(): SchedulerStatus };
    render?: MetricsRenderer;
}

export function createApp({ store, scheduler, render = renderSnapshot }: AppDependencies): Hono {
    const app = new Hono();

    app.onError((err, c) => {
        logger.error({ err, method: c.req.method, path: c.req.path }, "Request failed");
        return c.text("Internal Server Error", 500);
    });

    app.get("/", (c) =>
        c.json({
            name: "Stash Prometheus Exporter",
            endpoints: {
                metrics: "/metrics",
                health: "/health",
            },
        }),
    );

    app.get("/metrics", async (c) => {
        // One read per request: the whole response comes from a single snapshot
        const { contentType, body } = await render(store.read());
        return c.body(body, 200, { "Content-Type": contentType });
    });

    app.get("/health", (c) => {
        const { up } = store.read();
        return c.json(
            {
                status: up ? "ok" : "degraded",
                up,
                scheduler: scheduler?.status() ?? null,
            },
            up ? 200 : 503,
        );
    });

    return app;
}

export interface ListenOptions {
    port: number;
    host: string;
}

export async function startServer(app: Hono, { port, host }: ListenOptions): Promise<http.Server> {
    const server = http.createServer(getRequestListener(app.fetch));
    await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
            server.off("error", reject);
            resolve();
        });
    });
    logger.info({ port: listeningPort(server), host }, "Metrics server listening");
    return server;
}

export function listeningPort(server: http.Server): number | null {
    const address = server.address();
    return address !== null && typeof address === "object" ? address.port : null;
}

/** Stop accepting connections and let in-flight requests finish. */
export function closeServer(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
    });
}
