import { Registry, Gauge } from "prom-client";
import type { StatsSnapshot } from "@stash-exporter/shared";

interface GaugeDefinition {
    name: string;
    help: string;
    value: (snapshot: Readonly<StatsSnapshot>) => number;
}

export const GAUGES: readonly GaugeDefinition[] = [
    { name: "stash_scenes_total", help: "Total number of scenes in the library", value: (s) => s.scenesTotal },
    { name: "stash_images_total", help: "Total number of images in the library", value: (s) => s.imagesTotal },
    { name: "stash_performers_total", help: "Total number of performers in the library", value: (s) => s.performersTotal },
    { name: "stash_studios_total", help: "Total number of studios in the library", value: (s) => s.studiosTotal },
    { name: "stash_files_total", help: "Total number of files in the library", value: (s) => s.filesTotal },
    { name: "stash_files_size_bytes", help: "Total size of library files in bytes", value: (s) => s.filesSizeBytes },
    { name: "stash_up", help: "Whether the last scrape of Stash succeeded", value: (s) => (s.up ? 1 : 0) },
];

export interface RenderedMetrics {
    contentType: string;
    body: string;
}

export type MetricsRenderer = (snapshot: Readonly<StatsSnapshot>) => Promise<RenderedMetrics>;

/**
 * Render one snapshot in the Prometheus text format. Every call gets its own
 * registry, so concurrent requests never write into each other's gauges.
 */
export const renderSnapshot: MetricsRenderer = async (snapshot) => {
    const registry = new Registry();
    for (const definition of GAUGES) {
        const gauge = new Gauge({
            name: definition.name,
            help: definition.help,
            registers: [registry],
        });
        gauge.set(definition.value(snapshot));
    }
    return {
        contentType: registry.contentType,
        body: await registry.metrics(),
    };
};
