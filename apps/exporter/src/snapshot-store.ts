import type { LibraryStats, StatsSnapshot } from "@stash-exporter/shared";

export const EMPTY_SNAPSHOT: Readonly<StatsSnapshot> = Object.freeze({
    scenesTotal: 0,
    imagesTotal: 0,
    performersTotal: 0,
    studiosTotal: 0,
    filesTotal: 0,
    filesSizeBytes: 0,
    up: false,
});

/**
 * Holds the snapshot served on /metrics. Writers swap in a new frozen object,
 * so a reader holds either the previous snapshot or the next one, never a mix.
 * Only the scrape scheduler writes; the HTTP handlers only read.
 */
export class SnapshotStore {
    private current: Readonly<StatsSnapshot>;
    constructor(initial: Readonly<StatsSnapshot> = EMPTY_SNAPSHOT) {
        this.current = Object.isFrozen(initial) ? initial : Object.freeze({ ...initial });
    }
    read(): Readonly<StatsSnapshot> {
        return this.current;
    }
    replace(stats: LibraryStats): void {
        this.current = Object.freeze({
            scenesTotal: stats.scenesTotal,
            imagesTotal: stats.imagesTotal,
            performersTotal: stats.performersTotal,
            studiosTotal: stats.studiosTotal,
            filesTotal: stats.filesTotal,
            filesSizeBytes: stats.filesSizeBytes,
            up: true,
        });
    }
    /** Keeps the last known counts, only clears `up`. */
    markDown(): void {
        if (!this.current.up) return;
        this.current = Object.freeze({ ...this.current, up: false });
    }
}
