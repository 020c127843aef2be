import { spawn, type ChildProcess } from "node:child_process";
import { fileURLToPath } from "node:url";
import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { freePort } from "./helpers.js";

const REPO_ROOT = fileURLToPath(new URL("../../../", import.meta.url));
const MAIN = fileURLToPath(new URL("../src/main.ts", import.meta.url));

interface ExporterProcess {
    child: ChildProcess;
    /** Everything written to stdout and stderr so far */
    output(): string;
    exited: Promise<number | null>;
}

// Values are set explicitly, including blanks, so a developer's .env cannot fill them in
function spawnExporter(env: Record<string, string>): ExporterProcess {
    const child = spawn(process.execPath, ["--import", "tsx", MAIN], {
        cwd: REPO_ROOT,
        env: {
            ...process.env,
            STASH_GRAPHQL_URL: "http://127.0.0.1:9/graphql",
            STASH_API_KEY: "",
            SCRAPE_INTERVAL_SECONDS: "30",
            SCRAPE_TIMEOUT_SECONDS: "",
            EXPORTER_LISTEN_HOST: "127.0.0.1",
            EXPORTER_LISTEN_PORT: "9100",
            LOG_LEVEL: "info",
            ...env,
        },
        stdio: ["ignore", "pipe", "pipe"],
    });
    let output = "";
    child.stdout?.on("data", (chunk: Buffer) => (output += chunk.toString()));
    child.stderr?.on("data", (chunk: Buffer) => (output += chunk.toString()));
    const exited = new Promise<number | null>((resolve, reject) => {
        child.once("error", reject);
        child.once("exit", (code) => resolve(code));
    });
    return { child, output: () => output, exited };
}

async function waitForOutput(proc: ExporterProcess, text: string, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!proc.output().includes(text)) {
        if (proc.child.exitCode !== null) {
            throw new Error(`exporter exited with ${proc.child.exitCode} before logging "${text}":\n${proc.output()}`);
        }
        if (Date.now() > deadline) {
            throw new Error(`exporter did not log "${text}" within ${timeoutMs}ms:\n${proc.output()}`);
        }
        await new Promise((resolve) => setTimeout(resolve, 50));
    }
}

describe("exporter process", function () {
    // Each case boots a fresh node process with the TypeScript loader
    this.timeout(30_000);

    const spawned: ExporterProcess[] = [];

    afterEach(() => {
        for (const proc of spawned) {
            if (proc.child.exitCode === null) proc.child.kill("SIGKILL");
        }
        spawned.length = 0;
    });

    it("exits 1 and reports the problem when the API key is missing", async () => {
        const proc = spawnExporter({});
        spawned.push(proc);
        expect(await proc.exited).to.equal(1);
        expect(proc.output()).to.contain("Missing required environment variable: STASH_API_KEY");
    });

    it("still reports configuration problems when LOG_LEVEL is an alias", async () => {
        const proc = spawnExporter({ LOG_LEVEL: "warning" });
        spawned.push(proc);
        expect(await proc.exited).to.equal(1);
        expect(proc.output()).to.contain("Missing required environment variable: STASH_API_KEY");
    });

    it("still reports configuration problems when LOG_LEVEL is unknown", async () => {
        const proc = spawnExporter({ STASH_API_KEY: "test-secret", LOG_LEVEL: "loud" });
        spawned.push(proc);
        expect(await proc.exited).to.equal(1);
        expect(proc.output()).to.contain('LOG_LEVEL must be one of error, warn, info, http, verbose, debug, silly, got \\"loud\\"');
    });

    it("exits 0 after a graceful stop on SIGTERM", async () => {
        const port = await freePort();
        const proc = spawnExporter({ STASH_API_KEY: "test-secret", EXPORTER_LISTEN_PORT: String(port) });
        spawned.push(proc);
        await waitForOutput(proc, "Exporter ready", 20_000);
        const res = await fetch(`http://127.0.0.1:${port}/metrics`);
        expect(res.status).to.equal(200);
        await res.text();
        proc.child.kill("SIGTERM");
        expect(await proc.exited).to.equal(0);
        expect(proc.output()).to.contain("Exporter stopped");
    });
});
