import { describe, it } from "mocha";
import { expect } from "chai";
import { ConfigError } from "@stash-exporter/shared";
import { startExporter } from "../src/exporter.js";
import { freePort, metricValues, sleep } from "./helpers.js";

describe("startExporter", () => {
    it("fails with ConfigError and never scrapes when the API key is unset", async () => {
        let fetchCalls = 0;
        const fetchStub: typeof fetch = async () => {
            fetchCalls++;
            return new Response("{}");
        };
        let caught: unknown = null;
        try {
            await startExporter({ STASH_GRAPHQL_URL: "http://stash.test/graphql" }, { fetch: fetchStub });
        } catch (err) {
            caught = err;
        }
        expect(caught).to.be.instanceOf(ConfigError);
        expect(fetchCalls).to.equal(0);
    });

    it("scrapes Stash and serves the result until stopped", async () => {
        const requests: Request[] = [];
        const fetchStub: typeof fetch = async (input, init) => {
            requests.push(new Request(input, init));
            return new Response(
                JSON.stringify({
                    data: {
                        stats: {
                            scene_count: 10,
                            scenes_size: 100000,
                            image_count: 20,
                            images_size: 23456,
                            performer_count: 3,
                            studio_count: 2,
                        },
                    },
                }),
                { status: 200, headers: { "Content-Type": "application/json" } },
            );
        };
        const port = await freePort();
        const exporter = await startExporter(
            {
                STASH_GRAPHQL_URL: "http://stash.test/graphql",
                STASH_API_KEY: "test-secret",
                EXPORTER_LISTEN_HOST: "127.0.0.1",
                EXPORTER_LISTEN_PORT: String(port),
                LOG_LEVEL: "error",
            },
            { fetch: fetchStub },
        );
        try {
            for (let i = 0; i < 50 && !exporter.store.read().up; i++) {
                await sleep(10);
            }
            const res = await fetch(`http://127.0.0.1:${port}/metrics`);
            expect(res.status).to.equal(200);
            const values = metricValues(await res.text());
            expect(values.get("stash_files_total")).to.equal("30");
            expect(values.get("stash_files_size_bytes")).to.equal("123456");
            expect(values.get("stash_up")).to.equal("1");
            expect(requests).to.have.length(1);
            expect(requests[0].headers.get("ApiKey")).to.equal("test-secret");
        } finally {
            await exporter.stop();
        }
        expect(exporter.scheduler.running).to.equal(false);
        expect(exporter.server.listening).to.equal(false);
    });
});
