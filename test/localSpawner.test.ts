import axios from "axios";
import {afterEach, describe, expect, it, vi} from "vitest";
import {SpawnError} from "../src/errors";
import {LocalSpawner} from "../src/spawner/local-spawner";
import {type ServerProcess, ServerState} from "../src/spawner/serverProcess";

// Backends are small node scripts. The port arrives as the first script argument
const listening = `require("http").createServer((req, res) => res.end("ok")).listen(Number(process.argv[1]), "127.0.0.1", () => console.log("listening"));`;
const ignoresSigterm = `process.on("SIGTERM", () => console.log("ignoring SIGTERM")); ${listening}`;
const exitsEarly = "process.exit(3)";
const neverListens = "setInterval(() => undefined, 1000)";

const started: [LocalSpawner, ServerProcess][] = [];

function createSpawner(script: string) {
    return new LocalSpawner({
        backendPorts: {min: 39200, max: 39299},
        processCommand: process.execPath,
        additionalArgs: ["-e", script, "{port}"],
        useSudo: false,
        preserveEnv: false,
        startTimeoutMs: 5000
    });
}

async function start(spawner: LocalSpawner, userName = "alice", serverName = "") {
    const server = await spawner.start(userName, serverName);
    started.push([spawner, server]);
    return server;
}

function pidOf(server: ServerProcess) {
    const pid = server.handle?.pid;
    if (typeof pid !== "number") {
        throw new Error(`No pid for ${server.key}`);
    }
    return pid;
}

afterEach(async () => {
    for (const [spawner, server] of started.splice(0)) {
        await spawner.stop(server, 0);
    }
});

describe("LocalSpawner", () => {
    it("starts a backend on a free port once it accepts connections", async () => {
        const spawner = createSpawner(listening);
        const server = await start(spawner);

        expect(server.state).toBe(ServerState.Running);
        expect(server.url).toMatch(/^http:\/\/127\.0\.0\.1:392\d\d$/);
        expect((await axios.get(server.url ?? "")).data).toBe("ok");
        expect(await spawner.poll(server)).toEqual({alive: true});
        await vi.waitFor(async () => expect(await spawner.logs(server)).toEqual({success: true, log: "listening\n"}));

        await spawner.stop(server, 1000);
        expect(await spawner.poll(server)).toEqual({alive: false, exitCode: null});
        expect(await spawner.logs(server)).toEqual({success: false});
    });

    it("gives each server its own port and returns the running one on a repeated start", async () => {
        const spawner = createSpawner(listening);
        const alice = await start(spawner, "alice");
        const bob = await start(spawner, "bob");
        const again = await spawner.start("alice", "");

        expect(again.id).toBe(alice.id);
        expect(bob.url).not.toBe(alice.url);
    });

    it("forces termination after the grace period", async () => {
        const spawner = createSpawner(ignoresSigterm);
        const server = await start(spawner);
        await vi.waitFor(async () => expect(await spawner.logs(server)).toEqual({success: true, log: "listening\n"}));

        const began = Date.now();
        await spawner.stop(server, 300);

        expect(Date.now() - began).toBeGreaterThanOrEqual(295);
        expect(await spawner.poll(server)).toEqual({alive: false, exitCode: null});
    });

    it("fails when the backend exits during startup", async () => {
        const spawner = createSpawner(exitsEarly);
        const attempt = spawner.start("alice", "");

        await expect(attempt).rejects.toBeInstanceOf(SpawnError);
        await expect(attempt).rejects.toThrow("Server alice/ failed to start: backend exited with code 3");
    });

    it("gives up when the start is aborted", async () => {
        const spawner = createSpawner(neverListens);
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 150);

        await expect(spawner.start("alice", "", {signal: controller.signal})).rejects.toThrow("Server alice/ failed to start: startup was cancelled");
    });

    it("lets go of a backend that crashed", async () => {
        const spawner = createSpawner(listening);
        const server = await start(spawner);
        process.kill(pidOf(server), "SIGKILL");

        await vi.waitFor(async () => expect(await spawner.poll(server)).toEqual({alive: false, exitCode: null}));
        await spawner.stop(server, 0);
        expect(await spawner.logs(server)).toEqual({success: false});

        const next = await start(spawner);
        expect(next.id).not.toBe(server.id);
        expect(next.state).toBe(ServerState.Running);
    });

    it("replaces a failed server on the next start", async () => {
        const spawner = createSpawner(listening);
        const server = await start(spawner);
        process.kill(pidOf(server), "SIGKILL");
        await vi.waitFor(async () => expect(await spawner.poll(server)).toEqual({alive: false, exitCode: null}));
        server.fail("Server exited with code null");

        const next = await start(spawner);
        expect(next.id).not.toBe(server.id);
        expect(await spawner.logs(server)).toEqual({success: false});
    });
});
