import * as http from "node:http";
import axios from "axios";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {SpawnError} from "../src/errors";
import {closeServer} from "../src/proxy/routingProxy";
import {createAgentApp, SpawnAgent} from "../src/spawner/agent";
import {RpcErrorCode} from "../src/spawner/jsonRpc";
import {RemoteSpawner} from "../src/spawner/remote-spawner";
import {ServerState} from "../src/spawner/serverProcess";
import {FakeSpawner, listenLocal} from "./fakes";

let local: FakeSpawner;
let agent: SpawnAgent;
let server: http.Server;
let agentUrl: string;

beforeEach(async () => {
    local = new FakeSpawner();
    agent = new SpawnAgent(local, {startTimeoutMs: 1000, stopGracePeriodMs: 100});
    server = http.createServer(createAgentApp(agent, "test-secret"));
    agentUrl = await listenLocal(server);
});

afterEach(async () => {
    await closeServer(server);
});

function remote(authToken = "test-secret") {
    return new RemoteSpawner({agentUrl, authToken, startTimeoutMs: 1000});
}

describe("RemoteSpawner", () => {
    it("starts, polls, lists and stops servers through the agent", async () => {
        const spawner = remote();

        const started = await spawner.start("alice", "", {environment: {HUB_USER: "alice"}});
        expect(started.state).toBe(ServerState.Running);
        expect(started.url).toBe("http://127.0.0.1:9001");
        expect(started.handle).toEqual({remoteId: expect.any(String)});
        expect(local.environments).toEqual([{HUB_USER: "alice"}]);
        expect(agent.size).toBe(1);

        expect(await spawner.poll(started)).toEqual({alive: true});
        expect((await spawner.enumerate()).map(found => found.key)).toEqual(["alice/"]);
        expect(await spawner.logs(started, 1)).toEqual({success: true, log: "listening\n"});

        await spawner.stop(started, 100);
        expect(local.stopped).toEqual(["alice/"]);
        expect(agent.size).toBe(0);
        expect(await spawner.poll(started)).toEqual({alive: false, exitCode: null});
        expect(await spawner.logs(started)).toEqual({success: false});
    });

    it("returns the running server when asked to start it again", async () => {
        const spawner = remote();
        const first = await spawner.start("alice", "lab");
        const second = await spawner.start("alice", "lab");
        expect(second.handle).toEqual(first.handle);
        expect(local.startCalls).toBe(1);
    });

    it("reports spawn failures as SpawnError", async () => {
        local.failStart = new SpawnError("backend exited with code 1");
        const spawner = remote();
        await expect(spawner.start("alice", "")).rejects.toThrow("Server alice/ failed to start: backend exited with code 1");
        await expect(spawner.start("alice", "")).rejects.toBeInstanceOf(SpawnError);
        expect(agent.size).toBe(0);
    });

    it("is refused with the wrong token", async () => {
        await expect(remote("wrong").start("alice", "")).rejects.toBeInstanceOf(SpawnError);
        expect(local.startCalls).toBe(0);
    });
});

describe("spawn agent", () => {
    const api = () => axios.create({baseURL: agentUrl, headers: {Authorization: "token test-secret"}, validateStatus: () => true});

    it("answers malformed requests with JSON-RPC errors", async () => {
        const invalid = await api().post("/", {method: "start_server"});
        expect(invalid.data).toEqual({jsonrpc: "2.0", id: null, error: {code: RpcErrorCode.InvalidRequest, message: "Invalid request"}});

        const unknown = await api().post("/", {jsonrpc: "2.0", method: "reboot", id: 7});
        expect(unknown.data).toEqual({jsonrpc: "2.0", id: 7, error: {code: RpcErrorCode.MethodNotFound, message: "Method reboot not found"}});

        const badParams = await api().post("/", {jsonrpc: "2.0", method: "start_server", params: {user: ""}, id: 8});
        expect(badParams.data.error.code).toBe(RpcErrorCode.InvalidParams);

        const garbled = await api().post("/", "{not json", {headers: {"Content-Type": "application/json"}, transformRequest: [data => data]});
        expect(garbled.data).toEqual({jsonrpc: "2.0", id: null, error: {code: RpcErrorCode.ParseError, message: "Parse error"}});
    });

    it("reports unknown servers without failing", async () => {
        const poll = await api().post("/", {jsonrpc: "2.0", method: "poll_server", params: {user: "bob"}, id: 1});
        expect(poll.data).toEqual({jsonrpc: "2.0", id: 1, result: {alive: false, exitCode: null}});

        const stop = await api().post("/", {jsonrpc: "2.0", method: "stop_server", params: {user: "bob", server: "lab"}, id: 2});
        expect(stop.data).toEqual({jsonrpc: "2.0", id: 2, result: {stopped: false}});
    });

    it("rejects callers without the token", async () => {
        const res = await axios.post(agentUrl, {jsonrpc: "2.0", method: "list_servers", id: 1}, {validateStatus: () => true});
        expect(res.status).toBe(403);
    });
});
