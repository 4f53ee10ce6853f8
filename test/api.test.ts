import * as http from "node:http";
import axios, {type AxiosInstance} from "axios";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {createApp} from "../src/app";
import {DummyAuthenticator} from "../src/auth/dummy";
import {TokenIssuer} from "../src/auth/tokens";
import {buildRuntimeConfig, validateConfig} from "../src/config";
import {SpawnError} from "../src/errors";
import {closeServer} from "../src/proxy/routingProxy";
import type {HubContext} from "../src/types";
import {createOrchestrator, type FakeProxy, type FakeSpawner, listenLocal} from "./fakes";

const adminHeaders = {Authorization: "token test-admin-secret"};

let server: http.Server;
let api: AxiosInstance;
let spawner: FakeSpawner;
let proxy: FakeProxy;

beforeEach(async () => {
    const config = validateConfig({proxy: {authToken: "test-secret"}, adminToken: "test-admin-secret"});
    const hub = createOrchestrator({authenticator: new DummyAuthenticator("test-password")});
    spawner = hub.spawner;
    proxy = hub.proxy;
    const ctx: HubContext = {
        config,
        runtime: buildRuntimeConfig(),
        orchestrator: hub.orchestrator,
        store: hub.store,
        tokens: new TokenIssuer(config.tokens, {signingKey: "test-secret", verifyKey: "test-secret"})
    };
    server = http.createServer(createApp(ctx));
    api = axios.create({baseURL: await listenLocal(server), validateStatus: () => true, maxRedirects: 0});
});

afterEach(async () => {
    await closeServer(server);
});

async function login(username = "alice") {
    const res = await api.post("/api/auth/login", {username, password: "test-password"});
    expect(res.status).toBe(200);
    const accessToken: string = res.data.access_token;
    return {headers: {Authorization: `Bearer ${accessToken}`}, cookies: res.headers["set-cookie"] ?? []};
}

describe("auth API", () => {
    it("logs in and issues tokens", async () => {
        const res = await api.post("/api/auth/login", {username: "Alice", password: "test-password"});
        expect(res.status).toBe(200);
        expect(res.data).toMatchObject({username: "alice", token_type: "bearer", expires_in: 900});
        expect(res.headers["set-cookie"]?.[0]).toMatch(/^Refresh-Token=[^;]+; Max-Age=604800; Path=\/api\/auth\/refresh;/);

        const status = await api.get("/api/auth/status", {headers: {Authorization: `Bearer ${res.data.access_token}`}});
        expect(status.data).toEqual({success: true, username: "alice", admin: false});
    });

    it("rejects bad logins", async () => {
        const wrong = await api.post("/api/auth/login", {username: "alice", password: "nope"});
        expect(wrong.status).toBe(403);
        expect(wrong.data).toEqual({status: "error", error: "AuthFailure", message: "Invalid username/password combo"});

        const malformed = await api.post("/api/auth/login", {password: "test-password"});
        expect(malformed.status).toBe(400);
        expect(malformed.data).toEqual({status: "error", message: "Malformed login request"});
    });

    it("refreshes access tokens from the cookie", async () => {
        const {cookies} = await login();
        const cookie = cookies[0].split(";")[0];

        const refreshed = await api.post("/api/auth/refresh", undefined, {headers: {Cookie: cookie}});
        expect(refreshed.status).toBe(200);
        expect(refreshed.data).toMatchObject({username: "alice", token_type: "bearer"});

        expect((await api.post("/api/auth/refresh")).status).toBe(400);
        expect((await api.post("/api/auth/refresh", undefined, {headers: {Cookie: "Refresh-Token=garbage"}})).status).toBe(403);
    });

    it("does not accept refresh tokens as access tokens", async () => {
        const {cookies} = await login();
        const refreshToken = cookies[0].split(";")[0].slice("Refresh-Token=".length);
        const res = await api.get("/api/auth/status", {headers: {Authorization: `Bearer ${refreshToken}`}});
        expect(res.status).toBe(403);
    });

    it("clears the refresh cookie on logout", async () => {
        const res = await api.get("/api/auth/logout");
        expect(res.data).toEqual({success: true});
        expect(res.headers["set-cookie"]?.[0]).toMatch(/^Refresh-Token=; Max-Age=0; Path=\/api\/auth\/refresh;/);
    });
});

describe("server API", () => {
    it("starts the caller's server once", async () => {
        const {headers} = await login();

        const first = await api.post("/api/server/start", {}, {headers});
        expect(first.status).toBe(201);
        expect(first.data).toMatchObject({success: true, changed: true, server: {user: "alice", name: "", state: "running", url: "http://127.0.0.1:9001"}});
        expect(proxy.targets()).toEqual({"/user/alice": "http://127.0.0.1:9001"});

        const second = await api.post("/api/server/start", {}, {headers});
        expect(second.status).toBe(200);
        expect(second.data).toMatchObject({changed: false, server: {url: "http://127.0.0.1:9001"}});
        expect(spawner.startCalls).toBe(1);

        const status = await api.get("/api/server/status", {headers});
        expect(status.data).toMatchObject({success: true, running: true});

        const log = await api.get("/api/server/log", {headers, params: {tail: 1}});
        expect(log.data).toEqual({success: true, log: "listening\n"});

        const stopped = await api.post("/api/server/stop", {}, {headers});
        expect(stopped.status).toBe(200);
        expect(stopped.data).toMatchObject({success: true, changed: true, server: {state: "stopped"}});
        expect(proxy.targets()).toEqual({});

        const again = await api.post("/api/server/stop", {}, {headers});
        expect(again.data).toMatchObject({changed: false});
    });

    it("requires a token", async () => {
        const res = await api.post("/api/server/start", {});
        expect(res.status).toBe(403);
        expect(res.data).toEqual({status: "error", message: "Not authorized"});
    });

    it("reports spawn failures", async () => {
        const {headers} = await login();
        spawner.failStart = new SpawnError("backend exited with code 1");

        const res = await api.post("/api/server/start", {}, {headers});
        expect(res.status).toBe(500);
        expect(res.data).toEqual({status: "error", error: "SpawnError", message: "backend exited with code 1"});
        expect(proxy.targets()).toEqual({});

        const status = await api.get("/api/server/status", {headers});
        expect(status.data).toMatchObject({running: false, server: {state: "failed", error: "backend exited with code 1"}});
    });

    it("refuses new servers while the proxy is unreachable", async () => {
        const {headers} = await login();
        proxy.unreachable = true;

        const res = await api.post("/api/server/start", {}, {headers});
        expect(res.status).toBe(503);
        expect(res.data).toMatchObject({status: "unavailable", error: "ProxyUnreachable"});
        expect(spawner.stopped).toEqual(["alice/"]);

        const health = await api.get("/api/health");
        expect(health.status).toBe(503);
        expect(health.data).toEqual({status: "degraded", spawner: "fake", servers: 0});

        proxy.unreachable = false;
        const reconciled = await api.post("/api/proxy/reconcile", {}, {headers: adminHeaders});
        expect(reconciled.data).toEqual({conflicts: []});
        expect((await api.get("/api/health")).data).toEqual({status: "ok", spawner: "fake", servers: 0});
        expect((await api.post("/api/server/start", {}, {headers})).status).toBe(201);
    });

    it("rejects malformed server names and tails", async () => {
        const {headers} = await login();
        const badName = await api.post("/api/server/start", {serverName: "../etc"}, {headers});
        expect(badName.status).toBe(400);
        expect(badName.data).toEqual({status: "bad request", error: "BadRequest", message: "Invalid server name"});

        await api.post("/api/server/start", {}, {headers});
        const badTail = await api.get("/api/server/log", {headers, params: {tail: "-1"}});
        expect(badTail.status).toBe(400);
    });
});

describe("admin API", () => {
    it("needs an admin", async () => {
        const {headers} = await login();
        const res = await api.get("/api/users", {headers});
        expect(res.status).toBe(403);
        expect(res.data).toEqual({status: "error", message: "Admin access required"});
    });

    it("manages users and their servers", async () => {
        await login();

        const users = await api.get("/api/users", {headers: adminHeaders});
        expect(users.status).toBe(200);
        expect(users.data).toHaveLength(1);
        expect(users.data[0]).toMatchObject({name: "alice", admin: false, servers: {}});

        const missing = await api.get("/api/users/carol", {headers: adminHeaders});
        expect(missing.status).toBe(404);
        expect(missing.data).toEqual({status: "not found", error: "NotFound", message: "No such user carol"});

        const created = await api.post("/api/users/bob", {}, {headers: adminHeaders});
        expect(created.status).toBe(201);
        expect(created.data).toMatchObject({changed: true, user: {name: "bob", admin: false}});
        expect((await api.post("/api/users/bob", {}, {headers: adminHeaders})).status).toBe(200);

        const started = await api.post("/api/users/bob/servers/lab", {}, {headers: adminHeaders});
        expect(started.status).toBe(201);
        expect(started.data).toMatchObject({changed: true, server: {user: "bob", name: "lab", state: "running"}});
        expect(proxy.targets()).toEqual({"/user/bob/lab": "http://127.0.0.1:9001"});

        const servers = await api.get("/api/servers", {headers: adminHeaders});
        expect(servers.data.map((view: {user: string; name: string}) => `${view.user}/${view.name}`)).toEqual(["bob/lab"]);

        const routes = await api.get("/api/proxy", {headers: adminHeaders});
        expect(routes.data).toEqual({degraded: false, routes: [{prefix: "/user/bob/lab", target: "http://127.0.0.1:9001", key: "bob/lab"}]});

        const bob = await api.get("/api/users/bob", {headers: adminHeaders});
        expect(bob.data.servers.lab).toMatchObject({state: "running"});

        const badName = await api.post("/api/users/bob/servers/a%20b", {}, {headers: adminHeaders});
        expect(badName.status).toBe(400);

        const stopped = await api.delete("/api/users/bob/servers/lab", {headers: adminHeaders});
        expect(stopped.data).toMatchObject({changed: true, server: {state: "stopped"}});

        expect((await api.delete("/api/users/bob", {headers: adminHeaders})).status).toBe(204);
        expect((await api.get("/api/users/bob", {headers: adminHeaders})).status).toBe(404);
    });

    it("lets users see only themselves", async () => {
        const {headers} = await login();
        await login("bob");
        expect((await api.get("/api/users/alice", {headers})).status).toBe(200);
        expect((await api.get("/api/users/bob", {headers})).status).toBe(403);
        expect((await api.post("/api/users/bob/servers", {}, {headers})).status).toBe(403);
    });
});

describe("API tokens", () => {
    it("creates, uses and revokes tokens", async () => {
        const {headers} = await login();

        const created = await api.post("/api/users/alice/tokens", {note: "ci"}, {headers});
        expect(created.status).toBe(201);
        expect(created.data).toMatchObject({userName: "alice", note: "ci"});
        expect(created.data).not.toHaveProperty("hash");
        const secret: string = created.data.token;

        const status = await api.get("/api/auth/status", {headers: {Authorization: `Bearer ${secret}`}});
        expect(status.data).toEqual({success: true, username: "alice", admin: false});

        const listed = await api.get("/api/users/alice/tokens", {headers});
        expect(listed.data).toHaveLength(1);
        expect(listed.data[0]).toMatchObject({id: created.data.id, note: "ci"});
        expect(listed.data[0].lastUsed).toEqual(expect.any(String));

        expect((await api.delete(`/api/users/alice/tokens/${created.data.id}`, {headers})).status).toBe(204);
        expect((await api.delete(`/api/users/alice/tokens/${created.data.id}`, {headers})).status).toBe(404);
        expect((await api.get("/api/auth/status", {headers: {Authorization: `Bearer ${secret}`}})).status).toBe(403);
    });

    it("rejects malformed token requests", async () => {
        const {headers} = await login();
        expect((await api.post("/api/users/alice/tokens", {expires_in: -5}, {headers})).status).toBe(400);
    });

    it("resolves tokens for services", async () => {
        const {headers} = await login();
        const {data} = await api.post("/api/users/alice/tokens", {}, {headers});

        const resolved = await api.get(`/api/authorizations/token/${data.token}`, {headers: adminHeaders});
        expect(resolved.status).toBe(200);
        expect(resolved.data).toMatchObject({name: "alice", admin: false, kind: "user", servers: {}});

        const unknown = await api.get("/api/authorizations/token/no-such-token", {headers: adminHeaders});
        expect(unknown.status).toBe(404);
    });
});

describe("user redirects", () => {
    it("starts the server and sends the client back", async () => {
        const {headers} = await login();

        const res = await api.get("/user/alice/tree", {headers});
        expect(res.status).toBe(302);
        expect(res.headers.location).toBe("/user/alice/tree?redirects=1");
        expect(proxy.targets()).toEqual({"/user/alice": "http://127.0.0.1:9001"});
    });

    it("gives up after repeated redirects", async () => {
        const {headers} = await login();
        const res = await api.get("/user/alice", {headers, params: {redirects: 3}});
        expect(res.status).toBe(503);
        expect(res.data).toEqual({status: "unavailable", message: "Server at /user/alice is not reachable through the proxy"});
        expect(spawner.startCalls).toBe(0);
    });

    it("keeps users out of other users' servers", async () => {
        const {headers} = await login();
        expect((await api.get("/user/bob", {headers})).status).toBe(403);
    });
});

describe("runtime endpoints", () => {
    it("serves the client config", async () => {
        const res = await api.get("/api/config");
        expect(res.data).toEqual(buildRuntimeConfig());
    });

    it("reports health", async () => {
        const res = await api.get("/api/health");
        expect(res.status).toBe(200);
        expect(res.data).toEqual({status: "ok", spawner: "fake", servers: 0});
    });
});
