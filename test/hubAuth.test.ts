import * as http from "node:http";
import express from "express";
import bearerToken from "express-bearer-token";
import axios from "axios";
import {afterAll, beforeAll, beforeEach, describe, expect, it} from "vitest";
import {ExpiringCache, HubAuth, HubAuthError} from "../src/auth/hubAuth";
import {closeServer} from "../src/proxy/routingProxy";
import {listenLocal} from "./fakes";

// Stands in for the hub's /api/authorizations/token endpoint
const hub = express();
const received: {token: string; authorization?: string}[] = [];
hub.get("/api/authorizations/token/:token", (req, res) => {
    received.push({token: req.params.token, authorization: req.headers.authorization});
    switch (req.params.token) {
        case "alice-token":
            return res.json({name: "alice", admin: false, kind: "user"});
        case "bob-token":
            return res.json({name: "bob", admin: true, kind: "user"});
        case "expired-service-token":
            return res.status(403).json({status: "error", message: "Not authorized"});
        case "broken-token":
            return res.status(500).json({status: "error", message: "boom"});
        default:
            return res.status(404).json({status: "not found", message: "No user for this token"});
    }
});

let server: http.Server;
let apiUrl: string;

beforeAll(async () => {
    server = http.createServer(hub);
    apiUrl = `${await listenLocal(server)}/api`;
});

afterAll(async () => {
    await closeServer(server);
});

beforeEach(() => {
    received.length = 0;
});

describe("HubAuth", () => {
    it("resolves tokens and caches the answer", async () => {
        const auth = new HubAuth({apiUrl, apiToken: "test-secret"});

        expect(await auth.userForToken("alice-token")).toEqual({name: "alice", admin: false, kind: "user"});
        expect(await auth.userForToken("alice-token")).toEqual({name: "alice", admin: false, kind: "user"});
        expect(received).toEqual([{token: "alice-token", authorization: "token test-secret"}]);

        await auth.userForToken("alice-token", false);
        expect(received).toHaveLength(2);
    });

    it("caches unknown tokens as null", async () => {
        const auth = new HubAuth({apiUrl, apiToken: "test-secret"});
        expect(await auth.userForToken("nobody-token")).toBeNull();
        expect(await auth.userForToken("nobody-token")).toBeNull();
        expect(received).toHaveLength(1);
    });

    it("maps hub failures to service errors", async () => {
        const auth = new HubAuth({apiUrl, apiToken: "test-secret"});
        await expect(auth.userForToken("expired-service-token")).rejects.toMatchObject({statusCode: 500, message: "Permission failure checking authorization, I may need a new token"});
        await expect(auth.userForToken("broken-token")).rejects.toMatchObject({statusCode: 502});
        await expect(auth.userForToken("broken-token")).rejects.toBeInstanceOf(HubAuthError);
    });

    it("reports an unreachable hub", async () => {
        const auth = new HubAuth({apiUrl: "http://127.0.0.1:1/api", apiToken: "test-secret"});
        await expect(auth.userForToken("alice-token")).rejects.toThrow("Failed to connect to Hub API at http://127.0.0.1:1/api.");
    });

    it("applies the allowed user list", () => {
        const auth = new HubAuth({apiUrl, apiToken: "test-secret", allowedUsers: ["bob"]});
        expect(auth.checkUser({name: "alice", admin: false})).toBeNull();
        expect(auth.checkUser({name: "bob", admin: true})).toEqual({name: "bob", admin: true});
        expect(auth.checkUser(null)).toBeNull();
    });

    it("guards a service's routes", async () => {
        const auth = new HubAuth({apiUrl, apiToken: "test-secret", allowedUsers: ["bob"]});
        const service = express();
        service.use(bearerToken());
        service.get("/whoami", auth.middleware(), (_req, res) => res.json({user: res.locals.hubUser.name}));
        service.use((err: {statusCode?: number; message?: string}, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
            res.status(err.statusCode ?? 500).json({message: err.message});
        });
        const serviceServer = http.createServer(service);
        const base = await listenLocal(serviceServer);

        const bob = await axios.get(`${base}/whoami`, {headers: {Authorization: "Bearer bob-token"}});
        expect(bob.data).toEqual({user: "bob"});
        const alice = await axios.get(`${base}/whoami`, {headers: {Authorization: "Bearer alice-token"}, validateStatus: () => true});
        expect(alice.status).toBe(403);
        const anonymous = await axios.get(`${base}/whoami`, {validateStatus: () => true});
        expect(anonymous.status).toBe(403);

        await closeServer(serviceServer);
    });
});

describe("ExpiringCache", () => {
    it("drops entries older than maxAge", () => {
        let now = 1000;
        const cache = new ExpiringCache<string>(100, () => now);
        cache.set("a", "alice");
        now = 1100;
        expect(cache.get("a")).toBe("alice");
        now = 1101;
        expect(cache.has("a")).toBe(false);
    });

    it("prunes expired entries when storing new ones", () => {
        let now = 1000;
        const cache = new ExpiringCache<string>(100, () => now);
        cache.set("a", "alice");
        now = 1200;
        cache.set("b", "bob");
        expect(cache.size).toBe(1);
        expect(cache.get("b")).toBe("bob");
    });

    it("keeps entries forever with a maxAge of 0", () => {
        let now = 0;
        const cache = new ExpiringCache<string>(0, () => now);
        cache.set("a", "alice");
        now = 1e9;
        expect(cache.get("a")).toBe("alice");
        cache.clear();
        expect(cache.get("a")).toBeUndefined();
    });
});
