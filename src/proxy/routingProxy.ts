import * as http from "node:http";
import type {Socket} from "node:net";
import * as bodyParser from "body-parser";
import express, {type NextFunction, type Request, type Response} from "express";
import httpProxy from "http-proxy";
import {logger, requireToken} from "../util";
import {normalizePrefix, type RouteData} from "./proxyClient";

interface RouteEntry {
    target: string;
    data: RouteData;
    lastActivity: Date;
}

function splitPath(path: string) {
    return path.split("/").filter(segment => segment.length > 0);
}

/**
 * Path-prefix routing table. Prefixes match whole path segments, so /user/al
 * does not match /user/alice.
 */
export class RouteTable {
    private routes = new Map<string, RouteEntry>();

    get size() {
        return this.routes.size;
    }

    add(prefix: string, target: string, data: RouteData = {}, now = new Date()) {
        this.routes.set(normalizePrefix(prefix), {target, data, lastActivity: now});
    }

    remove(prefix: string) {
        return this.routes.delete(normalizePrefix(prefix));
    }

    get(prefix: string) {
        return this.routes.get(normalizePrefix(prefix));
    }

    // Longest registered prefix matching the path
    match(path: string): {prefix: string; entry: RouteEntry} | undefined {
        const segments = splitPath(path.split("?")[0]);
        for (let length = segments.length; length >= 0; length--) {
            const prefix = normalizePrefix(segments.slice(0, length).join("/"));
            const entry = this.routes.get(prefix);
            if (entry) {
                return {prefix, entry};
            }
        }
        return undefined;
    }

    toJSON(inactiveSince?: Date) {
        const table: Record<string, RouteData & {target: string; last_activity: string}> = {};
        for (const [prefix, entry] of this.routes) {
            if (inactiveSince && entry.lastActivity >= inactiveSince) {
                continue;
            }
            table[prefix] = {...entry.data, target: entry.target, last_activity: entry.lastActivity.toISOString()};
        }
        return table;
    }
}

function routePath(req: Request) {
    // Everything after /api/routes is the prefix
    return normalizePrefix(req.path.replace(/^\/api\/routes/, ""));
}

export function createAdminApp(table: RouteTable, authToken: string) {
    const app = express();
    app.use(bodyParser.json());
    app.use("/api/routes", requireToken(authToken));

    app.get("/api/routes", (req, res) => {
        const since = typeof req.query.inactive_since === "string" ? new Date(req.query.inactive_since) : undefined;
        res.json(table.toJSON(since && !Number.isNaN(since.getTime()) ? since : undefined));
    });

    app.post("/api/routes*", (req, res, next) => {
        const target: unknown = req.body?.target;
        if (typeof target !== "string" || !target) {
            return next({statusCode: 400, message: "Route target required"});
        }
        const data: RouteData = {};
        for (const [key, value] of Object.entries<unknown>(req.body)) {
            if (key !== "target" && (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean")) {
                data[key] = value;
            }
        }
        const prefix = routePath(req);
        table.add(prefix, target, data);
        logger.debug(`Proxy route ${prefix} -> ${target}`);
        res.status(201).end();
    });

    app.delete("/api/routes*", (req, res) => {
        const prefix = routePath(req);
        if (table.remove(prefix)) {
            logger.debug(`Proxy route ${prefix} removed`);
            res.status(204).end();
        } else {
            res.status(404).json({status: "not found", message: `No route for ${prefix}`});
        }
    });

    app.use((err: {statusCode?: number; message?: string}, _req: Request, res: Response, _next: NextFunction) => {
        res.status(err.statusCode ?? 500).json({status: "error", message: err.message});
    });
    return app;
}

/**
 * Reverse proxy forwarding each request to the target of its longest matching route.
 * Requests without a matching route go to the default target (normally the hub).
 */
export class RoutingProxy {
    readonly table = new RouteTable();
    private proxy = httpProxy.createProxyServer({ws: true, xfwd: true});
    private publicServer?: http.Server;
    private adminServer?: http.Server;

    constructor(private cfg: {authToken: string; defaultTarget?: string}) {
        // Ignore connection resets from clients going away
        this.proxy.on("error", (err: Error & {code?: string}, _req, res) => {
            if (err?.code === "ECONNRESET") {
                return;
            }
            logger.error(`Proxy error:\t${err}`);
            if (res instanceof http.ServerResponse && !res.headersSent) {
                res.writeHead(503, {"Content-Type": "application/json"});
                res.end(JSON.stringify({status: "error", message: "Service unavailable"}));
            }
        });
        if (cfg.defaultTarget) {
            this.table.add("/", cfg.defaultTarget);
        }
    }

    private resolve(url: string | undefined) {
        const match = this.table.match(url ?? "/");
        if (match) {
            match.entry.lastActivity = new Date();
        }
        return match?.entry.target;
    }

    handleRequest = (req: http.IncomingMessage, res: http.ServerResponse) => {
        const target = this.resolve(req.url);
        if (!target) {
            res.writeHead(404, {"Content-Type": "application/json"});
            res.end(JSON.stringify({status: "not found", message: `No route for ${req.url}`}));
            return;
        }
        this.proxy.web(req, res, {target});
    };

    handleUpgrade = (req: http.IncomingMessage, socket: Socket, head: Buffer) => {
        const target = this.resolve(req.url);
        if (!target) {
            socket.end();
            return;
        }
        this.proxy.ws(req, socket, head, {target});
    };

    async listen(publicPort: number, apiPort: number, publicInterface?: string) {
        this.publicServer = http.createServer(this.handleRequest);
        this.publicServer.on("upgrade", this.handleUpgrade);
        this.adminServer = http.createServer(createAdminApp(this.table, this.cfg.authToken));
        await listen(this.publicServer, publicPort, publicInterface);
        await listen(this.adminServer, apiPort, "127.0.0.1");
        logger.info(`Routing proxy listening on port ${publicPort}, admin API on 127.0.0.1:${apiPort}`);
    }

    async close() {
        await Promise.all([closeServer(this.publicServer), closeServer(this.adminServer)]);
        this.proxy.close();
    }
}

export function listen(server: http.Server, port: number, host?: string) {
    return new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
            server.off("error", reject);
            resolve();
        });
    });
}

export function closeServer(server?: http.Server) {
    return new Promise<void>((resolve, reject) => {
        if (!server?.listening) {
            resolve();
            return;
        }
        server.close(err => (err ? reject(err) : resolve()));
    });
}
