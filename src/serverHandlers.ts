// serverHandlers.ts
import express, {type NextFunction, type Response} from "express";
import {createAuthGuard} from "./auth";
import {BadRequest} from "./errors";
import {routePrefix} from "./orchestrator/orchestrator";
import {ServerState} from "./spawner/serverProcess";
import type {AuthenticatedRequest, HubContext} from "./types";
import {normalizeUsername} from "./users/userStore";
import {noCache} from "./util";

// Redirects through the hub before giving up on a route that never shows up at the proxy
const MAX_REDIRECTS = 3;

const serverNamePattern = /^[\w.-]*$/;

export function parseServerName(value: unknown) {
    if (value === undefined || value === null) {
        return "";
    }
    if (typeof value !== "string" || !serverNamePattern.test(value)) {
        throw new BadRequest("Invalid server name");
    }
    return value;
}

export function parseTail(value: unknown) {
    if (value === undefined) {
        return undefined;
    }
    const tail = Number(value);
    if (!Number.isInteger(tail) || tail < 0) {
        throw new BadRequest("Invalid tail parameter");
    }
    return tail;
}

function requireUsername(req: AuthenticatedRequest, next: NextFunction) {
    if (!req.username) {
        next({statusCode: 403, message: "Invalid username"});
        return undefined;
    }
    return req.username;
}

// Self-service operations on the caller's own servers
export function createServerRouter(ctx: HubContext) {
    const {orchestrator} = ctx;

    async function handleStartServer(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const username = requireUsername(req, next);
            if (!username) return;
            const result = await orchestrator.ensureRunning(username, parseServerName(req.body?.serverName));
            res.status(result.changed ? 201 : 200).json({success: true, ...result});
        } catch (err) {
            next(err);
        }
    }

    async function handleStopServer(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const username = requireUsername(req, next);
            if (!username) return;
            const result = await orchestrator.ensureStopped(username, parseServerName(req.body?.serverName));
            res.json({success: true, ...result});
        } catch (err) {
            next(err);
        }
    }

    function handleCheckServer(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const username = requireUsername(req, next);
            if (!username) return;
            const server = orchestrator.getServer(username, parseServerName(req.query.serverName));
            res.json({success: true, running: server?.state === ServerState.Running, server: server?.toJSON()});
        } catch (err) {
            next(err);
        }
    }

    async function handleLog(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const username = requireUsername(req, next);
            if (!username) return;
            res.json(await orchestrator.serverLogs(username, parseServerName(req.query.serverName), parseTail(req.query.tail)));
        } catch (err) {
            next(err);
        }
    }

    const authGuard = createAuthGuard(ctx);
    const serverRouter = express.Router();
    serverRouter.post("/start", authGuard, noCache, handleStartServer);
    serverRouter.post("/stop", authGuard, noCache, handleStopServer);
    serverRouter.get("/status", authGuard, noCache, handleCheckServer);
    serverRouter.get("/log", authGuard, noCache, handleLog);
    return serverRouter;
}

/**
 * Requests for /user/<name>/... reach the hub only while the proxy has no route for
 * them. Starts the server and sends the client back to the same URL. The first path
 * segment selects a named server when the user already has a server of that name.
 */
export function createUserRedirectRouter(ctx: HubContext) {
    const {orchestrator} = ctx;

    async function handleUserRedirect(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const name = normalizeUsername(req.params.name);
            if (req.username !== name && !req.admin) {
                return next({statusCode: 403, message: `Not allowed to access the server of ${name}`});
            }
            const rest: string = req.params[0] ?? "";
            const firstSegment = rest.split("/")[0] ?? "";
            const serverName = firstSegment && orchestrator.getServer(name, firstSegment) ? firstSegment : "";

            const redirects = Number(req.query.redirects ?? 0) || 0;
            if (redirects >= MAX_REDIRECTS) {
                return next({statusCode: 503, status: "unavailable", message: `Server at ${routePrefix(name, serverName)} is not reachable through the proxy`});
            }
            await orchestrator.ensureRunning(name, serverName);

            const target = new URL(req.originalUrl, "http://hub.invalid");
            target.searchParams.set("redirects", String(redirects + 1));
            res.redirect(302, `${target.pathname}${target.search}`);
        } catch (err) {
            next(err);
        }
    }

    const authGuard = createAuthGuard(ctx);
    const userRouter = express.Router();
    userRouter.get("/user/:name", authGuard, noCache, handleUserRedirect);
    userRouter.get("/user/:name/*", authGuard, noCache, handleUserRedirect);
    return userRouter;
}
