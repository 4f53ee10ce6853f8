import * as bodyParser from "body-parser";
import compression from "compression";
import cookieParser from "cookie-parser";
import cors from "cors";
import express, {type NextFunction, type Request, type Response} from "express";
import bearerToken from "express-bearer-token";
import {createAdminRouter} from "./adminHandlers";
import {createAuthRouter} from "./auth";
import {createServerRouter, createUserRedirectRouter} from "./serverHandlers";
import type {HubContext} from "./types";
import {logger} from "./util";

interface AppError extends Error {
    statusCode?: number;
    status?: string;
}

export function createApp(ctx: HubContext) {
    const app = express();
    app.use(bodyParser.urlencoded({extended: true}));
    app.use(cookieParser());
    app.use(bearerToken());
    app.use(cors());
    app.use(compression());
    app.use("/api/auth", bodyParser.json(), createAuthRouter(ctx));
    app.use("/api/server", bodyParser.json(), createServerRouter(ctx));

    app.get("/api/config", (_req: Request, res: Response) => {
        return res.json(ctx.runtime);
    });
    app.get("/api/health", (_req: Request, res: Response) => {
        res.status(ctx.orchestrator.degraded ? 503 : 200).json({
            status: ctx.orchestrator.degraded ? "degraded" : "ok",
            spawner: ctx.orchestrator.spawnerKind,
            servers: ctx.orchestrator.listServers().length
        });
    });

    app.use("/api", bodyParser.json(), createAdminRouter(ctx));
    app.use(createUserRedirectRouter(ctx));

    // Simplified error handling
    app.use((err: AppError, _req: Request, res: Response, _next: NextFunction) => {
        const statusCode = err.statusCode ?? 500;
        if (statusCode >= 500) {
            logger.error(err.message);
        } else {
            logger.debug(`${statusCode}: ${err.message}`);
        }
        res.status(statusCode).json({
            status: typeof err.status === "string" ? err.status : "error",
            error: err instanceof Error ? err.name : undefined,
            message: err.message
        });
    });
    return app;
}
