import express, {type NextFunction, type Response} from "express";
import {adminGuard, createAuthGuard, resolveToken} from "./auth";
import type {HubUserModel} from "./auth/hubAuth";
import {BadRequest, NotFound} from "./errors";
import {parseServerName} from "./serverHandlers";
import type {ServerView} from "./spawner/serverProcess";
import type {AuthenticatedRequest, HubContext} from "./types";
import {newApiToken, normalizeUsername, tokenModel, type User} from "./users/userStore";
import {noCache} from "./util";

type UserModel = {
    name: string;
    admin: boolean;
    created: string;
    last_activity?: string;
    servers: Record<string, ServerView>;
};

function ownerOrAdmin(req: AuthenticatedRequest, _res: Response, next: NextFunction) {
    if (req.admin || req.username === normalizeUsername(req.params.name)) {
        next();
    } else {
        next({statusCode: 403, message: "Not allowed"});
    }
}

// Admin REST API: users, their servers and tokens, the proxy's routes
export function createAdminRouter(ctx: HubContext) {
    const {orchestrator, store} = ctx;

    function userModel(user: User): UserModel {
        const servers: Record<string, ServerView> = {};
        for (const server of orchestrator.listServers({user: user.name, all: true})) {
            servers[server.serverName] = server.toJSON();
        }
        return {
            name: user.name,
            admin: user.admin,
            created: user.createdAt.toISOString(),
            last_activity: user.lastActivity?.toISOString(),
            servers
        };
    }

    async function findUser(name: string) {
        const user = await store.getUser(normalizeUsername(name));
        if (!user) {
            throw new NotFound(`No such user ${normalizeUsername(name)}`);
        }
        return user;
    }

    async function handleListUsers(_req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const users = await store.listUsers();
            res.json(users.map(userModel));
        } catch (err) {
            next(err);
        }
    }

    async function handleGetUser(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            res.json(userModel(await findUser(req.params.name)));
        } catch (err) {
            next(err);
        }
    }

    async function handleCreateUser(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const name = normalizeUsername(req.params.name);
            const admin: unknown = req.body?.admin ?? false;
            if (!name || typeof admin !== "boolean") {
                throw new BadRequest("Malformed user request");
            }
            const {user, created} = await store.createUser(name, admin);
            res.status(created ? 201 : 200).json({changed: created, user: userModel(user)});
        } catch (err) {
            next(err);
        }
    }

    async function handleDeleteUser(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            await orchestrator.deleteUser(req.params.name);
            res.status(204).end();
        } catch (err) {
            next(err);
        }
    }

    async function handleStartServer(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const user = await findUser(req.params.name);
            const result = await orchestrator.ensureRunning(user.name, parseServerName(req.params.server));
            res.status(result.changed ? 201 : 200).json(result);
        } catch (err) {
            next(err);
        }
    }

    async function handleStopServer(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const user = await findUser(req.params.name);
            res.json(await orchestrator.ensureStopped(user.name, parseServerName(req.params.server)));
        } catch (err) {
            next(err);
        }
    }

    function handleListServers(_req: AuthenticatedRequest, res: Response) {
        res.json(orchestrator.listServers().map(server => server.toJSON()));
    }

    async function handleListTokens(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const user = await findUser(req.params.name);
            const tokens = await store.listTokens(user.name);
            res.json(tokens.map(tokenModel));
        } catch (err) {
            next(err);
        }
    }

    async function handleCreateToken(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const user = await findUser(req.params.name);
            const note: unknown = req.body?.note;
            const expiresIn: unknown = req.body?.expires_in;
            if ((note !== undefined && typeof note !== "string") || (expiresIn !== undefined && (typeof expiresIn !== "number" || expiresIn <= 0))) {
                throw new BadRequest("Malformed token request");
            }
            const {secret, token} = newApiToken(user.name, {note, expiresInMs: expiresIn === undefined ? undefined : expiresIn * 1000});
            await store.addToken(token);
            res.status(201).json({...tokenModel(token), token: secret});
        } catch (err) {
            next(err);
        }
    }

    async function handleDeleteToken(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const user = await findUser(req.params.name);
            if (!(await store.deleteToken(user.name, req.params.id))) {
                throw new NotFound(`No token ${req.params.id} for user ${user.name}`);
            }
            res.status(204).end();
        } catch (err) {
            next(err);
        }
    }

    function handleGetRoutes(_req: AuthenticatedRequest, res: Response) {
        res.json({degraded: orchestrator.degraded, routes: orchestrator.routeMirror()});
    }

    async function handleReconcile(_req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const conflicts = await orchestrator.reconcile();
            res.json({
                conflicts: conflicts.map(conflict => ({prefix: conflict.prefix, repair: conflict.repair, message: conflict.message}))
            });
        } catch (err) {
            next(err);
        }
    }

    // Lets services identify the user behind a token they were given
    async function handleTokenAuthorization(req: AuthenticatedRequest, res: Response, next: NextFunction) {
        try {
            const resolved = await resolveToken(ctx, req.params.token);
            if (!resolved?.user) {
                throw new NotFound("No user for this token");
            }
            const model: HubUserModel = {...userModel(resolved.user), kind: "user"};
            res.json(model);
        } catch (err) {
            next(err);
        }
    }

    const authGuard = createAuthGuard(ctx);
    const adminRouter = express.Router();
    adminRouter.use(authGuard, noCache);
    adminRouter.get("/users", adminGuard, handleListUsers);
    adminRouter.get("/users/:name", ownerOrAdmin, handleGetUser);
    adminRouter.post("/users/:name", adminGuard, handleCreateUser);
    adminRouter.delete("/users/:name", adminGuard, handleDeleteUser);
    adminRouter.post("/users/:name/servers/:server?", ownerOrAdmin, handleStartServer);
    adminRouter.delete("/users/:name/servers/:server?", ownerOrAdmin, handleStopServer);
    adminRouter.get("/users/:name/tokens", ownerOrAdmin, handleListTokens);
    adminRouter.post("/users/:name/tokens", ownerOrAdmin, handleCreateToken);
    adminRouter.delete("/users/:name/tokens/:id", ownerOrAdmin, handleDeleteToken);
    adminRouter.get("/servers", adminGuard, handleListServers);
    adminRouter.get("/proxy", adminGuard, handleGetRoutes);
    adminRouter.post("/proxy/reconcile", adminGuard, handleReconcile);
    adminRouter.get("/authorizations/token/:token", handleTokenAuthorization);
    return adminRouter;
}
