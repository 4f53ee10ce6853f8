import express from "express";
import type {AuthenticatedRequest, HubAuthenticatorConfig, HubContext} from "../types";
import {type ApiTokenModel, hashToken, tokenModel, type User} from "../users/userStore";
import {logger, noCache, sameSecret} from "../util";
import type {Authenticator} from "./authenticator";
import {DummyAuthenticator} from "./dummy";
import {LdapAuthenticator} from "./ldap";
import {PamAuthenticator} from "./pam";
import {TokenIssuer, TokenType} from "./tokens";

const REFRESH_COOKIE = "Refresh-Token";

export function createAuthenticator(cfg: HubAuthenticatorConfig): Authenticator {
    switch (cfg.kind) {
        case "dummy":
            return new DummyAuthenticator(cfg.dummy?.password);
        case "pam":
            return new PamAuthenticator(cfg.pam?.serviceName);
        case "ldap":
            if (!cfg.ldap) {
                throw new Error("Missing authenticator.ldap section");
            }
            return new LdapAuthenticator(cfg.ldap.ldapOptions);
    }
}

export interface ResolvedToken {
    user?: User;
    // The admin service token
    service?: boolean;
    apiToken?: ApiTokenModel;
}

// Resolves a JWT access token, an API token or the admin service token
export async function resolveToken(ctx: HubContext, token: string): Promise<ResolvedToken | undefined> {
    if (ctx.config.adminToken && sameSecret(token, ctx.config.adminToken)) {
        return {service: true};
    }
    if (TokenIssuer.looksLikeJwt(token)) {
        const payload = ctx.tokens.verify(token);
        if (!payload?.username || payload.refresh) {
            return undefined;
        }
        const user = await ctx.store.getUser(payload.username);
        return user ? {user} : undefined;
    }
    const apiToken = await ctx.store.findTokenByHash(hashToken(token));
    if (!apiToken) {
        return undefined;
    }
    const now = new Date();
    if (apiToken.expiresAt && apiToken.expiresAt <= now) {
        logger.debug(`Rejected expired API token ${apiToken.id}`);
        return undefined;
    }
    const user = await ctx.store.getUser(apiToken.userName);
    if (!user) {
        return undefined;
    }
    await ctx.store.touchToken(apiToken.id, now);
    return {user, apiToken: tokenModel(apiToken)};
}

// Bearer header or access_token query (express-bearer-token), or "Authorization: token <secret>"
function requestToken(req: AuthenticatedRequest) {
    if (req.token) {
        return req.token;
    }
    const [scheme, value] = (req.headers.authorization ?? "").split(" ");
    return scheme?.toLowerCase() === "token" && value ? value : undefined;
}

// Express middleware to guard against unauthorized access. Writes the username to the request object
export function createAuthGuard(ctx: HubContext) {
    return async (req: AuthenticatedRequest, _res: express.Response, next: express.NextFunction) => {
        const tokenString = requestToken(req);
        if (!tokenString) {
            return next({statusCode: 403, message: "Not authorized"});
        }
        try {
            const resolved = await resolveToken(ctx, tokenString);
            if (!resolved) {
                return next({statusCode: 403, message: "Not authorized"});
            }
            if (resolved.service) {
                req.service = true;
                req.admin = true;
            } else if (resolved.user) {
                req.username = resolved.user.name;
                req.admin = resolved.user.admin || ctx.orchestrator.resolver.isAdmin(resolved.user.name);
            }
            next();
        } catch (err) {
            next(err);
        }
    };
}

export function adminGuard(req: AuthenticatedRequest, _res: express.Response, next: express.NextFunction) {
    if (req.admin) {
        next();
    } else {
        next({statusCode: 403, message: "Admin access required"});
    }
}

function addTokensToResponse(ctx: HubContext, res: express.Response, username: string) {
    const refreshToken = ctx.tokens.generateToken(username, TokenType.Refresh);
    res.cookie(REFRESH_COOKIE, refreshToken, {
        path: ctx.runtime.authPath,
        maxAge: ctx.tokens.refreshTokenAgeMs,
        httpOnly: true,
        secure: !ctx.config.httpOnly,
        sameSite: "strict"
    });

    res.json({
        access_token: ctx.tokens.generateToken(username, TokenType.Access),
        token_type: "bearer",
        username,
        expires_in: ctx.tokens.accessTokenAgeSeconds
    });
}

export function createAuthRouter(ctx: HubContext) {
    const authGuard = createAuthGuard(ctx);

    const loginHandler = async (req: express.Request, res: express.Response, next: express.NextFunction) => {
        const username: unknown = req.body?.username;
        const password: unknown = req.body?.password ?? "";
        if (typeof username !== "string" || !username || typeof password !== "string") {
            return next({statusCode: 400, message: "Malformed login request"});
        }
        try {
            const user = await ctx.orchestrator.login({username, password});
            logger.info(`Authenticated as user ${user.name}`);
            addTokensToResponse(ctx, res, user.name);
        } catch (err) {
            next(err);
        }
    };

    const refreshHandler = async (req: express.Request, res: express.Response, next: express.NextFunction) => {
        const refreshTokenCookie: unknown = req.cookies?.[REFRESH_COOKIE];
        if (typeof refreshTokenCookie !== "string" || !refreshTokenCookie) {
            return next({statusCode: 400, message: "Missing refresh token"});
        }
        const refreshToken = ctx.tokens.verify(refreshTokenCookie);
        if (!refreshToken?.username || !refreshToken.refresh) {
            return next({statusCode: 403, message: "Not authorized"});
        }
        try {
            const user = await ctx.store.getUser(refreshToken.username);
            if (!user) {
                return next({statusCode: 403, message: "Not authorized"});
            }
            logger.info(`Refreshed access token for user ${user.name}`);
            res.json({
                access_token: ctx.tokens.generateToken(user.name, TokenType.Access),
                token_type: "bearer",
                username: user.name,
                expires_in: ctx.tokens.accessTokenAgeSeconds
            });
        } catch (err) {
            next(err);
        }
    };

    const logoutHandler = (_req: express.Request, res: express.Response) => {
        res.cookie(REFRESH_COOKIE, "", {
            path: ctx.runtime.authPath,
            maxAge: 0,
            httpOnly: true,
            secure: !ctx.config.httpOnly,
            sameSite: "strict"
        });
        res.json({success: true});
    };

    const handleCheckAuth = (req: AuthenticatedRequest, res: express.Response) => {
        res.json({
            success: true,
            username: req.username,
            admin: req.admin === true
        });
    };

    const authRouter = express.Router();
    authRouter.post("/login", noCache, loginHandler);
    authRouter.get("/logout", noCache, logoutHandler);
    authRouter.post("/refresh", noCache, refreshHandler);
    authRouter.get("/status", authGuard, noCache, handleCheckAuth);
    return authRouter;
}
