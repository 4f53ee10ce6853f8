import * as os from "node:os";
import axios, {type AxiosInstance, isAxiosError} from "axios";
import type {NextFunction, Request, Response} from "express";
import {HubError} from "../errors";
import {joinUrl, logger} from "../util";

export interface HubUserModel {
    name: string;
    admin: boolean;
    kind?: "user" | "service";
    servers?: Record<string, unknown>;
}

/**
 * Map whose entries expire maxAge ms after they were set. A maxAge of 0 keeps
 * entries forever. Uses a monotonic clock.
 */
export class ExpiringCache<V> {
    private entries = new Map<string, {value: V; storedAt: number}>();

    constructor(
        readonly maxAge: number,
        private now: () => number = () => performance.now()
    ) {}

    set(key: string, value: V) {
        const now = this.now();
        if (this.maxAge > 0) {
            for (const [k, entry] of this.entries) {
                if (entry.storedAt + this.maxAge < now) {
                    this.entries.delete(k);
                }
            }
        }
        this.entries.set(key, {value, storedAt: now});
    }

    get size() {
        return this.entries.size;
    }

    has(key: string) {
        return this.get(key) !== undefined;
    }

    get(key: string): V | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }
        if (this.maxAge > 0 && entry.storedAt + this.maxAge < this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    clear() {
        this.entries.clear();
    }
}

export class HubAuthError extends HubError {
    constructor(
        readonly statusCode: number,
        message: string
    ) {
        super(message);
    }
}

/**
 * Lets a backend service identify hub users by asking the hub's REST API which user
 * owns a token. Answers, including "no such user", are cached for cacheMaxAge ms.
 */
export class HubAuth {
    private http: AxiosInstance;
    private cache: ExpiringCache<HubUserModel | null>;

    constructor(
        private cfg: {
            // Base API URL of the hub, typically http://hub-ip:hub-port/api
            apiUrl: string;
            // Token the service uses for the hub's REST API
            apiToken: string;
            cacheMaxAge?: number;
            // If set, only these users are allowed
            allowedUsers?: string[];
            http?: AxiosInstance;
        }
    ) {
        this.http = cfg.http ?? axios.create({timeout: 10000});
        this.cache = new ExpiringCache(cfg.cacheMaxAge ?? 300_000);
    }

    async userForToken(token: string, useCache = true): Promise<HubUserModel | null> {
        if (useCache) {
            const cached = this.cache.get(token);
            if (cached !== undefined) {
                return cached;
            }
        }

        let data: HubUserModel | null;
        try {
            const res = await this.http.get<HubUserModel>(joinUrl(this.cfg.apiUrl, "authorizations/token", encodeURIComponent(token)), {
                headers: {Authorization: `token ${this.cfg.apiToken}`}
            });
            data = res.data;
        } catch (err) {
            if (!isAxiosError(err)) {
                throw err;
            }
            const status = err.response?.status;
            if (status === undefined) {
                let msg = `Failed to connect to Hub API at ${this.cfg.apiUrl}.  Is the Hub accessible at this URL (from host: ${os.hostname()})?`;
                if (this.cfg.apiUrl.includes("127.0.0.1")) {
                    msg += "  Make sure the hub listens on an address reachable from this service if it is not on the same host.";
                }
                throw new HubAuthError(500, msg);
            } else if (status === 404) {
                data = null;
            } else if (status === 403) {
                logger.error(`I don't have permission to verify tokens, my auth token may have expired: [${status}] ${err.message}`);
                throw new HubAuthError(500, "Permission failure checking authorization, I may need a new token");
            } else if (status >= 500) {
                logger.error(`Upstream failure verifying auth token: [${status}] ${err.message}`);
                throw new HubAuthError(502, "Failed to check authorization (upstream problem)");
            } else {
                logger.warning(`Failed to check authorization: [${status}] ${err.message}`);
                throw new HubAuthError(500, "Failed to check authorization");
            }
        }
        this.cache.set(token, data);
        return data;
    }

    // Returns the user model if the user should be allowed, null otherwise
    checkUser(model: HubUserModel | null): HubUserModel | null {
        if (!model) {
            return null;
        }
        if (!this.cfg.allowedUsers) {
            return model;
        }
        if (this.cfg.allowedUsers.includes(model.name)) {
            return model;
        }
        logger.warning(`Not allowing Hub user ${model.name}`);
        return null;
    }

    // Express middleware for services: sets res.locals.hubUser or rejects with 403
    middleware() {
        return async (req: Request, res: Response, next: NextFunction) => {
            const token = req.token;
            if (!token) {
                return next({statusCode: 403, message: "Not authorized"});
            }
            try {
                const user = this.checkUser(await this.userForToken(token));
                if (!user) {
                    return next({statusCode: 403, message: "Not authorized"});
                }
                res.locals.hubUser = user;
                next();
            } catch (err) {
                next(err);
            }
        };
    }
}
