import axios, {type AxiosInstance, isAxiosError} from "axios";
import {ProxyUnreachable} from "../errors";
import {type BackoffOptions, defaultBackoff, errorMessage, exponentialBackoff, isRecord, logger} from "../util";

export type RouteData = Record<string, string | number | boolean | null>;

export interface Route {
    prefix: string;
    target: string;
    data: RouteData;
    lastActivity?: Date;
}

export interface ProxyClient {
    addRoute(prefix: string, target: string, data?: RouteData): Promise<void>;
    // Removing a route that does not exist succeeds
    removeRoute(prefix: string): Promise<void>;
    listRoutes(): Promise<Route[]>;
}

const transientCodes = new Set(["ECONNREFUSED", "ECONNRESET", "ECONNABORTED", "ETIMEDOUT", "EPIPE", "EHOSTUNREACH", "ENOTFOUND", "EAI_AGAIN"]);

export function isTransientProxyError(err: unknown) {
    if (!isAxiosError(err)) {
        return false;
    }
    if (err.response) {
        return err.response.status >= 500;
    }
    return !err.code || transientCodes.has(err.code);
}

// Route prefixes always start with a slash and never end with one
export function normalizePrefix(prefix: string) {
    const trimmed = prefix.replace(/\/+$/, "");
    return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

function parseRouteTable(body: unknown): Route[] {
    if (!isRecord(body)) {
        throw new Error("Malformed route table from proxy");
    }
    const routes: Route[] = [];
    for (const [prefix, entry] of Object.entries(body)) {
        if (!isRecord(entry) || typeof entry.target !== "string") {
            logger.warning(`Ignoring proxy route ${prefix} without a target`);
            continue;
        }
        const data: RouteData = {};
        for (const [key, value] of Object.entries(entry)) {
            if (key === "target" || key === "last_activity") {
                continue;
            }
            if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
                data[key] = value;
            }
        }
        const route: Route = {prefix: normalizePrefix(prefix), target: entry.target, data};
        if (typeof entry.last_activity === "string") {
            const lastActivity = new Date(entry.last_activity);
            if (!Number.isNaN(lastActivity.getTime())) {
                route.lastActivity = lastActivity;
            }
        }
        routes.push(route);
    }
    return routes;
}

/**
 * Client for a configurable-http-proxy style admin API.
 */
export class HttpProxyClient implements ProxyClient {
    private http: AxiosInstance;
    private backoff: BackoffOptions;

    constructor(cfg: {apiUrl: string; authToken: string; retry?: Partial<BackoffOptions>; timeoutMs?: number; http?: AxiosInstance}) {
        this.http =
            cfg.http ??
            axios.create({
                baseURL: cfg.apiUrl.replace(/\/+$/, ""),
                timeout: cfg.timeoutMs ?? 10000
            });
        this.http.defaults.headers.common.Authorization = `token ${cfg.authToken}`;
        this.backoff = {...defaultBackoff, ...cfg.retry};
    }

    async addRoute(prefix: string, target: string, data: RouteData = {}) {
        const path = normalizePrefix(prefix);
        await this.request(`add route ${path}`, () => this.http.post(`/api/routes${path}`, {...data, target}));
        logger.info(`Added proxy route ${path} -> ${target}`);
    }

    async removeRoute(prefix: string) {
        const path = normalizePrefix(prefix);
        await this.request(`remove route ${path}`, async () => {
            try {
                await this.http.delete(`/api/routes${path}`);
            } catch (err) {
                if (isAxiosError(err) && err.response?.status === 404) {
                    return;
                }
                throw err;
            }
        });
        logger.info(`Removed proxy route ${path}`);
    }

    async listRoutes() {
        const res = await this.request("list routes", () => this.http.get<unknown>("/api/routes"));
        return parseRouteTable(res.data);
    }

    private async request<T>(description: string, task: () => Promise<T>): Promise<T> {
        try {
            return await exponentialBackoff(task, isTransientProxyError, this.backoff, (err, attempt, wait) => {
                logger.warning(`Proxy ${description} failed (attempt ${attempt}/${this.backoff.attempts}): ${errorMessage(err)}. Retrying in ${wait} ms`);
            });
        } catch (err) {
            if (isTransientProxyError(err)) {
                throw new ProxyUnreachable(`Proxy unreachable while trying to ${description}: ${errorMessage(err)}`, {cause: err});
            }
            throw err;
        }
    }
}
