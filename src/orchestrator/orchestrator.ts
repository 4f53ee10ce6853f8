import {EventEmitter} from "node:events";
import type {Authenticator, Credentials} from "../auth/authenticator";
import {IdentityResolver} from "../auth/authenticator";
import {AuthFailure, HubError, NotFound, ProxyUnreachable, ReconciliationConflict, SpawnError} from "../errors";
import type {ProxyClient, Route} from "../proxy/proxyClient";
import {ServerProcess, ServerState, type ServerView, serverKey} from "../spawner/serverProcess";
import type {PollResult, Spawner} from "../spawner/spawner";
import {newApiToken, normalizeUsername, type User, type UserStore} from "../users/userStore";
import {errorMessage, logger} from "../util";
import {KeyedMutex} from "./keyedMutex";

export const USER_PREFIX = "/user";

// Default server: /user/<name>; named server: /user/<name>/<server>
export function routePrefix(userName: string, serverName: string) {
    const base = `${USER_PREFIX}/${encodeURIComponent(userName)}`;
    return serverName ? `${base}/${encodeURIComponent(serverName)}` : base;
}

export interface OrchestratorOptions {
    spawner: Spawner;
    proxy: ProxyClient;
    store: UserStore;
    authenticator?: Authenticator;
    resolver?: IdentityResolver;
    startTimeoutMs: number;
    stopGracePeriodMs: number;
    // Seconds-based config converted by the caller. Omitted or 0 disables the timer
    pollIntervalMs?: number;
    cull?: {timeoutMs: number; everyMs: number};
    // Passed to servers as HUB_API_URL
    hubApiUrl?: string;
    // Waits between reconcile attempts while degraded, doubling up to maxWaitMs
    reconcileRetry?: {startWaitMs: number; maxWaitMs: number};
}

const defaultReconcileRetry = {startWaitMs: 1000, maxWaitMs: 30_000};

export interface TransitionResult {
    // false when the server was already in the requested state
    changed: boolean;
    server?: ServerView;
}

export interface RouteMirrorEntry {
    prefix: string;
    target: string;
    key: string;
}

export interface Orchestrator {
    on(event: "started" | "stopped" | "failed", listener: (server: ServerProcess) => void): this;
    on(event: "degraded", listener: (degraded: boolean) => void): this;
    emit(event: "started" | "stopped" | "failed", server: ServerProcess): boolean;
    emit(event: "degraded", degraded: boolean): boolean;
}

/**
 * The hub core. Sole caller of Spawner.start/stop and of the proxy's route writes.
 * Every transition of a (user, server) pair runs under that pair's lock; pairs never
 * wait for each other.
 */
export class Orchestrator extends EventEmitter {
    private servers = new Map<string, ServerProcess>();
    private routes = new Map<string, RouteMirrorEntry>();
    private pending = new Map<string, Promise<TransitionResult>>();
    private serverTokens = new Map<string, {userName: string; id: string}>();
    private locks = new KeyedMutex();
    private timers: NodeJS.Timeout[] = [];
    private reconcileTimer?: NodeJS.Timeout;
    private timersStarted = false;
    private _degraded = false;
    private closing = false;
    private culling = false;
    private polling = false;
    readonly resolver: IdentityResolver;

    constructor(private opts: OrchestratorOptions) {
        super();
        this.resolver = opts.resolver ?? new IdentityResolver({allowedUsers: [], adminUsers: []});
    }

    get degraded() {
        return this._degraded;
    }

    get spawnerKind() {
        return this.opts.spawner.kind;
    }

    // ---------- Users ----------

    async login(credentials: Credentials): Promise<User> {
        if (!this.opts.authenticator) {
            throw new HubError("No authenticator configured");
        }
        const result = await this.opts.authenticator.authenticate(credentials);
        if (!result.success) {
            throw result.failure;
        }
        const identity = this.resolver.resolve(result.identity);
        if (!identity) {
            throw new AuthFailure(`User ${result.identity.name} is not allowed to log in`);
        }
        const {user, created} = await this.opts.store.createUser(identity.name, identity.admin ?? false);
        if (created) {
            logger.info(`Created user ${user.name}`);
        }
        const changes: Partial<Pick<User, "admin" | "lastActivity">> = {lastActivity: new Date()};
        if (identity.admin && !user.admin) {
            changes.admin = true;
        }
        return (await this.opts.store.updateUser(user.name, changes)) ?? user;
    }

    // Stops every server of the user, then removes the user and its tokens
    async deleteUser(name: string) {
        const userName = normalizeUsername(name);
        const user = await this.opts.store.getUser(userName);
        if (!user) {
            throw new NotFound(`No such user ${userName}`);
        }
        for (const server of this.listServers({user: userName})) {
            await this.ensureStopped(userName, server.serverName);
        }
        await this.opts.store.deleteUser(userName);
        logger.info(`Deleted user ${userName}`);
    }

    // ---------- Servers ----------

    getServer(user: string, serverName = "") {
        return this.servers.get(serverKey(normalizeUsername(user), serverName));
    }

    listServers(filter: {user?: string; all?: boolean} = {}) {
        const user = filter.user === undefined ? undefined : normalizeUsername(filter.user);
        return Array.from(this.servers.values()).filter(server => (filter.all || server.state === ServerState.Running) && (user === undefined || server.userName === user));
    }

    async serverLogs(user: string, serverName = "", tail?: number) {
        const server = this.getServer(user, serverName);
        if (!server) {
            throw new NotFound(`No server ${serverKey(normalizeUsername(user), serverName)}`);
        }
        return this.opts.spawner.logs(server, tail);
    }

    routeMirror(): RouteMirrorEntry[] {
        return Array.from(this.routes.values());
    }

    /**
     * Resolves once the server runs and its route is in place. Concurrent calls for the
     * same server share one spawn. The spawn is not cancelled when the caller goes away.
     */
    async ensureRunning(user: string, serverName = ""): Promise<TransitionResult> {
        const userName = normalizeUsername(user);
        const key = serverKey(userName, serverName);
        if (this.closing) {
            throw new HubError("Hub is shutting down");
        }
        if (this._degraded && this.servers.get(key)?.state !== ServerState.Running) {
            throw new ProxyUnreachable("Proxy unreachable; new servers are refused until routes are reconciled");
        }
        const inFlight = this.pending.get(key);
        if (inFlight) {
            const result = await inFlight;
            return {changed: false, server: result.server};
        }
        const operation = this.locks.run(key, () => this.startLocked(userName, serverName));
        this.pending.set(key, operation);
        try {
            return await operation;
        } finally {
            if (this.pending.get(key) === operation) {
                this.pending.delete(key);
            }
        }
    }

    async ensureStopped(user: string, serverName = ""): Promise<TransitionResult> {
        const userName = normalizeUsername(user);
        return this.locks.run(serverKey(userName, serverName), () => this.stopLocked(userName, serverName));
    }

    recordActivity(user: string, serverName = "", when = new Date()) {
        const server = this.getServer(user, serverName);
        if (!server || server.state !== ServerState.Running) {
            return false;
        }
        server.touch(when);
        return true;
    }

    // Stops servers idle for longer than the cull timeout. Returns the culled keys
    async cullIdle(now = new Date()): Promise<string[]> {
        const timeoutMs = this.opts.cull?.timeoutMs;
        if (!timeoutMs) {
            return [];
        }
        await this.mergeProxyActivity();
        const cutoff = new Date(now.getTime() - timeoutMs);
        const culled: string[] = [];
        for (const server of this.listServers()) {
            if (!server.lastActivity || server.lastActivity >= cutoff) {
                continue;
            }
            try {
                const result = await this.locks.run(server.key, () => this.stopLocked(server.userName, server.serverName, cutoff));
                if (result.changed) {
                    logger.info(`Culled idle server ${server.key}`);
                    culled.push(server.key);
                }
            } catch (err) {
                logger.error(`Could not cull ${server.key}: ${errorMessage(err)}`);
            }
        }
        return culled;
    }

    // Marks servers whose backend has exited as Failed and drops their routes
    async pollServers() {
        const failed: string[] = [];
        for (const server of this.listServers()) {
            if (this.locks.isLocked(server.key)) {
                continue;
            }
            await this.locks.run(server.key, async () => {
                if (this.servers.get(server.key) !== server || server.state !== ServerState.Running) {
                    return;
                }
                let result: PollResult;
                try {
                    result = await this.opts.spawner.poll(server);
                } catch (err) {
                    logger.warning(`Could not poll ${server.key}: ${errorMessage(err)}`);
                    return;
                }
                if (result.alive) {
                    return;
                }
                server.exitCode = result.exitCode;
                server.fail(`Server exited with code ${result.exitCode}`);
                logger.warning(`Server ${server.key} exited unexpectedly (code ${result.exitCode})`);
                await this.dropRoute(server);
                await this.releaseToken(server.key);
                // Lets the spawner drop what it still holds for the dead backend
                try {
                    await this.opts.spawner.stop(server, 0);
                } catch (err) {
                    logger.warning(`Could not clean up ${server.key}: ${errorMessage(err)}`);
                }
                failed.push(server.key);
                this.emit("failed", server);
            });
        }
        return failed;
    }

    /**
     * Repairs the proxy's routing table against the running servers: adopts servers
     * the spawner still knows, removes stale user routes and adds missing ones.
     * Clears the degraded flag on success.
     */
    async reconcile(): Promise<ReconciliationConflict[]> {
        await this.adoptEnumerated();

        let conflicts: ReconciliationConflict[];
        try {
            conflicts = await this.repairRoutes();
        } catch (err) {
            if (err instanceof ProxyUnreachable) {
                this.setDegraded(true);
            }
            throw err;
        }
        for (const conflict of conflicts) {
            logger.warning(`Reconciliation: ${conflict.message}`);
        }
        this.setDegraded(false);
        return conflicts;
    }

    private async repairRoutes() {
        const routes = await this.opts.proxy.listRoutes();
        const conflicts: ReconciliationConflict[] = [];
        const running = new Map<string, ServerProcess>();
        const busy = new Set<string>();
        for (const server of this.servers.values()) {
            const prefix = routePrefix(server.userName, server.serverName);
            if (server.state === ServerState.Running) {
                running.set(prefix, server);
            } else if (!server.terminal || this.locks.isLocked(server.key)) {
                busy.add(prefix);
            }
        }

        const seen = new Set<string>();
        for (const route of routes) {
            if (!route.prefix.startsWith(`${USER_PREFIX}/`) || busy.has(route.prefix)) {
                continue;
            }
            seen.add(route.prefix);
            const server = running.get(route.prefix);
            if (!server) {
                await this.opts.proxy.removeRoute(route.prefix);
                this.routes.delete(route.prefix);
                conflicts.push(new ReconciliationConflict(`Removed stale route ${route.prefix} -> ${route.target}`, route.prefix, "removed"));
            } else if (server.url && route.target !== server.url) {
                await this.opts.proxy.addRoute(route.prefix, server.url, this.routeData(server));
                conflicts.push(new ReconciliationConflict(`Replaced route ${route.prefix}: ${route.target} -> ${server.url}`, route.prefix, "replaced"));
            }
        }
        for (const [prefix, server] of running) {
            if (!server.url) {
                continue;
            }
            if (!seen.has(prefix)) {
                await this.opts.proxy.addRoute(prefix, server.url, this.routeData(server));
                conflicts.push(new ReconciliationConflict(`Added missing route ${prefix} -> ${server.url}`, prefix, "added"));
            }
            this.routes.set(prefix, {prefix, target: server.url, key: server.key});
        }

        logger.info(`Reconciled ${running.size} running server(s) with ${routes.length} proxy route(s)`);
        return conflicts;
    }

    startTimers() {
        const {pollIntervalMs, cull} = this.opts;
        if (pollIntervalMs) {
            this.timers.push(setInterval(() => this.runPoll(), pollIntervalMs));
        }
        if (cull?.everyMs && cull.timeoutMs) {
            this.timers.push(setInterval(() => this.runCull(), cull.everyMs));
        }
        for (const timer of this.timers) {
            timer.unref();
        }
        this.timersStarted = true;
        if (this._degraded) {
            this.scheduleReconcile(this.reconcileRetry.startWaitMs);
        }
    }

    stopTimers() {
        for (const timer of this.timers) {
            clearInterval(timer);
        }
        this.timers = [];
        clearTimeout(this.reconcileTimer);
        this.reconcileTimer = undefined;
        this.timersStarted = false;
    }

    private get reconcileRetry() {
        return this.opts.reconcileRetry ?? defaultReconcileRetry;
    }

    // Retries reconcile with a doubling wait until the hub leaves degraded mode
    private scheduleReconcile(waitMs: number) {
        if (!this.timersStarted || this.closing || this.reconcileTimer) {
            return;
        }
        this.reconcileTimer = setTimeout(() => {
            this.reconcileTimer = undefined;
            void this.retryReconcile(waitMs);
        }, waitMs);
        this.reconcileTimer.unref();
    }

    private async retryReconcile(waitMs: number) {
        if (!this._degraded || this.closing) {
            return;
        }
        try {
            await this.reconcile();
        } catch (err) {
            const nextWait = Math.min(waitMs * 2, this.reconcileRetry.maxWaitMs);
            logger.warning(`Reconciliation failed, retrying in ${nextWait / 1000}s: ${errorMessage(err)}`);
            this.scheduleReconcile(nextWait);
        }
    }

    // Refuses new starts, waits for in-flight transitions and optionally stops every server
    async shutdown(options: {stopServers?: boolean} = {}) {
        this.closing = true;
        this.stopTimers();
        await this.locks.drain();
        if (!options.stopServers) {
            return;
        }
        for (const server of this.listServers()) {
            try {
                await this.ensureStopped(server.userName, server.serverName);
            } catch (err) {
                logger.error(`Could not stop ${server.key} during shutdown: ${errorMessage(err)}`);
            }
        }
    }

    // ---------- internals ----------

    private setDegraded(degraded: boolean) {
        if (degraded === this._degraded) {
            return;
        }
        this._degraded = degraded;
        if (degraded) {
            logger.alert("Proxy is unreachable: routing may be inconsistent, refusing new servers until reconciliation succeeds");
            this.scheduleReconcile(this.reconcileRetry.startWaitMs);
        } else {
            logger.notice("Proxy reachable again, accepting new servers");
        }
        this.emit("degraded", degraded);
    }

    private routeData(server: ServerProcess) {
        return {user: server.userName, server_name: server.serverName};
    }

    private environment(userName: string, serverName: string, apiToken: string) {
        const environment: Record<string, string> = {
            HUB_USER: userName,
            HUB_SERVER_NAME: serverName,
            HUB_SERVICE_PREFIX: `${routePrefix(userName, serverName)}/`,
            HUB_API_TOKEN: apiToken
        };
        if (this.opts.hubApiUrl) {
            environment.HUB_API_URL = this.opts.hubApiUrl;
        }
        return environment;
    }

    private async startLocked(userName: string, serverName: string): Promise<TransitionResult> {
        const key = serverKey(userName, serverName);
        const prefix = routePrefix(userName, serverName);
        const current = this.servers.get(key);
        if (current?.state === ServerState.Running && current.url) {
            if (this.routes.get(prefix)?.target !== current.url) {
                await this.writeRoute(current);
            }
            return {changed: false, server: current.toJSON()};
        }
        if (!(await this.opts.store.getUser(userName))) {
            throw new NotFound(`No such user ${userName}`);
        }

        // Stands in for the server until the spawner hands back its own process
        const placeholder = new ServerProcess(userName, serverName);
        placeholder.transition(ServerState.Starting);
        this.servers.set(key, placeholder);

        let server: ServerProcess;
        try {
            const {secret, token} = newApiToken(userName, {note: `server ${key}`});
            await this.opts.store.addToken(token);
            this.serverTokens.set(key, {userName, id: token.id});

            server = await this.spawnWithTimeout(userName, serverName, this.environment(userName, serverName, secret));
            if (!server.url) {
                await this.stopUnusable(server, "it has no URL");
                throw new SpawnError(`Spawner returned no URL for ${key}`, key);
            }
        } catch (err) {
            placeholder.fail(errorMessage(err));
            await this.releaseToken(key);
            this.emit("failed", placeholder);
            logger.error(`Failed to start ${key}: ${errorMessage(err)}`);
            throw err instanceof SpawnError ? err : new SpawnError(`Server ${key} failed to start: ${errorMessage(err)}`, key, {cause: err});
        }

        try {
            await this.writeRoute(server);
        } catch (err) {
            logger.error(`Could not add route for ${key}, stopping it: ${errorMessage(err)}`);
            try {
                await this.opts.spawner.stop(server, this.opts.stopGracePeriodMs);
            } catch (stopErr) {
                logger.error(`Could not stop ${key}: ${errorMessage(stopErr)}`);
            }
            server.fail(`Route could not be added: ${errorMessage(err)}`);
            this.servers.set(key, server);
            await this.releaseToken(key);
            this.emit("failed", server);
            throw err;
        }
        this.servers.set(key, server);
        logger.info(`Server ${key} running at ${server.url}`);
        this.emit("started", server);
        return {changed: true, server: server.toJSON()};
    }

    private async spawnWithTimeout(userName: string, serverName: string, environment: Record<string, string>) {
        const key = serverKey(userName, serverName);
        const controller = new AbortController();
        const start = this.opts.spawner.start(userName, serverName, {signal: controller.signal, environment});
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new SpawnError(`Server ${key} did not start within ${this.opts.startTimeoutMs / 1000}s`, key));
            }, this.opts.startTimeoutMs);
        });
        try {
            return await Promise.race([start, timeout]);
        } catch (err) {
            if (controller.signal.aborted) {
                // A spawner that ignores the signal may still bring the server up
                void start.then(
                    late => this.stopUnusable(late, "it came up after its startup timeout"),
                    () => undefined
                );
            }
            throw err;
        } finally {
            clearTimeout(timer);
        }
    }

    private async stopUnusable(server: ServerProcess, reason: string) {
        logger.warning(`Stopping ${server.key} because ${reason}`);
        try {
            await this.opts.spawner.stop(server, this.opts.stopGracePeriodMs);
        } catch (err) {
            logger.error(`Could not stop ${server.key}: ${errorMessage(err)}`);
        }
    }

    private async stopLocked(userName: string, serverName: string, idleBefore?: Date): Promise<TransitionResult> {
        const key = serverKey(userName, serverName);
        const server = this.servers.get(key);
        if (!server || server.state !== ServerState.Running) {
            return {changed: false, server: server?.toJSON()};
        }
        // Activity may have been recorded while the culler waited for the lock
        if (idleBefore && server.lastActivity && server.lastActivity >= idleBefore) {
            return {changed: false, server: server.toJSON()};
        }
        server.transition(ServerState.Stopping);
        await this.dropRoute(server);
        try {
            await this.opts.spawner.stop(server, this.opts.stopGracePeriodMs);
        } catch (err) {
            server.fail(errorMessage(err));
            await this.releaseToken(key);
            this.emit("failed", server);
            throw err;
        }
        server.transition(ServerState.Stopped);
        await this.releaseToken(key);
        logger.info(`Server ${key} stopped`);
        this.emit("stopped", server);
        return {changed: true, server: server.toJSON()};
    }

    private async writeRoute(server: ServerProcess) {
        const prefix = routePrefix(server.userName, server.serverName);
        const target = server.url ?? "";
        try {
            await this.opts.proxy.addRoute(prefix, target, this.routeData(server));
        } catch (err) {
            if (err instanceof ProxyUnreachable) {
                this.setDegraded(true);
            }
            throw err;
        }
        this.routes.set(prefix, {prefix, target, key: server.key});
    }

    // Route removal is best effort; a leftover route is repaired by the next reconciliation
    private async dropRoute(server: ServerProcess) {
        const prefix = routePrefix(server.userName, server.serverName);
        this.routes.delete(prefix);
        try {
            await this.opts.proxy.removeRoute(prefix);
        } catch (err) {
            if (err instanceof ProxyUnreachable) {
                this.setDegraded(true);
            }
            logger.error(`Could not remove route ${prefix}: ${errorMessage(err)}`);
        }
    }

    private async releaseToken(key: string) {
        const token = this.serverTokens.get(key);
        if (!token) {
            return;
        }
        this.serverTokens.delete(key);
        try {
            await this.opts.store.deleteToken(token.userName, token.id);
        } catch (err) {
            logger.warning(`Could not revoke server token of ${key}: ${errorMessage(err)}`);
        }
    }

    private async adoptEnumerated() {
        if (!this.opts.spawner.enumerate) {
            return;
        }
        let found: ServerProcess[];
        try {
            found = await this.opts.spawner.enumerate();
        } catch (err) {
            logger.error(`Could not enumerate ${this.opts.spawner.kind} servers: ${errorMessage(err)}`);
            return;
        }
        for (const server of found) {
            const current = this.servers.get(server.key);
            if (server.state !== ServerState.Running || (current && !current.terminal)) {
                continue;
            }
            this.servers.set(server.key, server);
            logger.info(`Adopted running server ${server.key} at ${server.url}`);
        }
    }

    private async mergeProxyActivity() {
        let routes: Route[];
        try {
            routes = await this.opts.proxy.listRoutes();
        } catch (err) {
            logger.warning(`Could not read route activity: ${errorMessage(err)}`);
            return;
        }
        for (const route of routes) {
            const entry = this.routes.get(route.prefix);
            if (entry && route.lastActivity) {
                this.servers.get(entry.key)?.touch(route.lastActivity);
            }
        }
    }

    private runPoll() {
        if (this.polling) return;
        this.polling = true;
        void this.pollServers()
            .catch(err => logger.error(`Liveness poll failed: ${errorMessage(err)}`))
            .finally(() => {
                this.polling = false;
            });
    }

    private runCull() {
        if (this.culling) return;
        this.culling = true;
        void this.cullIdle()
            .catch(err => logger.error(`Idle culling failed: ${errorMessage(err)}`))
            .finally(() => {
                this.culling = false;
            });
    }
}
