// remote-spawner.ts
import axios, {type AxiosInstance} from "axios";
import {SpawnError, StopError} from "../errors";
import type {RemoteSpawnerConfig} from "../types";
import {errorMessage, isRecord, logger} from "../util";
import {type RpcMethod, parseServerView, RpcError, RpcErrorCode} from "./jsonRpc";
import {ServerProcess, ServerState, type ServerView, serverKey} from "./serverProcess";
import type {LogResult, PollResult, Spawner, StartOptions} from "./spawner";

function toProcess(view: ServerView) {
    const server = new ServerProcess(view.user, view.name);
    server.url = view.url;
    server.handle = {remoteId: view.id};
    if (view.started) {
        server.startedAt = new Date(view.started);
    }
    server.transition(ServerState.Running);
    return server;
}

/**
 * Delegates to a spawn agent on another host. Calls for the same server are
 * serialized by the agent's spawner.
 */
export class RemoteSpawner implements Spawner {
    readonly kind = "remote";
    private http: AxiosInstance;
    private nextId = 1;

    constructor(
        private cfg: RemoteSpawnerConfig & {startTimeoutMs: number},
        http?: AxiosInstance
    ) {
        this.http = http ?? axios.create({baseURL: cfg.agentUrl});
        this.http.defaults.headers.common.Authorization = `token ${cfg.authToken}`;
    }

    async call(method: RpcMethod, params: Record<string, unknown> = {}, opts: {signal?: AbortSignal; timeout?: number} = {}): Promise<unknown> {
        const id = this.nextId++;
        const res = await this.http.post<unknown>("/", {jsonrpc: "2.0", method, params, id}, {signal: opts.signal, timeout: opts.timeout ?? 10000});
        const body = res.data;
        if (!isRecord(body) || body.jsonrpc !== "2.0") {
            throw new RpcError(RpcErrorCode.InvalidRequest, `Malformed response to ${method}`);
        }
        if (isRecord(body.error)) {
            const code = typeof body.error.code === "number" ? body.error.code : -32603;
            throw new RpcError(code, String(body.error.message ?? "Unknown agent error"));
        }
        return body.result;
    }

    async start(userName: string, serverName: string, opts: StartOptions = {}): Promise<ServerProcess> {
        const key = serverKey(userName, serverName);
        try {
            const result = await this.call(
                "start_server",
                {user: userName, server: serverName, environment: opts.environment ?? {}, timeoutMs: this.cfg.startTimeoutMs},
                // The agent enforces the startup timeout itself; leave it time to answer
                {signal: opts.signal, timeout: this.cfg.startTimeoutMs + 10000}
            );
            const view = parseServerView(result);
            if (view.state !== ServerState.Running || !view.url) {
                throw new SpawnError(`Agent reported ${key} as ${view.state}`, key);
            }
            return toProcess(view);
        } catch (err) {
            if (opts.signal?.aborted) {
                // The agent may still finish the start we gave up on
                await this.call("stop_server", {user: userName, server: serverName}).catch(stopErr => logger.warning(`Could not stop abandoned start of ${key}: ${errorMessage(stopErr)}`));
            }
            if (err instanceof SpawnError) {
                throw err;
            }
            throw new SpawnError(`Server ${key} failed to start: ${errorMessage(err)}`, key, {cause: err});
        }
    }

    async poll(server: ServerProcess): Promise<PollResult> {
        const result = await this.call("poll_server", {user: server.userName, server: server.serverName});
        if (!isRecord(result)) {
            throw new RpcError(RpcErrorCode.InvalidRequest, "Malformed poll result from agent");
        }
        if (result.alive === true) {
            return {alive: true};
        }
        return {alive: false, exitCode: typeof result.exitCode === "number" ? result.exitCode : null};
    }

    async stop(server: ServerProcess, gracePeriodMs: number) {
        try {
            await this.call("stop_server", {user: server.userName, server: server.serverName, gracePeriodMs}, {timeout: gracePeriodMs + 10000});
        } catch (err) {
            throw new StopError(`Server ${server.key} could not be stopped: ${errorMessage(err)}`, server.key, {cause: err});
        }
    }

    async logs(server: ServerProcess, tail?: number): Promise<LogResult> {
        try {
            const result = await this.call("server_logs", {user: server.userName, server: server.serverName, tail});
            if (isRecord(result) && result.success === true && typeof result.log === "string") {
                return {success: true, log: result.log};
            }
        } catch (err) {
            logger.debug(err);
        }
        return {success: false};
    }

    async enumerate() {
        const result = await this.call("list_servers");
        if (!Array.isArray(result)) {
            throw new RpcError(RpcErrorCode.InvalidRequest, "Malformed server list from agent");
        }
        return result.map(parseServerView).filter(view => view.state === ServerState.Running).map(toProcess);
    }
}
