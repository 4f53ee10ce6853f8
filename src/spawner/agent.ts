// agent.ts
import * as bodyParser from "body-parser";
import express, {type NextFunction, type Request, type Response} from "express";
import {SpawnError, StopError} from "../errors";
import {errorMessage, isRecord, logger, requireToken} from "../util";
import {type JsonRpcResponse, parseRequest, RpcError, RpcErrorCode} from "./jsonRpc";
import {ServerState, type ServerProcess, serverKey} from "./serverProcess";
import type {Spawner} from "./spawner";

type Params = Record<string, unknown>;

function stringParam(params: Params, name: string, required = true): string {
    const value = params[name];
    if (typeof value === "string" && (value || !required)) {
        return value;
    }
    if (value === undefined && !required) {
        return "";
    }
    throw new RpcError(RpcErrorCode.InvalidParams, `Parameter "${name}" must be a${required ? " non-empty" : ""} string`);
}

function numberParam(params: Params, name: string): number | undefined {
    const value = params[name];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
        return value;
    }
    throw new RpcError(RpcErrorCode.InvalidParams, `Parameter "${name}" must be a non-negative number`);
}

function environmentParam(params: Params): Record<string, string> {
    const value = params.environment;
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new RpcError(RpcErrorCode.InvalidParams, `Parameter "environment" must be an object`);
    }
    const environment: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
        environment[key] = String(entry);
    }
    return environment;
}

/**
 * Exposes a local spawner to a hub on another host. The hub's RemoteSpawner calls
 * these methods with JSON-RPC 2.0 over HTTP.
 */
export class SpawnAgent {
    private servers = new Map<string, ServerProcess>();

    constructor(
        readonly spawner: Spawner,
        private defaults: {startTimeoutMs: number; stopGracePeriodMs: number}
    ) {}

    get size() {
        return this.servers.size;
    }

    async dispatch(method: string, params: Params): Promise<unknown> {
        switch (method) {
            case "start_server":
                return this.startServer(params);
            case "poll_server":
                return this.pollServer(params);
            case "stop_server":
                return this.stopServer(params);
            case "list_servers":
                return Array.from(this.servers.values())
                    .filter(server => server.state === ServerState.Running)
                    .map(server => server.toJSON());
            case "server_logs": {
                const server = this.lookup(params);
                if (!server) {
                    return {success: false};
                }
                return this.spawner.logs(server, numberParam(params, "tail"));
            }
            default:
                throw new RpcError(RpcErrorCode.MethodNotFound, `Method ${method} not found`);
        }
    }

    // Stops every server started through this agent
    async stopAll() {
        for (const server of Array.from(this.servers.values())) {
            try {
                await this.spawner.stop(server, this.defaults.stopGracePeriodMs);
                this.servers.delete(server.key);
            } catch (err) {
                logger.error(`Could not stop ${server.key}: ${errorMessage(err)}`);
            }
        }
    }

    private lookup(params: Params) {
        return this.servers.get(serverKey(stringParam(params, "user"), stringParam(params, "server", false)));
    }

    private async startServer(params: Params) {
        const user = stringParam(params, "user");
        const name = stringParam(params, "server", false);
        const existing = this.servers.get(serverKey(user, name));
        if (existing && existing.state === ServerState.Running) {
            const result = await this.spawner.poll(existing);
            if (result.alive) {
                return existing.toJSON();
            }
            this.servers.delete(existing.key);
        }
        const timeoutMs = numberParam(params, "timeoutMs") ?? this.defaults.startTimeoutMs;
        try {
            const server = await this.spawner.start(user, name, {signal: AbortSignal.timeout(timeoutMs), environment: environmentParam(params)});
            this.servers.set(server.key, server);
            return server.toJSON();
        } catch (err) {
            throw new RpcError(RpcErrorCode.SpawnFailed, errorMessage(err));
        }
    }

    private async pollServer(params: Params) {
        const server = this.lookup(params);
        if (!server) {
            return {alive: false, exitCode: null};
        }
        const result = await this.spawner.poll(server);
        if (!result.alive) {
            this.servers.delete(server.key);
        }
        return result;
    }

    private async stopServer(params: Params) {
        const server = this.lookup(params);
        if (!server) {
            return {stopped: false};
        }
        try {
            await this.spawner.stop(server, numberParam(params, "gracePeriodMs") ?? this.defaults.stopGracePeriodMs);
        } catch (err) {
            throw new RpcError(RpcErrorCode.StopFailed, errorMessage(err));
        }
        this.servers.delete(server.key);
        return {stopped: true};
    }
}

export function createAgentApp(agent: SpawnAgent, authToken: string) {
    const app = express();
    app.use(requireToken(authToken));
    app.use(bodyParser.json());

    app.post("/", async (req: Request, res: Response) => {
        const request = parseRequest(req.body);
        if (!request) {
            const response: JsonRpcResponse = {jsonrpc: "2.0", id: null, error: {code: RpcErrorCode.InvalidRequest, message: "Invalid request"}};
            return res.json(response);
        }
        const {method, params = {}, id} = request;
        let response: JsonRpcResponse;
        try {
            response = {jsonrpc: "2.0", id, result: await agent.dispatch(method, params)};
        } catch (err) {
            const code = err instanceof RpcError ? err.code : err instanceof SpawnError ? RpcErrorCode.SpawnFailed : err instanceof StopError ? RpcErrorCode.StopFailed : -32603;
            logger.error(`Agent call ${method} failed: ${errorMessage(err)}`);
            response = {jsonrpc: "2.0", id, error: {code, message: errorMessage(err)}};
        }
        return res.json(response);
    });

    // Malformed JSON and rejected tokens
    app.use((err: {statusCode?: number; type?: string; message?: string}, _req: Request, res: Response, _next: NextFunction) => {
        if (err.type === "entity.parse.failed") {
            const response: JsonRpcResponse = {jsonrpc: "2.0", id: null, error: {code: RpcErrorCode.ParseError, message: "Parse error"}};
            return res.json(response);
        }
        res.status(err.statusCode ?? 500).json({status: "error", message: err.message});
    });
    return app;
}
