// JSON-RPC 2.0 message shapes shared by the spawn agent and the remote spawner
import {isRecord} from "../util";
import {ServerState, type ServerView} from "./serverProcess";

export const RpcErrorCode = {
    ParseError: -32700,
    InvalidRequest: -32600,
    MethodNotFound: -32601,
    InvalidParams: -32602,
    SpawnFailed: -32000,
    StopFailed: -32001
} as const;

export type RpcMethod = "start_server" | "poll_server" | "stop_server" | "list_servers" | "server_logs";

export interface JsonRpcRequest {
    jsonrpc: "2.0";
    method: string;
    params?: Record<string, unknown>;
    id: number | string | null;
}

export type JsonRpcResponse = {jsonrpc: "2.0"; id: number | string | null} & ({result: unknown} | {error: {code: number; message: string}});

export class RpcError extends Error {
    constructor(
        readonly code: number,
        message: string
    ) {
        super(message);
        this.name = "RpcError";
    }
}

export function parseRequest(body: unknown): JsonRpcRequest | undefined {
    if (!isRecord(body) || body.jsonrpc !== "2.0" || typeof body.method !== "string") {
        return undefined;
    }
    const id = typeof body.id === "number" || typeof body.id === "string" ? body.id : null;
    if (body.params !== undefined && !isRecord(body.params)) {
        return undefined;
    }
    return {jsonrpc: "2.0", method: body.method, params: body.params, id};
}

const states = new Set<string>(Object.values(ServerState));

function isServerState(value: unknown): value is ServerState {
    return typeof value === "string" && states.has(value);
}

export function parseServerView(value: unknown): ServerView {
    if (!isRecord(value) || typeof value.id !== "string" || typeof value.user !== "string" || typeof value.name !== "string" || !isServerState(value.state)) {
        throw new RpcError(RpcErrorCode.InvalidRequest, "Malformed server description from agent");
    }
    return {
        id: value.id,
        user: value.user,
        name: value.name,
        state: value.state,
        url: typeof value.url === "string" ? value.url : undefined,
        started: typeof value.started === "string" ? value.started : undefined,
        lastActivity: typeof value.lastActivity === "string" ? value.lastActivity : undefined,
        exitCode: typeof value.exitCode === "number" ? value.exitCode : null,
        error: typeof value.error === "string" ? value.error : undefined
    };
}
