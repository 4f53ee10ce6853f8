import {v4 as uuidv4} from "uuid";

export enum ServerState {
    Unknown = "unknown",
    Starting = "starting",
    Running = "running",
    Stopping = "stopping",
    Stopped = "stopped",
    Failed = "failed"
}

const transitions: Record<ServerState, ServerState[]> = {
    [ServerState.Unknown]: [ServerState.Starting, ServerState.Running, ServerState.Failed],
    [ServerState.Starting]: [ServerState.Running, ServerState.Stopping, ServerState.Failed],
    [ServerState.Running]: [ServerState.Stopping, ServerState.Failed],
    [ServerState.Stopping]: [ServerState.Stopped, ServerState.Failed],
    [ServerState.Stopped]: [],
    [ServerState.Failed]: []
};

export function serverKey(userName: string, serverName: string) {
    return `${userName}/${serverName}`;
}

// Opaque per-spawner data, e.g. a child process or a deployment name
export type ProcessHandle = Record<string, unknown>;

export interface ServerView {
    id: string;
    user: string;
    name: string;
    state: ServerState;
    url?: string;
    started?: string;
    lastActivity?: string;
    exitCode?: number | null;
    error?: string;
}

/**
 * One instance of a per-user backend. Stopped and Failed are terminal: a new start
 * always creates a new ServerProcess.
 */
export class ServerProcess {
    readonly id = uuidv4();
    private _state = ServerState.Unknown;
    url?: string;
    handle?: ProcessHandle;
    startedAt?: Date;
    lastActivity?: Date;
    exitCode?: number | null;
    error?: string;

    constructor(
        readonly userName: string,
        readonly serverName: string
    ) {}

    get key() {
        return serverKey(this.userName, this.serverName);
    }

    get state() {
        return this._state;
    }

    get terminal() {
        return this._state === ServerState.Stopped || this._state === ServerState.Failed;
    }

    canTransition(next: ServerState) {
        return transitions[this._state].includes(next);
    }

    transition(next: ServerState) {
        if (!this.canTransition(next)) {
            throw new Error(`Invalid transition for ${this.key}: ${this._state} -> ${next}`);
        }
        this._state = next;
        if (next === ServerState.Running) {
            this.startedAt ??= new Date();
            this.lastActivity ??= this.startedAt;
        }
    }

    fail(reason: string) {
        if (this._state !== ServerState.Failed) {
            this.error = reason;
            this._state = ServerState.Failed;
        }
    }

    touch(when = new Date()) {
        if (!this.lastActivity || when > this.lastActivity) {
            this.lastActivity = when;
        }
    }

    toJSON(): ServerView {
        return {
            id: this.id,
            user: this.userName,
            name: this.serverName,
            state: this._state,
            url: this.url,
            started: this.startedAt?.toISOString(),
            lastActivity: this.lastActivity?.toISOString(),
            exitCode: this.exitCode,
            error: this.error
        };
    }
}
