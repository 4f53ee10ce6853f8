// spawner.ts
import type {ServerProcess} from "./serverProcess";

export type StartOptions = {
    // Aborted by the orchestrator when the startup timeout expires
    signal?: AbortSignal;
    environment?: Record<string, string>;
};

export type PollResult = {alive: true} | {alive: false; exitCode: number | null};

export type LogResult = {success: boolean; log?: string};

export interface Spawner {
    readonly kind: string;
    // Resolves with a Running process whose url is reachable, or rejects with SpawnError
    start(userName: string, serverName: string, opts?: StartOptions): Promise<ServerProcess>;
    poll(process: ServerProcess): Promise<PollResult>;
    // Graceful stop, forced after gracePeriodMs. Rejects with StopError if the process survives both
    stop(process: ServerProcess, gracePeriodMs: number): Promise<void>;
    logs(process: ServerProcess, tail?: number): Promise<LogResult>;
    // Processes still recognizable after a hub restart, in state Running
    enumerate?(): Promise<ServerProcess[]>;
}
