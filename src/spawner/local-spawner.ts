// local-spawner.ts
import {type ChildProcess, spawn, spawnSync} from "node:child_process";
import * as fs from "node:fs";
import type {WriteStream} from "node:fs";
import * as net from "node:net";
import {LinkedList} from "mnemonist";
import moment from "moment-timezone";
import * as tcpPortUsed from "tcp-port-used";
import {SpawnError, StopError} from "../errors";
import {KeyedMutex} from "../orchestrator/keyedMutex";
import type {LocalSpawnerConfig} from "../types";
import {delay, errorMessage, logger} from "../util";
import {ServerProcess, ServerState} from "./serverProcess";
import type {LogResult, PollResult, Spawner, StartOptions} from "./spawner";

type ProcessInfo = {child: ChildProcess; port: number; logStream?: WriteStream};

const LOG_LIMIT = 1000;
const HOST = "127.0.0.1";

export function fillTemplate(template: string, values: Record<string, string | number>) {
    return template.replace(/{(\w+)}/g, (match, key: string) => (key in values ? String(values[key]) : match));
}

export function tailLog(list: LinkedList<string> | undefined, tail?: number): LogResult {
    if (!list?.size) return {success: false};
    if (!tail || tail >= list.size) return {success: true, log: list.toArray().join("")};
    const out: string[] = [];
    let skip = list.size - tail;
    for (const line of list) {
        if (skip-- > 0) continue;
        out.push(line);
    }
    return {success: true, log: out.join("")};
}

/**
 * Runs each server as a child process on a port from the configured range,
 * optionally as the target user through sudo.
 */
export class LocalSpawner implements Spawner {
    readonly kind = "local";
    private processMap = new Map<string, ProcessInfo>();
    private logMap = new Map<string, LinkedList<string>>();
    private live = new Map<string, ServerProcess>();
    private reservedPorts = new Set<number>();
    private locks = new KeyedMutex();

    constructor(
        private cfg: LocalSpawnerConfig & {
            startTimeoutMs: number;
        }
    ) {}

    async start(userName: string, serverName: string, opts: StartOptions = {}): Promise<ServerProcess> {
        const server = new ServerProcess(userName, serverName);
        return this.locks.run(server.key, async () => {
            const existing = this.live.get(server.key);
            if (existing?.state === ServerState.Running) {
                return existing;
            }
            if (existing) {
                // Left over from a backend that failed without being stopped
                const stale = this.processMap.get(existing.id);
                if (stale) {
                    await this.terminate(stale.child, "SIGKILL", 2000);
                }
                this.release(existing);
            }
            server.transition(ServerState.Starting);
            try {
                await this.startUnsafe(server, opts);
            } catch (err) {
                server.fail(errorMessage(err));
                throw err;
            }
            server.transition(ServerState.Running);
            this.live.set(server.key, server);
            return server;
        });
    }

    async poll(server: ServerProcess): Promise<PollResult> {
        const info = this.processMap.get(server.id);
        if (!info) {
            return {alive: false, exitCode: server.exitCode ?? null};
        }
        const {child} = info;
        if (child.exitCode !== null || child.signalCode !== null) {
            return {alive: false, exitCode: child.exitCode};
        }
        return {alive: true};
    }

    async stop(server: ServerProcess, gracePeriodMs: number) {
        await this.locks.run(server.key, async () => {
            const info = this.processMap.get(server.id);
            if (!info) {
                this.release(server);
                return;
            }
            const {child} = info;
            if (!(await this.terminate(child, "SIGTERM", gracePeriodMs))) {
                logger.warning(`Backend ${child.pid} for ${server.key} ignored SIGTERM, forcing termination`);
                if (this.cfg.killCommand && child.pid) {
                    const result = this.cfg.useSudo
                        ? spawnSync("sudo", ["-n", "-u", server.userName, this.cfg.killCommand, String(child.pid)])
                        : spawnSync(this.cfg.killCommand, [String(child.pid)]);
                    if (result.status) {
                        logger.error(`Kill command for ${child.pid} exited with ${result.status}`);
                    }
                }
                if (!(await this.terminate(child, "SIGKILL", 2000))) {
                    throw new StopError(`Backend ${child.pid} for ${server.key} could not be terminated`, server.key);
                }
            }
            server.exitCode = child.exitCode;
            this.release(server);
        });
    }

    async logs(server: ServerProcess, tail?: number) {
        return tailLog(this.logMap.get(server.id), tail);
    }

    // internals
    private async startUnsafe(server: ServerProcess, opts: StartOptions) {
        const port = await this.reservePort(this.cfg.backendPorts.min, this.cfg.backendPorts.max);
        if (port < 0) {
            throw new SpawnError(`No free backend port for ${server.key}`, server.key);
        }

        const values = {port, username: server.userName, servername: server.serverName, baseurl: opts.environment?.HUB_SERVICE_PREFIX ?? "/"};
        const command = fillTemplate(this.cfg.processCommand, values);
        const args = this.cfg.additionalArgs.map(arg => fillTemplate(arg, values));
        const env = {...process.env, ...opts.environment, HUB_SERVER_PORT: String(port)};

        let child: ChildProcess;
        if (this.cfg.useSudo) {
            const sudoArgs = ["-n", "-u", server.userName];
            if (this.cfg.preserveEnv) {
                sudoArgs.push(`--preserve-env=${Object.keys(opts.environment ?? {}).concat("HUB_SERVER_PORT").join(",")}`);
            }
            child = spawn("sudo", [...sudoArgs, command, ...args], {env});
        } else {
            child = spawn(command, args, {env});
        }
        // spawn reports failures such as ENOENT asynchronously
        child.on("error", err => logger.error(`Backend for ${server.key} failed: ${err.message}`));
        if (child.pid == null) {
            this.reservedPorts.delete(port);
            throw new SpawnError(`Could not launch ${command} for ${server.key}`, server.key);
        }

        const info: ProcessInfo = {child, port};
        this.processMap.set(server.id, info);
        this.wireLogs(server, info);
        server.url = `http://${HOST}:${port}`;
        server.handle = {pid: child.pid, port};

        child.once("exit", (code, signal) => {
            logger.info(`Local backend ${child.pid} for ${server.key} exited (code=${code}, signal=${signal})`);
            server.exitCode = code;
            info.logStream?.end();
            this.reservedPorts.delete(port);
        });

        const ready = await this.waitForAccept(child, port, opts.signal);
        if (!ready) {
            await this.terminate(child, "SIGKILL", 2000);
            this.release(server);
            const reason = opts.signal?.aborted ? "startup was cancelled" : child.exitCode !== null ? `backend exited with code ${child.exitCode}` : "backend did not start listening in time";
            throw new SpawnError(`Server ${server.key} failed to start: ${reason}`, server.key);
        }
        logger.info(`Started backend ${child.pid} for ${server.key} on port ${port}`);
    }

    private release(server: ServerProcess) {
        const info = this.processMap.get(server.id);
        if (info) {
            info.child.removeAllListeners();
            info.logStream?.end();
            this.reservedPorts.delete(info.port);
        }
        this.processMap.delete(server.id);
        this.logMap.delete(server.id);
        if (this.live.get(server.key) === server) {
            this.live.delete(server.key);
        }
    }

    private terminate(child: ChildProcess, signal: NodeJS.Signals, waitMs: number) {
        if (child.exitCode !== null || child.signalCode !== null) {
            return Promise.resolve(true);
        }
        return new Promise<boolean>(resolve => {
            const timer = setTimeout(() => resolve(false), waitMs);
            child.once("exit", () => {
                clearTimeout(timer);
                resolve(true);
            });
            try {
                child.kill(signal);
            } catch (err) {
                logger.debug(err);
            }
        });
    }

    private appendLog(id: string, s: string) {
        let list = this.logMap.get(id);
        if (!list) {
            list = new LinkedList<string>();
            this.logMap.set(id, list);
        }
        while (list.size >= LOG_LIMIT) list.shift();
        list.push(s);
    }

    private wireLogs(server: ServerProcess, info: ProcessInfo) {
        const {child} = info;
        child.stdout?.on("data", d => this.appendLog(server.id, String(d)));
        child.stderr?.on("data", d => this.appendLog(server.id, String(d)));
        if (this.cfg.backendLogFileTemplate) {
            const loc = fillTemplate(this.cfg.backendLogFileTemplate, {
                username: server.userName,
                servername: server.serverName || "default",
                pid: child.pid ?? 0,
                datetime: moment().format("YYYYMMDD.h_mm_ss")
            });
            try {
                info.logStream = fs.createWriteStream(loc, {flags: "a"});
                info.logStream.on("error", err => logger.error(`Could not write log file at ${loc}: ${err.message}`));
                child.stdout?.pipe(info.logStream);
                child.stderr?.pipe(info.logStream);
                return;
            } catch (err) {
                logger.debug(err);
                logger.error(`Could not write log file at ${loc}; falling back to console`);
            }
        }
        child.stdout?.on("data", d => logger.debug(`[${server.key}] ${String(d).trimEnd()}`));
        child.stderr?.on("data", d => logger.debug(`[${server.key}] ${String(d).trimEnd()}`));
    }

    private async reservePort(min: number, max: number) {
        for (let p = min; p <= max; p++) {
            if (this.reservedPorts.has(p)) continue;
            const free = await new Promise<boolean>(res => {
                const s = net
                    .createServer()
                    .once("error", () => res(false))
                    .once("listening", () => s.close(() => res(true)))
                    .listen(p, HOST);
            });
            if (free) {
                this.reservedPorts.add(p);
                return p;
            }
        }
        return -1;
    }

    private async waitForAccept(child: ChildProcess, port: number, signal?: AbortSignal) {
        const deadline = Date.now() + this.cfg.startTimeoutMs;
        while (Date.now() < deadline && !signal?.aborted) {
            if (child.exitCode !== null || child.signalCode !== null) {
                return false;
            }
            try {
                if (await tcpPortUsed.check(port, HOST)) return true;
            } catch (err) {
                logger.debug(err);
            }
            await delay(100);
        }
        return false;
    }
}
