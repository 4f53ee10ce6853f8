// k8s-spawner.ts
import {createHash} from "node:crypto";
import {AppsV1Api, CoreV1Api, HttpError, KubeConfig, type V1Deployment, type V1Pod, type V1Service} from "@kubernetes/client-node";
import slugify from "slugify";
import {SpawnError, StopError} from "../errors";
import {KeyedMutex} from "../orchestrator/keyedMutex";
import type {K8sSpawnerConfig} from "../types";
import {delay, errorMessage, logger} from "../util";
import {ServerProcess, ServerState, serverKey} from "./serverProcess";
import type {LogResult, PollResult, Spawner, StartOptions} from "./spawner";

const APP_LABEL = "spawnhub-server";
const USER_ANNOTATION = "spawnhub/user";
const SERVER_ANNOTATION = "spawnhub/server";
const CONTAINER_NAME = "backend";

const HASH_LENGTH = 8;

/**
 * Resource names are DNS labels of at most 63 characters. The readable part is
 * lossy, so a hash of the exact user/server key keeps different servers apart.
 */
export function workloadName(userName: string, serverName: string) {
    const hash = createHash("sha256").update(serverKey(userName, serverName), "utf8").digest("hex").slice(0, HASH_LENGTH);
    const readable = slugify(serverName ? `${userName} ${serverName}` : userName, {lower: true, strict: true});
    const safe = readable.slice(0, 63 - "hub-".length - HASH_LENGTH - 1).replace(/-+$/, "");
    return safe ? `hub-${safe}-${hash}` : `hub-${hash}`;
}

export function buildDeployment(cfg: K8sSpawnerConfig, name: string, userName: string, serverName: string, environment: Record<string, string> = {}): V1Deployment {
    const labels = {app: APP_LABEL, instance: name};
    return {
        apiVersion: "apps/v1",
        kind: "Deployment",
        metadata: {
            name,
            namespace: cfg.namespace,
            labels,
            annotations: {[USER_ANNOTATION]: userName, [SERVER_ANNOTATION]: serverName}
        },
        spec: {
            replicas: 1,
            strategy: {type: "Recreate"},
            selector: {matchLabels: labels},
            template: {
                metadata: {labels},
                spec: {
                    containers: [
                        {
                            name: CONTAINER_NAME,
                            image: cfg.image,
                            imagePullPolicy: "IfNotPresent",
                            ports: [{name: "http", containerPort: cfg.containerPort}],
                            readinessProbe: {tcpSocket: {port: cfg.containerPort}, periodSeconds: 2, failureThreshold: 3},
                            env: Object.entries(environment).map(([envName, value]) => ({name: envName, value})),
                            args: cfg.args
                        }
                    ]
                }
            }
        }
    };
}

export function buildService(cfg: K8sSpawnerConfig, name: string): V1Service {
    return {
        apiVersion: "v1",
        kind: "Service",
        metadata: {name, namespace: cfg.namespace, labels: {app: APP_LABEL, instance: name}},
        spec: {
            type: "ClusterIP",
            selector: {app: APP_LABEL, instance: name},
            ports: [{name: "http", port: cfg.containerPort, targetPort: cfg.containerPort}]
        }
    };
}

function isNotFound(err: unknown) {
    return err instanceof HttpError && err.statusCode === 404;
}

function isPodReady(pod: V1Pod) {
    const conditions = pod.status?.conditions ?? [];
    return pod.status?.phase === "Running" && conditions.some(c => c.type === "Ready" && c.status === "True");
}

/**
 * One Deployment and ClusterIP Service per server, reached through the Service's
 * cluster DNS name. Deployments carry the user and server names as annotations so
 * that a restarted hub can find them again.
 */
export class K8sSpawner implements Spawner {
    readonly kind = "k8s";
    private core: CoreV1Api;
    private apps: AppsV1Api;
    private locks = new KeyedMutex();

    constructor(
        private cfg: K8sSpawnerConfig & {startTimeoutMs: number},
        clients?: {core: CoreV1Api; apps: AppsV1Api}
    ) {
        if (clients) {
            this.core = clients.core;
            this.apps = clients.apps;
        } else {
            const kc = new KubeConfig();
            if (cfg.kubeconfigPath) {
                kc.loadFromFile(cfg.kubeconfigPath);
            } else {
                kc.loadFromDefault();
            }
            this.core = kc.makeApiClient(CoreV1Api);
            this.apps = kc.makeApiClient(AppsV1Api);
        }
    }

    serviceUrl(name: string) {
        return `http://${name}.${this.cfg.namespace}.svc.cluster.local:${this.cfg.containerPort}`;
    }

    async start(userName: string, serverName: string, opts: StartOptions = {}): Promise<ServerProcess> {
        const server = new ServerProcess(userName, serverName);
        return this.locks.run(server.key, async () => {
            const name = workloadName(userName, serverName);
            server.transition(ServerState.Starting);
            server.handle = {deployment: name};
            try {
                await this.applyDeployment(buildDeployment(this.cfg, name, userName, serverName, opts.environment));
                await this.applyService(buildService(this.cfg, name));
                const podName = await this.waitForReadyPod(name, opts.signal);
                if (!podName) {
                    await this.deleteWorkload(name, 0);
                    throw new SpawnError(`Server ${server.key} failed to start: ${opts.signal?.aborted ? "startup was cancelled" : "no ready pod in time"}`, server.key);
                }
                server.handle = {deployment: name, pod: podName};
            } catch (err) {
                server.fail(errorMessage(err));
                if (err instanceof SpawnError) {
                    throw err;
                }
                throw new SpawnError(`Server ${server.key} failed to start: ${errorMessage(err)}`, server.key, {cause: err});
            }
            server.url = this.serviceUrl(name);
            server.transition(ServerState.Running);
            logger.info(`Started deployment ${name} for ${server.key}`);
            return server;
        });
    }

    async poll(server: ServerProcess): Promise<PollResult> {
        const name = workloadName(server.userName, server.serverName);
        try {
            const pods = await this.listPods(name);
            if (pods.some(isPodReady)) {
                return {alive: true};
            }
            const terminated = pods.flatMap(pod => pod.status?.containerStatuses ?? []).find(status => status.state?.terminated);
            if (!terminated && pods.length) {
                // Pod being rescheduled or restarted
                return {alive: true};
            }
            return {alive: false, exitCode: terminated?.state?.terminated?.exitCode ?? null};
        } catch (err) {
            logger.debug(err);
            return {alive: false, exitCode: null};
        }
    }

    async stop(server: ServerProcess, gracePeriodMs: number) {
        const name = workloadName(server.userName, server.serverName);
        await this.locks.run(server.key, async () => {
            const graceSeconds = Math.ceil(gracePeriodMs / 1000);
            await this.deleteWorkload(name, graceSeconds);
            if (await this.waitForPodsGone(name, gracePeriodMs)) {
                return;
            }
            logger.warning(`Pods of ${name} still present after ${graceSeconds}s, forcing deletion`);
            for (const pod of await this.listPods(name)) {
                const podName = pod.metadata?.name;
                if (podName) {
                    await this.core.deleteNamespacedPod(podName, this.cfg.namespace, undefined, undefined, 0).catch(err => {
                        if (!isNotFound(err)) throw err;
                    });
                }
            }
            if (!(await this.waitForPodsGone(name, 5000))) {
                throw new StopError(`Pods of ${name} could not be deleted`, server.key);
            }
        });
    }

    async logs(server: ServerProcess, tail?: number): Promise<LogResult> {
        const pod = server.handle?.pod;
        if (typeof pod !== "string") {
            return {success: false};
        }
        try {
            const res = await this.core.readNamespacedPodLog(pod, this.cfg.namespace, CONTAINER_NAME, false, undefined, undefined, undefined, false, undefined, tail);
            return {success: true, log: res.body};
        } catch (err) {
            logger.debug(err);
            return {success: false};
        }
    }

    async enumerate() {
        const res = await this.apps.listNamespacedDeployment(this.cfg.namespace, undefined, undefined, undefined, undefined, `app=${APP_LABEL}`);
        const found: ServerProcess[] = [];
        for (const deployment of res.body.items) {
            const annotations = deployment.metadata?.annotations ?? {};
            const name = deployment.metadata?.name;
            const userName = annotations[USER_ANNOTATION];
            const serverName = annotations[SERVER_ANNOTATION] ?? "";
            if (!name || !userName || !deployment.status?.readyReplicas) {
                continue;
            }
            const server = new ServerProcess(userName, serverName);
            server.url = this.serviceUrl(name);
            server.handle = {deployment: name};
            server.transition(ServerState.Running);
            found.push(server);
        }
        return found;
    }

    // ---------- K8s ops (idempotent) ----------

    private async applyDeployment(dep: V1Deployment) {
        const name = dep.metadata?.name ?? "";
        try {
            await this.apps.readNamespacedDeployment(name, this.cfg.namespace);
            await this.apps.replaceNamespacedDeployment(name, this.cfg.namespace, dep);
        } catch (err) {
            if (!isNotFound(err)) throw err;
            await this.apps.createNamespacedDeployment(this.cfg.namespace, dep);
        }
    }

    private async applyService(svc: V1Service) {
        const name = svc.metadata?.name ?? "";
        try {
            await this.core.readNamespacedService(name, this.cfg.namespace);
        } catch (err) {
            if (!isNotFound(err)) throw err;
            await this.core.createNamespacedService(this.cfg.namespace, svc);
        }
    }

    private async deleteWorkload(name: string, gracePeriodSeconds: number) {
        const ignoreMissing = (err: unknown) => {
            if (!isNotFound(err)) throw err;
        };
        await this.apps.deleteNamespacedDeployment(name, this.cfg.namespace, undefined, undefined, gracePeriodSeconds).catch(ignoreMissing);
        await this.core.deleteNamespacedService(name, this.cfg.namespace).catch(ignoreMissing);
    }

    private async listPods(name: string) {
        const pods = await this.core.listNamespacedPod(this.cfg.namespace, undefined, undefined, undefined, undefined, `app=${APP_LABEL},instance=${name}`);
        return pods.body.items;
    }

    private async waitForReadyPod(name: string, signal?: AbortSignal): Promise<string | undefined> {
        const deadline = Date.now() + this.cfg.startTimeoutMs;
        while (Date.now() < deadline && !signal?.aborted) {
            for (const pod of await this.listPods(name)) {
                if (isPodReady(pod)) return pod.metadata?.name;
            }
            await delay(500);
        }
        return undefined;
    }

    private async waitForPodsGone(name: string, timeoutMs: number) {
        const deadline = Date.now() + timeoutMs;
        do {
            if (!(await this.listPods(name)).length) {
                return true;
            }
            await delay(500);
        } while (Date.now() < deadline);
        return false;
    }
}
