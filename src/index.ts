#!/usr/bin/env node
import * as http from "node:http";
import {createApp} from "./app";
import {createAuthenticator} from "./auth";
import {IdentityResolver} from "./auth/authenticator";
import {readTokenKeys, TokenIssuer} from "./auth/tokens";
import {UserMapFile} from "./auth/userMap";
import {buildRuntimeConfig, initConsoleLogging, loadConfig, parseCommandLine} from "./config";
import {runTests} from "./hubTests";
import {registerMetrics} from "./metrics";
import {Orchestrator} from "./orchestrator/orchestrator";
import {HttpProxyClient} from "./proxy/proxyClient";
import {closeServer, listen, RoutingProxy} from "./proxy/routingProxy";
import {createSpawner} from "./spawner";
import {createAgentApp, SpawnAgent} from "./spawner/agent";
import type {HubContext, HubServerConfig} from "./types";
import {MemoryUserStore} from "./users/memoryUserStore";
import {MongoUserStore} from "./users/mongoUserStore";
import type {UserStore} from "./users/userStore";
import {errorMessage, joinUrl, logger} from "./util";

function onShutdown(handler: () => Promise<void>) {
    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) return;
        stopping = true;
        logger.info(`Received ${signal}, shutting down`);
        handler().then(
            () => process.exit(0),
            err => {
                logger.error(`Error during shutdown: ${errorMessage(err)}`);
                process.exit(1);
            }
        );
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Serves the local spawner to a hub on another host
async function runAgent(config: HubServerConfig) {
    if (!config.agent) {
        throw new Error("Missing agent section in config");
    }
    if (config.spawner.kind === "remote") {
        throw new Error("An agent cannot use the remote spawner");
    }
    const agent = new SpawnAgent(createSpawner(config.spawner), {
        startTimeoutMs: config.spawner.startTimeout * 1000,
        stopGracePeriodMs: config.spawner.stopGracePeriod * 1000
    });
    const server = http.createServer(createAgentApp(agent, config.agent.authToken));
    await listen(server, config.agent.port, config.agent.interface);
    logger.info(`Spawn agent (${agent.spawner.kind}) listening on port ${config.agent.port}`);

    onShutdown(async () => {
        await closeServer(server);
        await agent.stopAll();
    });
}

async function runHub(config: HubServerConfig) {
    let store: UserStore;
    if (config.database.uri) {
        store = new MongoUserStore({uri: config.database.uri, databaseName: config.database.databaseName ?? "spawnhub"});
    } else {
        logger.warning("No database configured, users and API tokens are kept in memory");
        store = new MemoryUserStore();
    }
    await store.init();

    const tokens = new TokenIssuer(config.tokens, readTokenKeys(config.tokens));

    let userMap: UserMapFile | undefined;
    if (config.authenticator.userLookupTable) {
        userMap = new UserMapFile(config.authenticator.userLookupTable);
        userMap.watch();
    }
    const resolver = new IdentityResolver(config.authenticator, () => userMap?.map);

    let embeddedProxy: RoutingProxy | undefined;
    if (config.proxy.embedded) {
        embeddedProxy = new RoutingProxy({authToken: config.proxy.authToken, defaultTarget: config.hubUrl});
        await embeddedProxy.listen(config.proxy.embedded.publicPort, config.proxy.embedded.apiPort, config.proxy.embedded.publicInterface);
    }
    const proxy = new HttpProxyClient({
        apiUrl: config.proxy.embedded ? `http://127.0.0.1:${config.proxy.embedded.apiPort}` : config.proxy.apiUrl,
        authToken: config.proxy.authToken,
        retry: config.proxy.retry
    });

    const orchestrator = new Orchestrator({
        spawner: createSpawner(config.spawner),
        proxy,
        store,
        authenticator: createAuthenticator(config.authenticator),
        resolver,
        startTimeoutMs: config.spawner.startTimeout * 1000,
        stopGracePeriodMs: config.spawner.stopGracePeriod * 1000,
        pollIntervalMs: config.spawner.pollInterval * 1000,
        cull: config.cull.enabled ? {timeoutMs: config.cull.timeout * 1000, everyMs: config.cull.every * 1000} : undefined,
        hubApiUrl: joinUrl(config.hubUrl, "api")
    });
    registerMetrics(orchestrator);

    try {
        await orchestrator.reconcile();
    } catch (err) {
        logger.alert(`Initial reconciliation failed, starting in degraded mode: ${errorMessage(err)}`);
    }
    orchestrator.startTimers();

    const ctx: HubContext = {config, runtime: buildRuntimeConfig(), orchestrator, store, tokens};
    const hubServer = http.createServer(createApp(ctx));

    // NodeJS Server constructor supports either a port (and optional interface) OR a path
    if (config.serverInterface && typeof config.serverPort === "number") {
        await listen(hubServer, config.serverPort, config.serverInterface);
    } else {
        await new Promise<void>((resolve, reject) => {
            hubServer.once("error", reject);
            hubServer.listen(config.serverPort, () => {
                hubServer.off("error", reject);
                resolve();
            });
        });
    }
    logger.info(`Started listening for requests on port ${config.serverPort}`);

    onShutdown(async () => {
        await closeServer(hubServer);
        await orchestrator.shutdown();
        userMap?.unwatch();
        await embeddedProxy?.close();
        await store.close();
    });
}

async function main() {
    const options = parseCommandLine(process.argv.slice(2));
    initConsoleLogging(options);
    const config = loadConfig(options);

    if (options.test) {
        const testUser = options.test;
        try {
            await runTests(config, testUser);
            logger.info(`Hub tests with user ${testUser} succeeded`);
            process.exit(0);
        } catch (err) {
            logger.error(errorMessage(err));
            logger.info(`Hub tests with user ${testUser} failed`);
            process.exit(1);
        }
    } else if (options.agent) {
        await runAgent(config);
    } else {
        await runHub(config);
    }
}

main().catch(err => {
    logger.error(errorMessage(err));
    process.exit(1);
});
