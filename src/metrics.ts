import io from "@pm2/io";
import type {Orchestrator} from "./orchestrator/orchestrator";

// PM2 metrics for the running servers and server failures
export function registerMetrics(orchestrator: Orchestrator) {
    const runningServers = io.metric({
        name: "Running Servers",
        id: "app/realtime/servers"
    });
    const serverFailures = io.counter({
        name: "Server Failures",
        id: "app/servers/failures"
    });
    const degraded = io.metric({
        name: "Proxy Degraded",
        id: "app/realtime/degraded"
    });

    const refresh = () => runningServers.set(orchestrator.listServers().length);
    orchestrator.on("started", refresh);
    orchestrator.on("stopped", refresh);
    orchestrator.on("failed", () => {
        serverFailures.inc();
        refresh();
    });
    orchestrator.on("degraded", isDegraded => degraded.set(isDegraded ? 1 : 0));
    refresh();
}
