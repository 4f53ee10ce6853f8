import type {HubSpawnerConfig} from "../types";
import {K8sSpawner} from "./k8s-spawner";
import {LocalSpawner} from "./local-spawner";
import {RemoteSpawner} from "./remote-spawner";
import type {Spawner} from "./spawner";

export function createSpawner(cfg: HubSpawnerConfig): Spawner {
    const startTimeoutMs = cfg.startTimeout * 1000;
    switch (cfg.kind) {
        case "local":
            if (!cfg.local) throw new Error("Missing spawner.local section");
            return new LocalSpawner({...cfg.local, startTimeoutMs});
        case "k8s":
            if (!cfg.k8s) throw new Error("Missing spawner.k8s section");
            return new K8sSpawner({...cfg.k8s, startTimeoutMs});
        case "remote":
            if (!cfg.remote) throw new Error("Missing spawner.remote section");
            return new RemoteSpawner({...cfg.remote, startTimeoutMs});
    }
}
