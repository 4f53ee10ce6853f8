import type {Request} from "express";
import type {Algorithm} from "jsonwebtoken";
import type LdapAuth from "ldapauth-fork";
import type {TokenIssuer} from "./auth/tokens";
import type {Orchestrator} from "./orchestrator/orchestrator";
import type {UserStore} from "./users/userStore";

export type LogLevel = "none" | "emerg" | "alert" | "crit" | "error" | "warning" | "notice" | "info" | "debug";

export interface HubTokenConfig {
    // Either a shared secret (HS* algorithms) or a key pair (RS*/ES* algorithms)
    secretLocation?: string;
    publicKeyLocation?: string;
    privateKeyLocation?: string;
    keyAlgorithm: Algorithm;
    issuer: string;
    refreshTokenAge: string;
    accessTokenAge: string;
}

export interface HubAuthenticatorConfig {
    kind: "dummy" | "pam" | "ldap";
    dummy?: {
        // Shared password accepted for every user. Any password is accepted if omitted
        password?: string;
    };
    pam?: {
        // PAM service to authenticate against, node-linux-pam picks "login" if omitted
        serviceName?: string;
    };
    ldap?: {
        // Options to pass through to the LDAP Auth instance
        ldapOptions: LdapAuth.Options;
    };
    // User lookup table as text file in format <authenticated username> <system user>
    userLookupTable?: string;
    // If non-empty, only these users may log in
    allowedUsers: string[];
    // Users granted the admin flag on login
    adminUsers: string[];
}

export interface LocalSpawnerConfig {
    // Range of ports to use for backend processes. Effectively limits the number of simultaneous servers
    backendPorts: {
        min: number;
        max: number;
    };
    // Command to execute when starting the backend process. {port}, {username}, {servername} and {baseurl} are substituted
    processCommand: string;
    additionalArgs: string[];
    // Run the backend as the target user through sudo
    useSudo: boolean;
    // Use the --preserve-env argument when calling sudo
    preserveEnv: boolean;
    // {username}, {servername}, {pid} and {datetime} are substituted
    backendLogFileTemplate?: string;
    // Command used to force-kill a backend that ignores SIGTERM. Receives the pid as its last argument
    killCommand?: string;
}

export interface K8sSpawnerConfig {
    kubeconfigPath?: string;
    namespace: string;
    image: string;
    containerPort: number;
    // Extra arguments for the container
    args: string[];
}

export interface RemoteSpawnerConfig {
    agentUrl: string;
    authToken: string;
}

export interface HubSpawnerConfig {
    kind: "local" | "k8s" | "remote";
    // Seconds a backend may take to become reachable
    startTimeout: number;
    // Seconds between SIGTERM (or equivalent) and forced termination
    stopGracePeriod: number;
    // Seconds between liveness polls of running servers. 0 disables polling
    pollInterval: number;
    local?: LocalSpawnerConfig;
    k8s?: K8sSpawnerConfig;
    remote?: RemoteSpawnerConfig;
}

export interface HubProxyConfig {
    // Base URL of the proxy's admin API
    apiUrl: string;
    authToken: string;
    retry: {
        attempts: number;
        startWait: number;
        maxWait: number;
    };
    // Run the routing proxy inside the hub process
    embedded?: {
        publicPort: number;
        publicInterface?: string;
        apiPort: number;
    };
}

export interface HubServerConfig {
    // Port to listen on. The hub normally sits behind the proxy
    serverPort: number | string;
    // Host interface to listen on. If empty, all interfaces are used
    serverInterface: string;
    // URL at which the proxy reaches the hub. Used as the proxy's default route
    hubUrl: string;
    // Allow HTTP-only cookies. For testing or internal networks only.
    httpOnly: boolean;
    authenticator: HubAuthenticatorConfig;
    tokens: HubTokenConfig;
    // Token granting admin access to services
    adminToken?: string;
    database: {
        uri?: string;
        databaseName?: string;
    };
    spawner: HubSpawnerConfig;
    proxy: HubProxyConfig;
    cull: {
        enabled: boolean;
        // Seconds of inactivity after which a server is stopped
        timeout: number;
        // Seconds between culling passes
        every: number;
    };
    agent?: {
        port: number;
        interface?: string;
        authToken: string;
    };
    // Console logging
    logLevelConsole: LogLevel;
    logTypeConsole: string;
    // File logging
    logFile?: string;
    logLevelFile: LogLevel;
    logTypeFile: string;
    timezone?: string;
}

export interface HubCommandLineOptions {
    [x: string]: unknown;
    config: string;
    test?: string;
    agent?: boolean;
    logLevel?: LogLevel;
    logFormat?: "text" | "json";
}

export interface HubRuntimeConfig {
    apiAddress: string;
    tokenRefreshAddress: string;
    logoutAddress: string;
    authPath: string;
}

export type AuthenticatedRequest = Request & {
    username?: string;
    admin?: boolean;
    // Set when the request was authenticated with the admin service token
    service?: boolean;
};

// Commonality upon all token payloads in use
export type TokenPayload = {
    username?: string;
    iss?: string;
    refresh?: boolean;
};

// Map for looking up system user name from authenticated user name
export type UserMap = Map<string, string>;

// Everything the HTTP handlers need, built once at startup
export interface HubContext {
    config: HubServerConfig;
    runtime: HubRuntimeConfig;
    orchestrator: Orchestrator;
    store: UserStore;
    tokens: TokenIssuer;
}
