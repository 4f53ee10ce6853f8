// Errors raised by the hub core. The express error handler reads statusCode and status.

export class HubError extends Error {
    readonly statusCode: number = 500;
    readonly status: string = "error";

    constructor(message: string, options?: {cause?: unknown}) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Bad credentials. No state is changed.
export class AuthFailure extends HubError {
    readonly statusCode = 403;
}

export class SpawnError extends HubError {
    constructor(
        message: string,
        readonly key?: string,
        options?: {cause?: unknown}
    ) {
        super(message, options);
    }
}

export class StopError extends HubError {
    constructor(
        message: string,
        readonly key?: string,
        options?: {cause?: unknown}
    ) {
        super(message, options);
    }
}

// The proxy admin API could not be reached after all retries
export class ProxyUnreachable extends HubError {
    readonly statusCode = 503;
    readonly status = "unavailable";
}

// Mismatch between proxy routes and tracked servers. Repaired and logged, never thrown to callers
export class ReconciliationConflict extends HubError {
    constructor(
        message: string,
        readonly prefix: string,
        readonly repair: "added" | "removed" | "replaced"
    ) {
        super(message);
    }
}

export class NotFound extends HubError {
    readonly statusCode = 404;
    readonly status = "not found";
}

export class BadRequest extends HubError {
    readonly statusCode = 400;
    readonly status = "bad request";
}
