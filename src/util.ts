import {spawnSync} from "node:child_process";
import {timingSafeEqual} from "node:crypto";
import type {NextFunction, Request, Response} from "express";

import winston from "winston";

export const logger = winston.createLogger({
    // Detailed setup is completed in config.ts
    levels: winston.config.syslog.levels
});

// Delay for the specified number of milliseconds
export async function delay(delay: number) {
    return new Promise<void>(resolve => {
        setTimeout(() => resolve(), delay);
    });
}

export function noCache(_req: Request, res: Response, next: NextFunction) {
    res.header("Cache-Control", "private, no-cache, no-store, must-revalidate");
    res.header("Expires", "-1");
    res.header("Pragma", "no-cache");
    next();
}

// Guards service-to-service APIs that authenticate with "Authorization: token <secret>"
export function requireToken(authToken: string) {
    return (req: Request, _res: Response, next: NextFunction) => {
        const header = req.headers.authorization ?? "";
        const [scheme, value] = header.split(" ");
        if (scheme?.toLowerCase() === "token" && value !== undefined && sameSecret(value, authToken)) {
            next();
        } else {
            next({statusCode: 403, message: "Not authorized"});
        }
    };
}

// Constant-time comparison of two secrets
export function sameSecret(a: string, b: string) {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    return left.length === right.length && timingSafeEqual(left, right);
}

export function getUserId(username: string) {
    if (!username) {
        throw new Error("Missing argument for username");
    }

    const result = spawnSync("id", ["-u", username]);
    if (!result.status && result?.stdout) {
        const uid = Number.parseInt(result.stdout.toString());
        if (Number.isFinite(uid)) {
            return uid;
        }
    }
    throw new Error(`Can't find uid for username ${username}`);
}

export interface BackoffOptions {
    // Number of attempts, including the first one
    attempts: number;
    // Wait before the second attempt (ms)
    startWait: number;
    scaleFactor: number;
    // Upper bound on a single wait (ms)
    maxWait: number;
}

export const defaultBackoff: BackoffOptions = {
    attempts: 6,
    startWait: 200,
    scaleFactor: 2,
    maxWait: 5000
};

/**
 * Runs `task` until it resolves, waiting exponentially longer between attempts.
 * Errors for which `isRetryable` returns false are rethrown immediately; the last
 * error is rethrown once the attempts are used up.
 */
export async function exponentialBackoff<T>(
    task: (attempt: number) => Promise<T>,
    isRetryable: (err: unknown) => boolean,
    options: BackoffOptions = defaultBackoff,
    onRetry?: (err: unknown, attempt: number, wait: number) => void
): Promise<T> {
    let wait = options.startWait;
    for (let attempt = 1; ; attempt++) {
        try {
            return await task(attempt);
        } catch (err) {
            if (attempt >= options.attempts || !isRetryable(err)) {
                throw err;
            }
            onRetry?.(err, attempt, wait);
            await delay(wait);
            wait = Math.min(wait * options.scaleFactor, options.maxWait);
        }
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(err: unknown) {
    return err instanceof Error ? err.message : String(err);
}

export function joinUrl(base: string, ...parts: string[]) {
    let result = base.replace(/\/+$/, "");
    for (const part of parts) {
        const trimmed = part.replace(/^\/+|\/+$/g, "");
        if (trimmed) {
            result += `/${trimmed}`;
        }
    }
    return result;
}
