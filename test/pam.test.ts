import {describe, expect, it} from "vitest";
import {AuthFailure} from "../src/errors";
import {PamAuthenticator, type PamModule} from "../src/auth/pam";

function fakePam(calls: {username: string; password: string; serviceName?: string}[]): PamModule {
    return {
        pamAuthenticate(options, callback) {
            calls.push(options);
            callback("Authentication failure", 7);
        }
    };
}

describe("PamAuthenticator", () => {
    it("authenticates against the configured service", async () => {
        const calls: {username: string; password: string; serviceName?: string}[] = [];
        const auth = new PamAuthenticator("spawnhub", fakePam(calls));

        const result = await auth.authenticate({username: "alice", password: "test-password"});

        expect(calls).toEqual([{username: "alice", password: "test-password", serviceName: "spawnhub"}]);
        expect(result.success).toBe(false);
        expect(result.success ? undefined : result.failure).toBeInstanceOf(AuthFailure);
    });

    it("rejects a login without a password before calling PAM", async () => {
        const calls: {username: string; password: string; serviceName?: string}[] = [];
        const auth = new PamAuthenticator(undefined, fakePam(calls));

        const result = await auth.authenticate({username: "alice", password: ""});

        expect(calls).toEqual([]);
        expect(result.success ? undefined : result.failure.message).toBe("Malformed login request");
    });
});
