import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import jwt from "jsonwebtoken";
import {describe, expect, it} from "vitest";
import {readTokenKeys, tokenAgeMs, TokenIssuer, TokenType} from "../src/auth/tokens";
import {hashToken, newApiToken, normalizeUsername, tokenModel} from "../src/users/userStore";

const keys = {signingKey: "test-secret", verifyKey: "test-secret"};
const conf = {keyAlgorithm: "HS256" as const, issuer: "spawnhub", accessTokenAge: "15m", refreshTokenAge: "1w"};

describe("TokenIssuer", () => {
    it("issues access tokens that verify", () => {
        const issuer = new TokenIssuer(conf, keys);
        const token = issuer.generateToken("alice", TokenType.Access);
        expect(TokenIssuer.looksLikeJwt(token)).toBe(true);
        expect(issuer.verify(token)).toEqual({username: "alice", iss: "spawnhub", refresh: false});
        expect(issuer.accessTokenAgeSeconds).toBe(900);
        expect(issuer.refreshTokenAgeMs).toBe(604_800_000);
    });

    it("marks refresh tokens", () => {
        const issuer = new TokenIssuer(conf, keys);
        expect(issuer.verify(issuer.generateToken("alice", TokenType.Refresh))?.refresh).toBe(true);
    });

    it("rejects tokens from other issuers, keys or algorithms", () => {
        const issuer = new TokenIssuer(conf, keys);
        const foreign = new TokenIssuer({...conf, issuer: "elsewhere"}, keys).generateToken("alice", TokenType.Access);
        const otherKey = new TokenIssuer(conf, {signingKey: "other-secret", verifyKey: "other-secret"}).generateToken("alice", TokenType.Access);
        const otherAlgorithm = jwt.sign({username: "alice", iss: "spawnhub"}, "test-secret", {algorithm: "HS512"});
        expect(issuer.verify(foreign)).toBeUndefined();
        expect(issuer.verify(otherKey)).toBeUndefined();
        expect(issuer.verify(otherAlgorithm)).toBeUndefined();
        expect(issuer.verify("not.a.token")).toBeUndefined();
    });

    it("rejects expired tokens", () => {
        const issuer = new TokenIssuer(conf, keys);
        const expired = jwt.sign({username: "alice", iss: "spawnhub", exp: Math.floor(Date.now() / 1000) - 60}, "test-secret", {algorithm: "HS256"});
        expect(issuer.verify(expired)).toBeUndefined();
    });

    it("parses token ages", () => {
        expect(tokenAgeMs("15m")).toBe(900_000);
        expect(tokenAgeMs("1d")).toBe(86_400_000);
        expect(() => tokenAgeMs("soon")).toThrow('Invalid token age "soon"');
    });
});

describe("readTokenKeys", () => {
    const base = {keyAlgorithm: "HS256" as const, issuer: "spawnhub", accessTokenAge: "15m", refreshTokenAge: "1w"};

    it("reads a shared secret", () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "spawnhub-keys-"));
        const secretLocation = path.join(dir, "secret");
        fs.writeFileSync(secretLocation, "test-secret\n");
        expect(readTokenKeys({...base, secretLocation})).toEqual({signingKey: "test-secret", verifyKey: "test-secret"});

        fs.writeFileSync(secretLocation, "  \n");
        expect(() => readTokenKeys({...base, secretLocation})).toThrow(`Token secret at ${secretLocation} is empty`);
        fs.rmSync(dir, {recursive: true, force: true});
    });

    it("needs a secret or a key pair", () => {
        expect(() => readTokenKeys(base)).toThrow("Token configuration needs either secretLocation or a private/public key pair");
    });
});

describe("API tokens", () => {
    it("stores only the hash of the secret", () => {
        const {secret, token} = newApiToken("alice", {note: "ci", expiresInMs: 60_000});
        expect(secret).toMatch(/^[0-9a-f]{48}$/);
        expect(token.hash).toBe(hashToken(secret));
        expect(token.hash).not.toContain(secret);
        expect(token.expiresAt?.getTime()).toBe(token.createdAt.getTime() + 60_000);
        expect(TokenIssuer.looksLikeJwt(secret)).toBe(false);

        const model = tokenModel(token);
        expect(model).not.toHaveProperty("hash");
        expect(model).toMatchObject({id: token.id, userName: "alice", note: "ci"});
    });

    it("creates tokens without expiry by default", () => {
        expect(newApiToken("alice").token.expiresAt).toBeUndefined();
    });

    it("hashes with SHA-256", () => {
        expect(hashToken("test-secret")).toHaveLength(64);
        expect(hashToken("test-secret")).toBe(hashToken("test-secret"));
    });
});

describe("normalizeUsername", () => {
    it("trims and lower-cases", () => {
        expect(normalizeUsername("  Alice ")).toBe("alice");
    });
});
