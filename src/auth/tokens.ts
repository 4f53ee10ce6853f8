import * as fs from "node:fs";
import jwt, {type Algorithm} from "jsonwebtoken";
import ms from "ms";
import type {HubTokenConfig, TokenPayload} from "../types";

export enum TokenType {
    Access,
    Refresh
}

export interface TokenKeys {
    signingKey: string | Buffer;
    verifyKey: string | Buffer;
}

export function readTokenKeys(conf: HubTokenConfig): TokenKeys {
    if (conf.secretLocation) {
        const secret = fs.readFileSync(conf.secretLocation, "utf-8").trim();
        if (!secret) {
            throw new Error(`Token secret at ${conf.secretLocation} is empty`);
        }
        return {signingKey: secret, verifyKey: secret};
    }
    if (conf.privateKeyLocation && conf.publicKeyLocation) {
        return {signingKey: fs.readFileSync(conf.privateKeyLocation), verifyKey: fs.readFileSync(conf.publicKeyLocation)};
    }
    throw new Error("Token configuration needs either secretLocation or a private/public key pair");
}

// Converts an "ms" style age ("15m", "1d") into milliseconds
export function tokenAgeMs(age: string) {
    const value = ms(age);
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`Invalid token age "${age}"`);
    }
    return value;
}

/**
 * Signs and verifies the hub's own JWTs. Refresh tokens carry refresh=true and are
 * only accepted by the refresh endpoint.
 */
export class TokenIssuer {
    private algorithm: Algorithm;

    constructor(
        private conf: Pick<HubTokenConfig, "keyAlgorithm" | "issuer" | "accessTokenAge" | "refreshTokenAge">,
        private keys: TokenKeys
    ) {
        this.algorithm = conf.keyAlgorithm;
    }

    get issuer() {
        return this.conf.issuer;
    }

    get accessTokenAgeSeconds() {
        return tokenAgeMs(this.conf.accessTokenAge) / 1000;
    }

    get refreshTokenAgeMs() {
        return tokenAgeMs(this.conf.refreshTokenAge);
    }

    generateToken(username: string, tokenType: TokenType) {
        const payload: TokenPayload = {
            iss: this.conf.issuer,
            username
        };

        const options: jwt.SignOptions = {
            algorithm: this.algorithm,
            expiresIn: tokenAgeMs(this.conf.accessTokenAge) / 1000
        };

        if (tokenType === TokenType.Refresh) {
            payload.refresh = true;
            options.expiresIn = tokenAgeMs(this.conf.refreshTokenAge) / 1000;
        }

        return jwt.sign(payload, this.keys.signingKey, options);
    }

    // Returns the payload of a valid token issued by this hub, or undefined
    verify(token: string): TokenPayload | undefined {
        try {
            const payload = jwt.verify(token, this.keys.verifyKey, {algorithms: [this.algorithm], issuer: this.conf.issuer});
            if (typeof payload === "string") {
                return undefined;
            }
            return {
                username: typeof payload.username === "string" ? payload.username : undefined,
                iss: payload.iss,
                refresh: payload.refresh === true
            };
        } catch {
            return undefined;
        }
    }

    // Cheap check used to route a bearer token to JWT or API token verification
    static looksLikeJwt(token: string) {
        return token.split(".").length === 3;
    }
}
