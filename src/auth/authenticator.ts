import {AuthFailure} from "../errors";
import type {HubAuthenticatorConfig, UserMap} from "../types";
import {normalizeUsername} from "../users/userStore";

export interface Credentials {
    username: string;
    password: string;
}

export interface Identity {
    name: string;
    admin?: boolean;
}

export type AuthResult = {success: true; identity: Identity} | {success: false; failure: AuthFailure};

export interface Authenticator {
    readonly kind: string;
    // Must not change any state when authentication fails
    authenticate(credentials: Credentials): Promise<AuthResult>;
}

export function authFailed(message = "Invalid username/password combo"): AuthResult {
    return {success: false, failure: new AuthFailure(message)};
}

/**
 * Maps an authenticated name onto the hub's user name: lookup table first, then
 * normalization, then the allowed/admin user lists.
 */
export class IdentityResolver {
    private allowed: Set<string>;
    private admins: Set<string>;

    constructor(
        cfg: Pick<HubAuthenticatorConfig, "allowedUsers" | "adminUsers">,
        private userMap?: () => UserMap | undefined
    ) {
        this.allowed = new Set((cfg.allowedUsers ?? []).map(normalizeUsername));
        this.admins = new Set((cfg.adminUsers ?? []).map(normalizeUsername));
    }

    resolve(identity: Identity): Identity | undefined {
        const mapped = this.userMap?.()?.get(identity.name) ?? identity.name;
        const name = normalizeUsername(mapped);
        if (!name) {
            return undefined;
        }
        if (this.allowed.size && !this.allowed.has(name) && !this.admins.has(name)) {
            return undefined;
        }
        return {name, admin: identity.admin || this.admins.has(name)};
    }

    isAdmin(name: string) {
        return this.admins.has(normalizeUsername(name));
    }
}
