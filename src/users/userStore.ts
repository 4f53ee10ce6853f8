import {createHash, randomBytes} from "node:crypto";
import {v4 as uuidv4} from "uuid";

export interface User {
    name: string;
    admin: boolean;
    createdAt: Date;
    lastActivity?: Date;
}

export interface ApiToken {
    id: string;
    userName: string;
    // SHA-256 of the secret. The secret itself is only returned on creation
    hash: string;
    note?: string;
    createdAt: Date;
    expiresAt?: Date;
    lastUsed?: Date;
}

export type ApiTokenModel = Omit<ApiToken, "hash">;

export interface UserStore {
    init(): Promise<void>;
    close(): Promise<void>;
    getUser(name: string): Promise<User | undefined>;
    listUsers(): Promise<User[]>;
    // Returns the existing user if one with the same name is already present
    createUser(name: string, admin?: boolean): Promise<{user: User; created: boolean}>;
    updateUser(name: string, changes: Partial<Pick<User, "admin" | "lastActivity">>): Promise<User | undefined>;
    deleteUser(name: string): Promise<boolean>;
    addToken(token: ApiToken): Promise<void>;
    findTokenByHash(hash: string): Promise<ApiToken | undefined>;
    listTokens(userName: string): Promise<ApiToken[]>;
    touchToken(id: string, when: Date): Promise<void>;
    deleteToken(userName: string, id: string): Promise<boolean>;
}

export function hashToken(secret: string) {
    return createHash("sha256").update(secret, "utf8").digest("hex");
}

export function newApiToken(userName: string, options: {note?: string; expiresInMs?: number} = {}) {
    const secret = randomBytes(24).toString("hex");
    const createdAt = new Date();
    const token: ApiToken = {
        id: uuidv4(),
        userName,
        hash: hashToken(secret),
        note: options.note,
        createdAt,
        expiresAt: options.expiresInMs ? new Date(createdAt.getTime() + options.expiresInMs) : undefined
    };
    return {secret, token};
}

export function tokenModel({hash: _hash, ...model}: ApiToken): ApiTokenModel {
    return model;
}

// User names are case-insensitive and stored in lower case
export function normalizeUsername(name: string) {
    return name.trim().toLowerCase();
}
