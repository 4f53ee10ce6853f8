import type {ApiToken, User, UserStore} from "./userStore";

// Used when no database is configured, and in tests
export class MemoryUserStore implements UserStore {
    private users = new Map<string, User>();
    private tokens = new Map<string, ApiToken>();

    async init() {}

    async close() {}

    async getUser(name: string) {
        const user = this.users.get(name);
        return user ? {...user} : undefined;
    }

    async listUsers() {
        return Array.from(this.users.values())
            .map(user => ({...user}))
            .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    }

    async createUser(name: string, admin = false) {
        const existing = this.users.get(name);
        if (existing) {
            return {user: {...existing}, created: false};
        }
        const user: User = {name, admin, createdAt: new Date()};
        this.users.set(name, user);
        return {user: {...user}, created: true};
    }

    async updateUser(name: string, changes: Partial<Pick<User, "admin" | "lastActivity">>) {
        const user = this.users.get(name);
        if (!user) {
            return undefined;
        }
        Object.assign(user, changes);
        return {...user};
    }

    async deleteUser(name: string) {
        for (const [id, token] of this.tokens) {
            if (token.userName === name) {
                this.tokens.delete(id);
            }
        }
        return this.users.delete(name);
    }

    async addToken(token: ApiToken) {
        this.tokens.set(token.id, {...token});
    }

    async findTokenByHash(hash: string) {
        for (const token of this.tokens.values()) {
            if (token.hash === hash) {
                return {...token};
            }
        }
        return undefined;
    }

    async listTokens(userName: string) {
        return Array.from(this.tokens.values())
            .filter(token => token.userName === userName)
            .map(token => ({...token}));
    }

    async touchToken(id: string, when: Date) {
        const token = this.tokens.get(id);
        if (token) {
            token.lastUsed = when;
        }
    }

    async deleteToken(userName: string, id: string) {
        const token = this.tokens.get(id);
        if (!token || token.userName !== userName) {
            return false;
        }
        return this.tokens.delete(id);
    }
}
