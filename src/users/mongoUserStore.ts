import {type Collection, type Db, type Document, MongoClient} from "mongodb";
import {logger} from "../util";
import type {ApiToken, User, UserStore} from "./userStore";

type UserDocument = User;
type TokenDocument = ApiToken;

async function createOrGetCollection<T extends Document>(db: Db, collectionName: string): Promise<Collection<T>> {
    const collectionExists = await db.listCollections({name: collectionName}, {nameOnly: true}).hasNext();
    if (collectionExists) {
        return db.collection<T>(collectionName);
    } else {
        logger.info(`Creating collection ${collectionName}`);
        return db.createCollection<T>(collectionName);
    }
}

async function ensureIndex<T extends Document>(collection: Collection<T>, name: string, field: string, unique: boolean) {
    const hasIndex = await collection.indexExists(name);
    if (!hasIndex) {
        await collection.createIndex({[field]: 1}, {name, unique});
        logger.info(`Created ${name} index for collection ${collection.collectionName}`);
    }
}

const userProjection = {projection: {_id: 0}} as const;

export class MongoUserStore implements UserStore {
    private client?: MongoClient;
    private users?: Collection<UserDocument>;
    private tokens?: Collection<TokenDocument>;

    constructor(private cfg: {uri: string; databaseName: string}) {}

    async init() {
        this.client = await MongoClient.connect(this.cfg.uri);
        const db = this.client.db(this.cfg.databaseName);
        this.users = await createOrGetCollection<UserDocument>(db, "users");
        this.tokens = await createOrGetCollection<TokenDocument>(db, "apiTokens");
        await ensureIndex(this.users, "username", "name", true);
        await ensureIndex(this.tokens, "tokenHash", "hash", true);
        await ensureIndex(this.tokens, "tokenUser", "userName", false);
        logger.info(`Connected to ${this.client.options.dbName} on ${this.client.options.hosts} (Authenticated: ${this.client.options.credentials ? "Yes" : "No"})`);
    }

    async close() {
        await this.client?.close();
    }

    private get userCollection() {
        if (!this.users) {
            throw new Error("User database not initialised");
        }
        return this.users;
    }

    private get tokenCollection() {
        if (!this.tokens) {
            throw new Error("User database not initialised");
        }
        return this.tokens;
    }

    async getUser(name: string) {
        const doc = await this.userCollection.findOne({name}, userProjection);
        return doc ?? undefined;
    }

    async listUsers() {
        return this.userCollection.find({}, userProjection).sort({createdAt: 1}).toArray();
    }

    async createUser(name: string, admin = false) {
        const user: User = {name, admin, createdAt: new Date()};
        const result = await this.userCollection.updateOne({name}, {$setOnInsert: user}, {upsert: true});
        if (result.upsertedCount) {
            return {user, created: true};
        }
        const existing = await this.getUser(name);
        if (!existing) {
            throw new Error(`Problem creating user ${name}`);
        }
        return {user: existing, created: false};
    }

    async updateUser(name: string, changes: Partial<Pick<User, "admin" | "lastActivity">>) {
        const doc = await this.userCollection.findOneAndUpdate({name}, {$set: changes}, {returnDocument: "after", ...userProjection});
        return doc ?? undefined;
    }

    async deleteUser(name: string) {
        await this.tokenCollection.deleteMany({userName: name});
        const result = await this.userCollection.deleteOne({name});
        return result.deletedCount > 0;
    }

    async addToken(token: ApiToken) {
        await this.tokenCollection.insertOne({...token});
    }

    async findTokenByHash(hash: string) {
        const doc = await this.tokenCollection.findOne({hash}, userProjection);
        return doc ?? undefined;
    }

    async listTokens(userName: string) {
        return this.tokenCollection.find({userName}, userProjection).toArray();
    }

    async touchToken(id: string, when: Date) {
        await this.tokenCollection.updateOne({id}, {$set: {lastUsed: when}});
    }

    async deleteToken(userName: string, id: string) {
        const result = await this.tokenCollection.deleteOne({userName, id});
        return result.deletedCount > 0;
    }
}
