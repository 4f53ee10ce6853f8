import * as fs from "node:fs";
import type {UserMap} from "../types";
import {logger} from "../util";

export function parseUserMap(contents: string): UserMap {
    const userMap = new Map<string, string>();

    const commentRegex = new RegExp(/\s*#.*$/);
    const fieldRegex = new RegExp(/^(.*?)\s+(\S+)$/);

    for (let line of contents.split("\n")) {
        // Trim leading and trailing whitespace
        line = line.trim();

        // Strip comments
        line = line.replace(commentRegex, "");

        // Skip empty lines
        if (!line) {
            continue;
        }

        // Valid entry format: <authenticated name> <hub user>
        // The authenticated name may contain spaces; the hub user name never does.
        // The field separator can be any amount of whitespace.
        const entry = line.match(fieldRegex);
        if (!entry) {
            logger.warning(`Ignoring malformed usermap line: ${line}`);
            continue;
        }

        // Captured groups are 1-indexed (0 is the whole match)
        userMap.set(entry[1], entry[2]);
    }
    return userMap;
}

/**
 * Holds the user lookup table and reloads it whenever the file changes. A file that
 * cannot be read leaves an empty table.
 */
export class UserMapFile {
    private current: UserMap = new Map();

    constructor(readonly filename: string) {}

    get map() {
        return this.current;
    }

    load() {
        try {
            const contents = fs.readFileSync(this.filename).toString();
            this.current = parseUserMap(contents);
            logger.info(`Updated usermap with ${this.current.size} entries`);
        } catch (e) {
            logger.debug(e);
            logger.error("Error reading user table");
            this.current = new Map();
        }
        return this.current;
    }

    watch() {
        this.load();
        fs.watchFile(this.filename, () => this.load());
    }

    unwatch() {
        fs.unwatchFile(this.filename);
    }
}
