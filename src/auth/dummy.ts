import {logger, sameSecret} from "../util";
import {type Authenticator, authFailed, type AuthResult, type Credentials} from "./authenticator";

// Accepts any user name. For testing and demonstrations only
export class DummyAuthenticator implements Authenticator {
    readonly kind = "dummy";

    constructor(private password?: string) {
        if (!password) {
            logger.warning("Dummy authenticator accepts any password");
        }
    }

    async authenticate({username, password}: Credentials): Promise<AuthResult> {
        if (!username) {
            return authFailed("Malformed login request");
        }
        if (this.password && !sameSecret(password ?? "", this.password)) {
            return authFailed();
        }
        return {success: true, identity: {name: username}};
    }
}
