import {getUserId, logger} from "../util";
import {type Authenticator, authFailed, type AuthResult, type Credentials} from "./authenticator";

export interface PamModule {
    pamAuthenticate(options: {username: string; password: string; serviceName?: string}, callback: (err: Error | string | null | undefined, code: number) => void): void;
}

export class PamAuthenticator implements Authenticator {
    readonly kind = "pam";
    private pam: PamModule;

    constructor(
        private serviceName?: string,
        pam?: PamModule
    ) {
        // Native module, only required when PAM is actually configured
        this.pam = pam ?? require("node-linux-pam");
    }

    authenticate({username, password}: Credentials): Promise<AuthResult> {
        if (!username || !password) {
            return Promise.resolve(authFailed("Malformed login request"));
        }
        return new Promise<AuthResult>(resolve => {
            this.pam.pamAuthenticate({username, password, serviceName: this.serviceName}, (err, code) => {
                if (err) {
                    logger.debug(`PAM authentication failed for ${username} (code ${code})`);
                    return resolve(authFailed());
                }
                try {
                    const uid = getUserId(username);
                    logger.info(`Authenticated as user ${username} with uid ${uid} using PAM`);
                    resolve({success: true, identity: {name: username}});
                } catch (e) {
                    logger.debug(`A PAM-related error occurred: ${e} (code ${code})`);
                    resolve(authFailed("User does not exist"));
                }
            });
        });
    }
}
