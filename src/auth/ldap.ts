import LdapAuth from "ldapauth-fork";
import type {Client} from "ldapjs";
import {logger} from "../util";
import {type Authenticator, authFailed, type AuthResult, type Credentials} from "./authenticator";

interface LdapAuthWithClient extends LdapAuth {
    _userClient?: Client & {connected?: boolean};
}

export class LdapAuthenticator implements Authenticator {
    readonly kind = "ldap";
    private ldap: LdapAuthWithClient;

    constructor(private options: LdapAuth.Options) {
        this.ldap = this.connect();
        setTimeout(() => {
            if (this.ldap._userClient?.connected) {
                logger.info("LDAP connected correctly");
            } else {
                logger.error("LDAP not connected!");
            }
        }, 2000).unref();
    }

    private connect(): LdapAuthWithClient {
        const ldap: LdapAuthWithClient = new LdapAuth(this.options);
        ldap.on("error", err => logger.error(`LdapAuth: ${err}`));
        return ldap;
    }

    close() {
        this.ldap.close();
    }

    authenticate({username, password}: Credentials): Promise<AuthResult> {
        if (!username || !password) {
            return Promise.resolve(authFailed("Malformed login request"));
        }
        return new Promise<AuthResult>(resolve => {
            const handleAuth = (err: Error | string | null | undefined, user?: {uid?: unknown}) => {
                if (err) {
                    logger.debug(err);
                    return resolve(authFailed());
                }
                if (user?.uid !== username) {
                    logger.warning(`Returned user "uid ${user?.uid}" does not match username "${username}"`);
                }
                logger.info(`Authenticated as user ${username} using LDAP`);
                resolve({success: true, identity: {name: username}});
            };

            this.ldap.authenticate(username, password, (error, user) => {
                // Need to reconnect to LDAP when we get a TLS error
                if (error instanceof Error && error.name.includes("ConfidentialityRequiredError")) {
                    logger.warning("TLS error encountered. Reconnecting to the LDAP server!");
                    this.ldap.close();
                    this.ldap = this.connect();
                    // Wait for the connection to be re-established
                    setTimeout(() => this.ldap.authenticate(username, password, handleAuth), 500);
                } else {
                    handleAuth(error, user);
                }
            });
        });
    }
}
