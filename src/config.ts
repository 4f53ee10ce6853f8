import * as fs from "node:fs";
import * as path from "node:path";
import Ajv, {type SchemaObject} from "ajv";
import addFormats from "ajv-formats";
import * as JSONC from "jsonc-parser";
import _ from "lodash";
import moment from "moment-timezone";
import winston from "winston";
import yargs from "yargs";
import configSchemaJson from "../schemas/hub_config_schema.json";
import type {HubCommandLineOptions, HubRuntimeConfig, HubServerConfig} from "./types";
import {errorMessage, isRecord, logger} from "./util";

let timeZone: string | undefined;
const customTimestamp = () => {
    if (timeZone) return moment().tz(timeZone).format("YYYY-MM-DD HH:mm:ss");
    else return moment().format("YYYY-MM-DD HH:mm:ss");
};

// Different log formats
const logTextFormat = winston.format.combine(
    winston.format.timestamp({format: customTimestamp}),
    winston.format.printf(({level, message, timestamp}) => {
        return `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
);
const logColorTextFormat = winston.format.combine(
    winston.format.timestamp({format: customTimestamp}),
    winston.format.printf(({level, message, timestamp}) => {
        const colorizer = winston.format.colorize();
        return `${timestamp} [${colorizer.colorize(level, level.toUpperCase())}]: ${message}`;
    })
);
const logJsonFormat = winston.format.combine(winston.format.timestamp({format: customTimestamp}), winston.format.json());

export const defaultConfigPath = "/etc/spawnhub/config.json";

export function parseCommandLine(args: string[]): HubCommandLineOptions {
    const argv = yargs(args)
        .parserConfiguration({
            "short-option-groups": false
        })
        .options({
            config: {
                type: "string",
                default: defaultConfigPath,
                alias: "c",
                description: "Path to config file in JSON format"
            },
            test: {
                type: "string",
                alias: "t",
                requiresArg: true,
                description: "Test configuration with the provided user"
            },
            agent: {
                type: "boolean",
                alias: "a",
                description: "Run as a spawn agent for a hub on another host"
            },
            logLevel: {
                type: "string",
                choices: ["none", "emerg", "alert", "crit", "error", "warning", "notice", "info", "debug"] as const,
                describe: "Log level to print to console",
                alias: "l"
            },
            logFormat: {
                type: "string",
                choices: ["text", "json"] as const,
                describe: "Log type to print to console",
                alias: "f"
            }
        })
        .strict()
        .parseSync();
    return {config: argv.config, test: argv.test, agent: argv.agent, logLevel: argv.logLevel, logFormat: argv.logFormat};
}

const configSchema: SchemaObject = configSchemaJson;
const ajv = new Ajv({useDefaults: false, allErrors: true, allowUnionTypes: true});
const ajvWithDefaults = new Ajv({useDefaults: true, allErrors: true, allowUnionTypes: true});
addFormats(ajv);
addFormats(ajvWithDefaults);
const validatePartialConfig = ajv.compile(configSchema);
const validateAndAddDefaults = ajvWithDefaults.compile<HubServerConfig>(configSchema);

// Fills in defaults in place. Throws with the schema errors if the config is invalid
export function validateConfig(config: unknown): HubServerConfig {
    if (!validateAndAddDefaults(config)) {
        throw new Error(`Invalid configuration: ${ajvWithDefaults.errorsText(validateAndAddDefaults.errors)}`);
    }
    return config;
}

/**
 * Reads the main config file and every config.d/*.json fragment beside it, in name
 * order. Fragments are validated on their own and deep-merged over the main file.
 * A missing default config file is skipped.
 */
export function readConfigFiles(configPath: string) {
    const usingCustomConfig = configPath !== defaultConfigPath;
    const files: string[] = [];
    let merged: unknown = {};

    if (fs.existsSync(configPath)) {
        files.push(configPath);
        merged = JSONC.parse(fs.readFileSync(configPath).toString());
    } else if (!usingCustomConfig) {
        logger.warning(`Skipping missing config file ${defaultConfigPath}`);
    } else {
        throw new Error(`Unable to find config file ${configPath}`);
    }

    const configDir = path.join(path.dirname(configPath), "config.d");
    if (fs.existsSync(configDir)) {
        const fragments = fs.readdirSync(configDir).sort();
        for (const file of fragments) {
            if (!file.match(/.*\.json$/)) {
                logger.warning(`Skipping ${file}`);
                continue;
            }
            const additionalConfig: unknown = JSONC.parse(fs.readFileSync(path.join(configDir, file)).toString());
            if (validatePartialConfig(additionalConfig) && isRecord(additionalConfig)) {
                merged = _.merge(merged, additionalConfig);
                files.push(file);
            } else {
                logger.error(`Skipping invalid configuration file ${file}`);
                logger.error(ajv.errorsText(validatePartialConfig.errors));
            }
        }
    }
    return {config: merged, files};
}

const consoleTransport = new winston.transports.Console({
    format: logColorTextFormat,
    level: "info"
});

// Console logging before the config file has been read
export function initConsoleLogging(options: Pick<HubCommandLineOptions, "logLevel" | "logFormat">) {
    consoleTransport.format = options.logFormat === "json" ? logJsonFormat : logColorTextFormat;
    consoleTransport.level = options.logLevel && options.logLevel !== "none" ? options.logLevel : "info";
    consoleTransport.silent = options.logLevel === "none";
    if (!logger.transports.includes(consoleTransport)) {
        logger.add(consoleTransport);
    }
}

export function configureLogging(serverConfig: HubServerConfig, options: Pick<HubCommandLineOptions, "logLevel" | "logFormat">) {
    // Validate timezone setting
    if (serverConfig.timezone) {
        try {
            new Intl.DateTimeFormat("en-US", {timeZone: serverConfig.timezone});
            timeZone = serverConfig.timezone;
        } catch (err) {
            logger.debug(err);
            logger.error(`Ignoring invalid timezone "${serverConfig.timezone}" in config file`);
        }
    }

    // Reconfigure log transports
    if (options.logLevel) {
        serverConfig.logLevelConsole = options.logLevel;
    }
    if (options.logFormat) {
        serverConfig.logTypeConsole = options.logFormat;
    }
    consoleTransport.level = serverConfig.logLevelConsole === "none" ? "info" : serverConfig.logLevelConsole;
    consoleTransport.format = serverConfig.logTypeConsole === "json" ? logJsonFormat : logColorTextFormat;
    consoleTransport.silent = serverConfig.logLevelConsole === "none";

    if (serverConfig.logFile) {
        if (serverConfig.logLevelFile === "none") {
            logger.error(`Log file "${serverConfig.logFile}" specified but with a log level of "none"`);
        } else {
            try {
                logger.add(
                    new winston.transports.File({
                        level: serverConfig.logLevelFile,
                        filename: serverConfig.logFile,
                        format: serverConfig.logTypeFile === "json" ? logJsonFormat : logTextFormat
                    })
                );
                logger.info(`Started logging to ${serverConfig.logFile}`);
            } catch (err) {
                logger.debug(err);
                logger.error(`Error initializing logging to ${serverConfig.logFile}`);
                // Server currently continues to run
            }
        }
    }
}

export function loadConfig(options: HubCommandLineOptions): HubServerConfig {
    const {config, files} = readConfigFiles(options.config);
    let serverConfig: HubServerConfig;
    try {
        serverConfig = validateConfig(config);
    } catch (err) {
        throw new Error(`${errorMessage(err)} (from ${files.join(", ") || "defaults"})`);
    }
    configureLogging(serverConfig, options);
    logger.info(`Loaded config from ${files.join(", ") || "defaults"}`);
    return serverConfig;
}

export function buildRuntimeConfig(): HubRuntimeConfig {
    const apiAddress = "/api";
    const tokenRefreshAddress = `${apiAddress}/auth/refresh`;
    return {
        apiAddress,
        tokenRefreshAddress,
        logoutAddress: `${apiAddress}/auth/logout`,
        authPath: tokenRefreshAddress
    };
}
