import fs from "fs/promises";
import * as dotenv from "dotenv";

import { BindError, ConfigError } from "../utils/err";
import { isNotFound } from "../utils/fs";

export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = "0.0.0.0";

export type Environment = Record<string, string | undefined>;

/**
 * Parameters read once when a service is launched. Passed to the launcher
 * by value; nothing reads `process.env` after this is built.
 */
export interface RuntimeConfig {
    readonly port: number;
    readonly host: string;
    readonly env: Readonly<Environment>;
}

export function parsePort(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === "") return DEFAULT_PORT;

    const value = raw.trim();
    if (!/^\d+$/.test(value)) {
        throw new BindError(`PORT must be an integer, got '${raw}'`, raw);
    }

    const port = Number(value);
    if (port < 1 || port > 65535) {
        throw new BindError(
            `PORT ${port} is outside the range 1-65535`,
            port,
        );
    }
    return port;
}

export function resolveRuntimeConfig(
    env: Environment,
    host = DEFAULT_HOST,
): RuntimeConfig {
    return Object.freeze({
        port: parsePort(env.PORT),
        host,
        env: Object.freeze({ ...env }),
    });
}

/**
 * Merges variables from an env file under `env`. Values already present in
 * `env` are kept.
 */
export async function withEnvFile(
    env: Environment,
    envFile: string,
): Promise<Environment> {
    let content: string;
    try {
        content = await fs.readFile(envFile, "utf-8");
    } catch (e) {
        if (isNotFound(e)) {
            throw new ConfigError("env file not found", envFile);
        }
        throw e;
    }

    return { ...dotenv.parse(content), ...definedOnly(env) };
}

function definedOnly(env: Environment): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined) result[key] = value;
    }
    return result;
}
