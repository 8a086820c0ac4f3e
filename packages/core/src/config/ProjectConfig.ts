import fs from "fs/promises";
import path from "path";
import * as yaml from "js-yaml";

import { ConfigError, messageOf } from "../utils/err";
import { isNotFound } from "../utils/fs";

export const CONFIG_FILE = "keelson.yml";
export const STATE_DIR = ".keelson";

export type PackageManager = "npm" | "pnpm" | "yarn";
const PACKAGE_MANAGERS: readonly PackageManager[] = ["npm", "pnpm", "yarn"];

/**
 * Where the launcher finds the request listener: a module path relative to
 * the source root and the name it is exported under.
 */
export interface EntryPoint {
    module: string;
    export: string;
}

export interface ProjectConfig {
    source: string;
    manifest: string;
    entry: EntryPoint;
    runtime: {
        node: string;
    };
    build: {
        packageManager: PackageManager;
        toolchain: string[];
        exclude: string[];
    };
    launch: {
        host: string;
        envFile?: string;
    };
    expose: number;
}

export const DEFAULT_CONFIG: ProjectConfig = {
    source: ".",
    manifest: "dependencies.txt",
    entry: { module: "app.js", export: "app" },
    runtime: { node: ">=20" },
    build: { packageManager: "npm", toolchain: [], exclude: [] },
    launch: { host: "0.0.0.0" },
    expose: 8080,
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

class Reader {
    constructor(private file: string) {}

    section(parent: Section, key: string): Section {
        const value = parent[key];
        if (value === undefined || value === null) return {};
        if (!isSection(value)) return this.fail(key, "a mapping");
        return value;
    }

    string(parent: Section, key: string, fallback: string): string {
        const value = parent[key];
        if (value === undefined || value === null) return fallback;
        if (typeof value !== "string" || value.trim() === "") {
            return this.fail(key, "a non-empty string");
        }
        return value;
    }

    optionalString(parent: Section, key: string): string | undefined {
        if (parent[key] === undefined || parent[key] === null) return undefined;
        return this.string(parent, key, "");
    }

    strings(parent: Section, key: string): string[] {
        const value = parent[key];
        if (value === undefined || value === null) return [];
        if (
            !Array.isArray(value) ||
            !value.every((item): item is string => typeof item === "string")
        ) {
            return this.fail(key, "a list of strings");
        }
        return value;
    }

    port(parent: Section, key: string, fallback: number): number {
        const value = parent[key];
        if (value === undefined || value === null) return fallback;
        if (
            typeof value !== "number" ||
            !Number.isInteger(value) ||
            value < 1 ||
            value > 65535
        ) {
            return this.fail(key, "a port number between 1 and 65535");
        }
        return value;
    }

    fail(key: string, expected: string): never {
        throw new ConfigError(`'${key}' must be ${expected}`, this.file);
    }
}

/**
 * Validates a parsed `keelson.yml` document and fills in defaults.
 */
export function parseProjectConfig(
    document: unknown,
    file = CONFIG_FILE,
): ProjectConfig {
    if (document === undefined || document === null) return DEFAULT_CONFIG;
    if (!isSection(document)) {
        throw new ConfigError("top level must be a mapping", file);
    }

    const read: Reader = new Reader(file);
    const entry = read.section(document, "entry");
    const runtime = read.section(document, "runtime");
    const build = read.section(document, "build");
    const launch = read.section(document, "launch");

    const packageManager = read.string(
        build,
        "packageManager",
        DEFAULT_CONFIG.build.packageManager,
    );
    const manager = PACKAGE_MANAGERS.find((pm) => pm === packageManager);
    if (!manager) {
        return read.fail(
            "packageManager",
            `one of ${PACKAGE_MANAGERS.join(", ")}`,
        );
    }

    return {
        source: read.string(document, "source", DEFAULT_CONFIG.source),
        manifest: read.string(document, "manifest", DEFAULT_CONFIG.manifest),
        entry: {
            module: read.string(entry, "module", DEFAULT_CONFIG.entry.module),
            export: read.string(entry, "export", DEFAULT_CONFIG.entry.export),
        },
        runtime: {
            node: read.string(runtime, "node", DEFAULT_CONFIG.runtime.node),
        },
        build: {
            packageManager: manager,
            toolchain: read.strings(build, "toolchain"),
            exclude: read.strings(build, "exclude"),
        },
        launch: {
            host: read.string(launch, "host", DEFAULT_CONFIG.launch.host),
            envFile: read.optionalString(launch, "envFile"),
        },
        expose: read.port(document, "expose", DEFAULT_CONFIG.expose),
    };
}

/**
 * Reads `keelson.yml` from the project directory. A missing file means the
 * defaults.
 */
export async function loadProjectConfig(
    projectDir: string,
): Promise<ProjectConfig> {
    const configPath = path.join(projectDir, CONFIG_FILE);

    let content: string;
    try {
        content = await fs.readFile(configPath, "utf-8");
    } catch (e) {
        if (isNotFound(e)) return DEFAULT_CONFIG;
        throw e;
    }

    let document: unknown;
    try {
        document = yaml.load(content);
    } catch (e) {
        throw new ConfigError(`invalid YAML: ${messageOf(e)}`, configPath);
    }

    return parseProjectConfig(document, configPath);
}
