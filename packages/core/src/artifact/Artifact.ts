import fs from "fs/promises";
import path from "path";

import {
    EntryPoint,
    PackageManager,
    STATE_DIR,
} from "../config/ProjectConfig";
import { ManifestEntry } from "../manifest/Manifest";
import { ConfigError } from "../utils/err";
import { exists, isNotFound, stagingName } from "../utils/fs";

export const DESCRIPTOR_FILE = "artifact.json";
export const SOURCE_DIR = "app";
/** ids are hex digests; anything else could name a path outside the store */
export const ARTIFACT_ID_PATTERN = /^[0-9a-f]+$/;

export interface ArtifactDescriptor {
    id: string;
    createdAt: string;
    runtime: {
        node: string;
    };
    dependencies: {
        key: string;
        packageManager: PackageManager;
        entries: ManifestEntry[];
    };
    source: {
        digest: string;
        files: number;
    };
    entry: EntryPoint;
    expose: number;
}

export interface Artifact {
    descriptor: ArtifactDescriptor;
    /** directory holding artifact.json, app/ and node_modules */
    dir: string;
}

export function sourceDirOf(artifact: Artifact): string {
    return path.join(artifact.dir, SOURCE_DIR);
}

/**
 * Built artifacts of one project: `.keelson/artifacts/<id>/` plus the
 * `.keelson/latest` pointer.
 */
export class ArtifactStore {
    public readonly root: string;
    private latestFile: string;

    constructor(projectDir: string) {
        this.root = path.join(projectDir, STATE_DIR, "artifacts");
        this.latestFile = path.join(projectDir, STATE_DIR, "latest");
    }

    dirOf(id: string): string {
        if (!ARTIFACT_ID_PATTERN.test(id)) {
            throw new ConfigError(`invalid artifact id '${id}'`);
        }
        return path.join(this.root, id);
    }

    async has(id: string): Promise<boolean> {
        if (!ARTIFACT_ID_PATTERN.test(id)) return false;
        return exists(path.join(this.dirOf(id), DESCRIPTOR_FILE));
    }

    async read(id: string): Promise<Artifact> {
        const dir = this.dirOf(id);
        const file = path.join(dir, DESCRIPTOR_FILE);

        let content: string;
        try {
            content = await fs.readFile(file, "utf-8");
        } catch (e) {
            if (isNotFound(e)) {
                throw new ConfigError(`artifact '${id}' does not exist`);
            }
            throw e;
        }

        return { descriptor: parseDescriptor(content, file), dir };
    }

    async list(): Promise<Artifact[]> {
        let names: string[];
        try {
            names = await fs.readdir(this.root);
        } catch (e) {
            if (isNotFound(e)) return [];
            throw e;
        }

        const artifacts: Artifact[] = [];
        for (const name of names) {
            if (!ARTIFACT_ID_PATTERN.test(name)) continue;
            if (await this.has(name)) artifacts.push(await this.read(name));
        }
        return artifacts.sort((a, b) =>
            a.descriptor.createdAt.localeCompare(b.descriptor.createdAt),
        );
    }

    async latestId(): Promise<string | undefined> {
        try {
            const id = (await fs.readFile(this.latestFile, "utf-8")).trim();
            return id || undefined;
        } catch (e) {
            if (isNotFound(e)) return undefined;
            throw e;
        }
    }

    async latest(): Promise<Artifact> {
        const id = await this.latestId();
        if (!id) {
            throw new ConfigError(
                "no artifact has been built yet, run 'keelson build' first",
            );
        }
        return this.read(id);
    }

    async setLatest(id: string): Promise<void> {
        await fs.mkdir(path.dirname(this.latestFile), { recursive: true });
        const tmp = path.join(path.dirname(this.latestFile), stagingName());
        await fs.writeFile(tmp, id + "\n");
        await fs.rename(tmp, this.latestFile);
    }
}

function parseDescriptor(content: string, file: string): ArtifactDescriptor {
    let value: unknown;
    try {
        value = JSON.parse(content);
    } catch {
        throw new ConfigError("artifact descriptor is not valid JSON", file);
    }
    if (!isDescriptor(value)) {
        throw new ConfigError("artifact descriptor is incomplete", file);
    }
    return value;
}

function isRecord(value: unknown): value is object {
    return typeof value === "object" && value !== null;
}

function isEntryPoint(value: unknown): value is EntryPoint {
    return (
        isRecord(value) &&
        "module" in value &&
        typeof value.module === "string" &&
        "export" in value &&
        typeof value.export === "string"
    );
}

function isDescriptor(value: unknown): value is ArtifactDescriptor {
    return (
        isRecord(value) &&
        "id" in value &&
        typeof value.id === "string" &&
        "createdAt" in value &&
        typeof value.createdAt === "string" &&
        "entry" in value &&
        isEntryPoint(value.entry) &&
        "dependencies" in value &&
        isRecord(value.dependencies) &&
        "source" in value &&
        isRecord(value.source) &&
        "runtime" in value &&
        isRecord(value.runtime) &&
        "expose" in value &&
        typeof value.expose === "number"
    );
}
