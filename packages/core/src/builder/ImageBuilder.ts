import fs from "fs/promises";
import path from "path";
import { createHash } from "crypto";

import { ProjectConfig, STATE_DIR } from "../config/ProjectConfig";
import {
    DependencyManifest,
    canonicalManifest,
    readManifest,
} from "../manifest/Manifest";
import {
    Artifact,
    ArtifactDescriptor,
    ArtifactStore,
    DESCRIPTOR_FILE,
    SOURCE_DIR,
} from "../artifact/Artifact";
import { BuildLockedError } from "../utils/err";
import { errorCode, isNotFound, stagingName } from "../utils/fs";
import { Logger, createLogger } from "../utils/log";
import { DependencyInstaller } from "./installer/DependencyInstaller";
import { PackageManagerInstaller } from "./installer/PackageManagerInstaller";
import { Layer, LayerStore } from "./LayerStore";
import { SourceTree } from "./SourceTree";
import {
    HostToolchainProbe,
    ToolchainProbe,
    checkRuntime,
    checkToolchain,
} from "./toolchain/ToolchainProbe";

export interface BuildOptions {
    probe?: ToolchainProbe;
    installer?: DependencyInstaller;
    logger?: Logger;
}

export interface BuildResult {
    artifact: Artifact;
    dependencyLayer: Pick<Layer, "key" | "cached">;
    sourceDigest: string;
    /** an identical artifact already existed and was reused */
    reused: boolean;
}

export function dependencyLayerKey(
    manifest: DependencyManifest,
    packageManager: string,
    nodeVersion: string,
): string {
    const major = nodeVersion.split(".")[0];
    return createHash("sha256")
        .update(canonicalManifest(manifest))
        .update(`\0${packageManager}\0node${major}`)
        .digest("hex")
        .slice(0, 32);
}

/**
 * Turns a project directory into an immutable artifact under
 * `.keelson/artifacts/<id>/`.
 */
export class ImageBuilder {
    private stateDir: string;
    private layers: LayerStore;
    private artifacts: ArtifactStore;
    private probe: ToolchainProbe;
    private installer: DependencyInstaller;
    private logger: Logger;

    constructor(
        private projectDir: string,
        private config: ProjectConfig,
        options: BuildOptions = {},
    ) {
        this.stateDir = path.join(projectDir, STATE_DIR);
        this.layers = new LayerStore(path.join(this.stateDir, "layers"));
        this.artifacts = new ArtifactStore(projectDir);
        this.logger = options.logger ?? createLogger("builder");
        this.probe = options.probe ?? new HostToolchainProbe();
        this.installer =
            options.installer ??
            new PackageManagerInstaller(
                config.build.packageManager,
                this.logger,
            );
    }

    public async build(): Promise<BuildResult> {
        await fs.mkdir(this.stateDir, { recursive: true });
        const release = await this.lock();
        try {
            return await this.run();
        } finally {
            await release();
        }
    }

    private async run(): Promise<BuildResult> {
        const startTime = Date.now();

        // 1. Runtime
        const nodeVersion = checkRuntime(this.probe, this.config.runtime.node);
        this.logger.detail(`Runtime: Node.js ${nodeVersion}`);

        // 2. Native build prerequisites
        checkToolchain(this.probe, [
            this.installer.packageManager,
            ...this.config.build.toolchain,
        ]);

        // 3. Dependencies, before the source so source edits keep the layer
        const manifest = await readManifest(
            path.join(this.projectDir, this.config.manifest),
        );
        const layer = await this.installDependencies(manifest, nodeVersion);

        // 4. Source
        const sourceRoot = path.resolve(this.projectDir, this.config.source);
        const tree = await SourceTree.scan(sourceRoot, this.config.build.exclude);
        const sourceDigest = await tree.digest();
        this.warnOnMissingEntry(tree);

        const id = this.artifactId(layer.key, sourceDigest);
        if (await this.artifacts.has(id)) {
            await this.artifacts.setLatest(id);
            this.logger.done(`Artifact ${id} is up to date`, startTime);
            return {
                artifact: await this.artifacts.read(id),
                dependencyLayer: { key: layer.key, cached: layer.cached },
                sourceDigest,
                reused: true,
            };
        }

        const descriptor: ArtifactDescriptor = {
            id,
            createdAt: new Date().toISOString(),
            runtime: { node: nodeVersion },
            dependencies: {
                key: layer.key,
                packageManager: this.installer.packageManager,
                entries: manifest.map((entry) => ({ ...entry })),
            },
            source: { digest: sourceDigest, files: tree.files.length },
            entry: { ...this.config.entry },
            expose: this.config.expose,
        };
        const dir = await this.assemble(descriptor, tree, layer);
        await this.artifacts.setLatest(id);

        this.logger.done(`Artifact ${id} is ready`, startTime);
        return {
            artifact: { descriptor, dir },
            dependencyLayer: { key: layer.key, cached: layer.cached },
            sourceDigest,
            reused: false,
        };
    }

    private async installDependencies(
        manifest: DependencyManifest,
        nodeVersion: string,
    ): Promise<Layer> {
        const key = dependencyLayerKey(
            manifest,
            this.installer.packageManager,
            nodeVersion,
        );

        if (await this.layers.has(key)) {
            this.logger.detail(`Dependencies unchanged, using layer ${key}`);
            return { key, dir: this.layers.pathOf(key), cached: true };
        }

        const startTime = Date.now();
        this.logger.step(
            `Installing ${manifest.length} dependencies with ${this.installer.packageManager}...`,
        );
        const layer = await this.layers.ensure(key, (dir) =>
            this.installer.install(dir, manifest),
        );
        this.logger.done(`Dependencies installed`, startTime);
        return layer;
    }

    /**
     * Writes the artifact into a staging directory and renames it into
     * place, so a failed build leaves nothing behind.
     */
    private async assemble(
        descriptor: ArtifactDescriptor,
        tree: SourceTree,
        layer: Layer,
    ): Promise<string> {
        await fs.mkdir(this.artifacts.root, { recursive: true });
        const staging = path.join(this.artifacts.root, stagingName());
        const dir = this.artifacts.dirOf(descriptor.id);

        try {
            await fs.mkdir(staging);
            this.logger.step(`Copying ${tree.files.length} source files...`);
            await tree.copyTo(path.join(staging, SOURCE_DIR));

            // relative, so the project directory can move
            await fs.symlink(
                path.relative(dir, path.join(layer.dir, "node_modules")),
                path.join(staging, "node_modules"),
                "dir",
            );
            await fs.writeFile(
                path.join(staging, DESCRIPTOR_FILE),
                JSON.stringify(descriptor, null, 2) + "\n",
            );
            await fs.rename(staging, dir);
        } catch (e) {
            await fs.rm(staging, { recursive: true, force: true });
            throw e;
        }
        return dir;
    }

    private artifactId(layerKey: string, sourceDigest: string): string {
        return createHash("sha256")
            .update(layerKey)
            .update(sourceDigest)
            .update(JSON.stringify(this.config.entry))
            .update(String(this.config.expose))
            .digest("hex")
            .slice(0, 16);
    }

    private warnOnMissingEntry(tree: SourceTree): void {
        const entry = this.config.entry.module.replace(/^\.\//, "");
        // the candidates require tries for a path without an extension
        const candidates = [
            entry,
            `${entry}.js`,
            `${entry}.cjs`,
            `${entry}.json`,
            `${entry}/index.js`,
        ];
        if (!tree.files.some((file) => candidates.includes(file.relative))) {
            this.logger.warn(
                `Entry module '${this.config.entry.module}' is not in the source tree`,
            );
        }
    }

    private async lock(): Promise<() => Promise<void>> {
        const lockPath = path.join(this.stateDir, "build.lock");
        const acquire = () =>
            fs.writeFile(lockPath, String(process.pid), { flag: "wx" });

        try {
            await acquire();
        } catch (e) {
            if (errorCode(e) !== "EEXIST") throw e;
            if (!(await isStale(lockPath))) {
                throw new BuildLockedError(lockPath);
            }
            this.logger.warn(`Removing stale lock ${lockPath}`);
            await fs.rm(lockPath, { force: true });
            try {
                await acquire();
            } catch (retry) {
                if (errorCode(retry) === "EEXIST") {
                    throw new BuildLockedError(lockPath);
                }
                throw retry;
            }
        }

        return () => fs.rm(lockPath, { force: true });
    }
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: alive, owned by another user
        return errorCode(e) !== "ESRCH";
    }
}

/**
 * A lock is stale when the build that wrote it is no longer running.
 * Unreadable contents count as held: the writer may not have filled it yet.
 */
async function isStale(lockPath: string): Promise<boolean> {
    let content: string;
    try {
        content = await fs.readFile(lockPath, "utf-8");
    } catch (e) {
        if (isNotFound(e)) return true;
        throw e;
    }
    const pid = Number(content.trim());
    if (!Number.isInteger(pid) || pid <= 0) return false;
    return !isProcessAlive(pid);
}
