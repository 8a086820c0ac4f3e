import fs from "fs/promises";
import path from "path";
import { spawn } from "child_process";

import { PackageManager } from "../../config/ProjectConfig";
import {
    DependencyManifest,
    ManifestEntry,
    findEntry,
    toDependencies,
} from "../../manifest/Manifest";
import { DependencyResolutionError, ToolchainError } from "../../utils/err";
import { Logger, silentLogger } from "../../utils/log";
import { DependencyInstaller } from "./DependencyInstaller";

const INSTALL_ARGS: Record<PackageManager, string[]> = {
    npm: ["install", "--no-audit", "--no-fund", "--loglevel=error"],
    pnpm: ["install", "--reporter=append-only"],
    yarn: ["install", "--non-interactive"],
};

// Patterns the package managers use when a package or version is missing.
// The first group is the package name.
const FAILURE_PATTERNS: RegExp[] = [
    /No matching version found for ((?:@[^@\s/]+\/)?[^@\s]+)@/,
    /'((?:@[^@\s/]+\/)?[^@\s']+)@[^']*' is not in (?:this|the npm) registry/,
    /404 Not Found - GET \S+?\/((?:@[^/\s]+(?:\/|%2[fF]))?[^/\s]+)(?:\s|$)/,
    /GET \S+?\/((?:@[^/\s]+(?:\/|%2[fF]))?[^/\s:]+): Not Found/,
    /Couldn't find any versions for "([^"]+)"/,
    /"https?:\/\/\S+?\/((?:@[^/\s]+(?:\/|%2[fF]))?[^/\s:]+): Not found"/,
];

/**
 * Finds the manifest entry an installer's error output is about.
 */
export function identifyFailingEntry(
    output: string,
    manifest: DependencyManifest,
): Readonly<ManifestEntry> | undefined {
    for (const pattern of FAILURE_PATTERNS) {
        const match = pattern.exec(output);
        if (!match) continue;
        const name = decodeURIComponent(match[1]);
        const entry = findEntry(manifest, name);
        if (entry) return entry;
    }
    return undefined;
}

/**
 * Installs a manifest with npm, pnpm or yarn by writing a package.json and
 * running the package manager's install in the target directory.
 */
export class PackageManagerInstaller implements DependencyInstaller {
    constructor(
        public readonly packageManager: PackageManager = "npm",
        private logger: Logger = silentLogger,
    ) {}

    async install(dir: string, manifest: DependencyManifest): Promise<void> {
        await fs.writeFile(
            path.join(dir, "package.json"),
            JSON.stringify(
                {
                    name: "keelson-dependency-layer",
                    private: true,
                    dependencies: toDependencies(manifest),
                },
                null,
                2,
            ),
        );

        if (manifest.length === 0) {
            await fs.mkdir(path.join(dir, "node_modules"), { recursive: true });
            return;
        }

        const { code, output } = await this.run(dir);
        if (code === 0) return;

        const entry = identifyFailingEntry(output, manifest);
        if (entry) {
            throw new DependencyResolutionError(
                "Could not resolve dependency",
                `${entry.name}@${entry.constraint}`,
                entry.line,
            );
        }
        throw new DependencyResolutionError(
            `${this.packageManager} install failed with code ${code}`,
        );
    }

    private run(dir: string): Promise<{ code: number | null; output: string }> {
        return new Promise((resolve, reject) => {
            const child = spawn(
                this.packageManager,
                INSTALL_ARGS[this.packageManager],
                {
                    cwd: dir,
                    stdio: ["ignore", "pipe", "pipe"],
                    shell: process.platform === "win32",
                },
            );

            let output = "";
            const collect = (data: Buffer | string) => {
                const text = data.toString();
                output += text;
                for (const line of text.split("\n")) {
                    if (line.trim()) this.logger.detail(line.trimEnd());
                }
            };
            child.stdout.on("data", collect);
            child.stderr.on("data", collect);

            child.on("error", (err) => {
                reject(
                    new ToolchainError(
                        `Could not run ${this.packageManager}: ${err.message}`,
                        "install",
                    ),
                );
            });
            child.on("close", (code) => resolve({ code, output }));
        });
    }
}
