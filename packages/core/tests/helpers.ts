import fs from "fs/promises";
import http from "http";
import net from "net";
import os from "os";
import path from "path";

import { DependencyInstaller } from "../src/builder/installer/DependencyInstaller";
import { ToolchainProbe } from "../src/builder/toolchain/ToolchainProbe";
import { DependencyManifest } from "../src/manifest/Manifest";
import { DependencyResolutionError } from "../src/utils/err";

export async function tempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), "keelson-test-"));
}

export async function writeFiles(
    root: string,
    files: Record<string, string>,
): Promise<void> {
    for (const [relative, content] of Object.entries(files)) {
        const file = path.join(root, relative);
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, content);
    }
}

/**
 * Installs every entry as a tiny CommonJS package exporting "name@constraint".
 * Packages named nonexistent-* fail to resolve.
 */
export class FakeInstaller implements DependencyInstaller {
    readonly packageManager = "npm" as const;
    installs = 0;

    async install(dir: string, manifest: DependencyManifest): Promise<void> {
        this.installs++;
        await fs.mkdir(path.join(dir, "node_modules"), { recursive: true });

        for (const entry of manifest) {
            if (entry.name.startsWith("nonexistent")) {
                throw new DependencyResolutionError(
                    "Could not resolve dependency",
                    `${entry.name}@${entry.constraint}`,
                    entry.line,
                );
            }
            await writeFiles(path.join(dir, "node_modules", entry.name), {
                "package.json": JSON.stringify({
                    name: entry.name,
                    main: "index.js",
                }),
                "index.js": `module.exports = ${JSON.stringify(`${entry.name}@${entry.constraint}`)};\n`,
            });
        }
    }
}

export class FakeProbe implements ToolchainProbe {
    constructor(
        private version = "20.11.1",
        private available: string[] = ["npm"],
    ) {}

    runtimeVersion(): string {
        return this.version;
    }

    isAvailable(command: string): boolean {
        return this.available.includes(command);
    }
}

export async function freePort(): Promise<number> {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "0.0.0.0", resolve));
    const address = server.address();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (address === null || typeof address === "string") {
        throw new Error("no TCP address");
    }
    return address.port;
}

/**
 * Occupies a free port on all interfaces until `close` is called.
 */
export async function occupyPort(): Promise<{
    port: number;
    close: () => Promise<void>;
}> {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "0.0.0.0", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
        throw new Error("no TCP address");
    }
    return {
        port: address.port,
        close: () => new Promise<void>((resolve) => server.close(() => resolve())),
    };
}

export function get(
    port: number,
    requestPath = "/",
): Promise<{ status: number; body: string }> {
    return new Promise((resolve, reject) => {
        http.get(
            { host: "127.0.0.1", port, path: requestPath, agent: false },
            (res) => {
                let body = "";
                res.setEncoding("utf-8");
                res.on("data", (chunk: string) => (body += chunk));
                res.on("end", () =>
                    resolve({ status: res.statusCode ?? 0, body }),
                );
            },
        ).on("error", reject);
    });
}
