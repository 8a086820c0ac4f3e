import { spawnSync } from "child_process";
import * as semver from "semver";

import { ConfigError, ToolchainError } from "../../utils/err";

export interface ToolchainProbe {
    /**
     * Version of the runtime the artifact will run on
     */
    runtimeVersion(): string;

    /**
     * Whether a build prerequisite can be run from this environment
     * @param command executable name, e.g. "make"
     */
    isAvailable(command: string): boolean;
}

/**
 * Probes the host: the current Node.js process and commands on PATH.
 */
export class HostToolchainProbe implements ToolchainProbe {
    runtimeVersion(): string {
        return process.versions.node;
    }

    isAvailable(command: string): boolean {
        const result = spawnSync(command, ["--version"], {
            stdio: "ignore",
            shell: process.platform === "win32",
        });
        return !result.error && result.status === 0;
    }
}

export function checkRuntime(probe: ToolchainProbe, range: string): string {
    if (semver.validRange(range) === null) {
        throw new ConfigError(`'runtime.node' is not a valid range: ${range}`);
    }

    const version = probe.runtimeVersion();
    if (!semver.satisfies(version, range)) {
        throw new ToolchainError(
            `Node.js ${version} does not satisfy the required range ${range}`,
            "runtime",
        );
    }
    return version;
}

export function checkToolchain(
    probe: ToolchainProbe,
    commands: readonly string[],
): void {
    for (const command of commands) {
        if (!probe.isAvailable(command)) {
            throw new ToolchainError(
                `Build prerequisite '${command}' is not available`,
                "toolchain",
            );
        }
    }
}
