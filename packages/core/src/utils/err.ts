export type BuildStep = "runtime" | "toolchain" | "install";

/**
 * Base class of every failure keelson reports. `exitCode` is the status the
 * CLI exits with when the error reaches it.
 */
export class KeelsonError extends Error {
    public readonly exitCode: number = 1;

    constructor(message: string) {
        super(message);
        this.name = "KeelsonError";
    }
}

export class ConfigError extends KeelsonError {
    public readonly exitCode = 2;

    constructor(
        message: string,
        public readonly path?: string,
    ) {
        super(path ? `${path}: ${message}` : message);
        this.name = "ConfigError";
    }
}

/**
 * A manifest entry could not be parsed or resolved by the package manager.
 */
export class DependencyResolutionError extends KeelsonError {
    public readonly exitCode = 10;

    constructor(
        message: string,
        public readonly entry?: string,
        public readonly line?: number,
    ) {
        super(DependencyResolutionError.format(message, entry, line));
        this.name = "DependencyResolutionError";
    }

    private static format(message: string, entry?: string, line?: number) {
        if (entry === undefined) return message;
        const where = line === undefined ? "" : ` (manifest line ${line})`;
        return `${message}: '${entry}'${where}`;
    }
}

export class ToolchainError extends KeelsonError {
    public readonly exitCode = 11;

    constructor(
        message: string,
        public readonly step: BuildStep,
    ) {
        super(message);
        this.name = "ToolchainError";
    }
}

export class BuildLockedError extends KeelsonError {
    public readonly exitCode = 12;

    constructor(public readonly lockPath: string) {
        super(`Another build holds ${lockPath}`);
        this.name = "BuildLockedError";
    }
}

export class BindError extends KeelsonError {
    public readonly exitCode = 20;

    constructor(
        message: string,
        public readonly port: number | string,
    ) {
        super(message);
        this.name = "BindError";
    }
}

export class EntryPointError extends KeelsonError {
    public readonly exitCode = 21;

    constructor(
        message: string,
        public readonly modulePath: string,
        public readonly exportName: string,
    ) {
        super(`${message} (${modulePath}#${exportName})`);
        this.name = "EntryPointError";
    }
}

export class LauncherStateError extends KeelsonError {
    constructor(message: string) {
        super(message);
        this.name = "LauncherStateError";
    }
}

export function exitCodeOf(error: unknown): number {
    return error instanceof KeelsonError ? error.exitCode : 1;
}

export function nameOf(error: unknown): string {
    if (
        typeof error === "object" &&
        error !== null &&
        "name" in error &&
        typeof error.name === "string"
    ) {
        return error.name;
    }
    return "Error";
}

export function messageOf(error: unknown): string {
    if (
        typeof error === "object" &&
        error !== null &&
        "message" in error &&
        typeof error.message === "string"
    ) {
        return error.message;
    }
    return String(error);
}
