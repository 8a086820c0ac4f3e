import fs from "fs/promises";
import { randomBytes } from "crypto";

export async function exists(file: string): Promise<boolean> {
    try {
        await fs.access(file);
        return true;
    } catch {
        return false;
    }
}

// Node's errors may come from another realm (vm contexts, test runners),
// so they are matched by shape rather than with instanceof.
export function errorCode(error: unknown): string | undefined {
    if (typeof error !== "object" || error === null) return undefined;
    return "code" in error && typeof error.code === "string"
        ? error.code
        : undefined;
}

export function isNotFound(error: unknown): boolean {
    return errorCode(error) === "ENOENT";
}

/**
 * Name for a sibling directory or file that is renamed into place once
 * written completely.
 */
export function stagingName(): string {
    return `.staging-${randomBytes(6).toString("hex")}`;
}
