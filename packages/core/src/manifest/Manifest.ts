import fs from "fs/promises";
import * as semver from "semver";

import { DependencyResolutionError } from "../utils/err";
import { isNotFound } from "../utils/fs";

export interface ManifestEntry {
    name: string;
    /** npm range or dist-tag handed to the package manager */
    constraint: string;
    /** 1-based line in the manifest file */
    line: number;
}

export type DependencyManifest = readonly Readonly<ManifestEntry>[];

const ENTRY_PATTERN =
    /^((?:@[a-z0-9][a-z0-9._-]*\/)?[a-z0-9][a-z0-9._-]*)\s*(==|~=|>=|<=|>|<|@)?\s*(.*)$/i;
const TAG_PATTERN = /^[a-z][a-z0-9._-]*$/i;

/**
 * `~=X.Y` allows X.Y and later within major X; `~=X.Y.Z` allows X.Y.Z and
 * later within minor X.Y. One-component versions have no compatible range.
 */
function compatibleRange(version: string): string | undefined {
    const parts = version.split(".");
    if (parts.length < 2 || !parts.every((part) => /^\d+$/.test(part))) {
        return undefined;
    }
    const upper = parts.slice(0, -1).map(Number);
    upper[upper.length - 1] += 1;
    while (upper.length < 3) upper.push(0);
    return `>=${version} <${upper.join(".")}`;
}

function toRange(
    operator: string | undefined,
    version: string,
): string | undefined {
    switch (operator) {
        case undefined:
            return "*";
        case "==":
        case "@":
            return version;
        case "~=":
            return compatibleRange(version);
        default:
            return `${operator}${version}`;
    }
}

function isAcceptedConstraint(operator: string | undefined, range: string) {
    if (semver.validRange(range) !== null) return true;
    // dist-tags such as "latest" only make sense in the npm form
    return operator === "@" && TAG_PATTERN.test(range);
}

/**
 * Parses manifest text: one `name<op>version` entry per line, `#` comments.
 */
export function parseManifest(content: string): DependencyManifest {
    const entries: ManifestEntry[] = [];
    const seen = new Set<string>();

    content.split(/\r?\n/).forEach((raw, index) => {
        const line = index + 1;
        const text = raw.replace(/#.*$/, "").trim();
        if (!text) return;

        const match = ENTRY_PATTERN.exec(text);
        if (!match) {
            throw new DependencyResolutionError(
                "Invalid manifest entry",
                text,
                line,
            );
        }

        const [, name, operator, version] = match;
        if (operator !== undefined && version.trim() === "") {
            throw new DependencyResolutionError(
                "Missing version after operator",
                text,
                line,
            );
        }
        if (operator === undefined && version !== "") {
            throw new DependencyResolutionError(
                "Invalid manifest entry",
                text,
                line,
            );
        }

        const constraint = toRange(operator, version.trim());
        if (
            constraint === undefined ||
            !isAcceptedConstraint(operator, constraint)
        ) {
            throw new DependencyResolutionError(
                "Unsupported version constraint",
                text,
                line,
            );
        }

        const key = name.toLowerCase();
        if (seen.has(key)) {
            throw new DependencyResolutionError(
                "Duplicate package",
                name,
                line,
            );
        }
        seen.add(key);

        entries.push(Object.freeze({ name, constraint, line }));
    });

    return Object.freeze(entries);
}

export async function readManifest(file: string): Promise<DependencyManifest> {
    let content: string;
    try {
        content = await fs.readFile(file, "utf-8");
    } catch (e) {
        if (isNotFound(e)) {
            throw new DependencyResolutionError(
                `Dependency manifest not found at ${file}`,
            );
        }
        throw e;
    }
    return parseManifest(content);
}

/**
 * The `dependencies` block of the generated package.json.
 */
export function toDependencies(
    manifest: DependencyManifest,
): Record<string, string> {
    const dependencies: Record<string, string> = {};
    for (const entry of manifest) {
        dependencies[entry.name] = entry.constraint;
    }
    return dependencies;
}

/**
 * Stable text form of the manifest; equal manifests give equal text
 * regardless of comments, blank lines or operator spelling.
 */
export function canonicalManifest(manifest: DependencyManifest): string {
    return manifest.map((e) => `${e.name}@${e.constraint}`).join("\n");
}

export function findEntry(
    manifest: DependencyManifest,
    name: string,
): Readonly<ManifestEntry> | undefined {
    const key = name.toLowerCase();
    return manifest.find((entry) => entry.name.toLowerCase() === key);
}
