import fs from "fs";
import path from "path";
import { RequestListener } from "http";
import { createRequire } from "module";

import { EntryPoint } from "../config/ProjectConfig";
import { EntryPointError, messageOf } from "../utils/err";

function isListener(value: unknown): value is RequestListener {
    return typeof value === "function";
}

function exportOf(loaded: unknown, name: string): unknown {
    if (typeof loaded !== "object" && typeof loaded !== "function") {
        return undefined;
    }
    if (loaded === null) return undefined;

    if (name in loaded) return Reflect.get(loaded, name);
    // module.exports = app, asked for as "default"
    if (name === "default") return loaded;
    // compiled ES modules keep named exports on the default export too
    if ("default" in loaded) return exportOf(loaded.default, name);
    return undefined;
}

/**
 * Request listener for an exported value: the value itself when it is a
 * function, or the result of its `callback()` (Koa applications).
 */
export function toRequestListener(value: unknown): RequestListener | undefined {
    if (isListener(value)) return value;

    if (
        typeof value === "object" &&
        value !== null &&
        "callback" in value &&
        typeof value.callback === "function"
    ) {
        const listener: unknown = value.callback();
        if (isListener(listener)) return listener;
    }
    return undefined;
}

/**
 * Requires `entry.module` from the artifact's source directory and returns
 * the request listener exported under `entry.export`.
 */
export function loadEntryPoint(
    sourceDir: string,
    entry: EntryPoint,
): RequestListener {
    const fail: (message: string) => never = (message) => {
        throw new EntryPointError(message, entry.module, entry.export);
    };
    const lexicalRoot = path.resolve(sourceDir);
    if (!path.resolve(lexicalRoot, entry.module).startsWith(lexicalRoot + path.sep)) {
        return fail("Entry module lies outside the source tree");
    }

    let root: string;
    try {
        root = fs.realpathSync(lexicalRoot);
    } catch {
        return fail("Entry module not found");
    }

    // resolved the way require does, so "app" finds app.js or app/index.js
    const requireFromRoot = createRequire(path.join(root, "noop.js"));
    let modulePath: string;
    try {
        modulePath = fs.realpathSync(
            requireFromRoot.resolve(path.resolve(root, entry.module)),
        );
    } catch {
        return fail("Entry module not found");
    }
    if (!modulePath.startsWith(root + path.sep)) {
        return fail("Entry module lies outside the source tree");
    }

    let loaded: unknown;
    try {
        loaded = requireFromRoot(modulePath);
    } catch (e) {
        return fail(`Entry module failed to load: ${messageOf(e)}`);
    }

    const exported = exportOf(loaded, entry.export);
    if (exported === undefined) {
        return fail(`Entry module has no export named '${entry.export}'`);
    }

    const listener = toRequestListener(exported);
    if (!listener) {
        return fail(
            `Export '${entry.export}' is not a request listener (got ${typeof exported})`,
        );
    }
    return listener;
}
