import nodePath from "node:path";
import { Launcher, loadProjectConfig } from "@keelson/core";

import { buildProject } from "./build";
import { runtimeConfigFor, serveForeground } from "./launch";

/**
 * Builds the project, then serves the fresh artifact in the foreground.
 */
export async function runProject(path: string): Promise<number> {
    const projectDir = nodePath.resolve(path);
    const config = await loadProjectConfig(projectDir);
    // resolve PORT before building so a bad value fails fast
    const runtime = await runtimeConfigFor(projectDir, config, process.env);

    const { artifact } = await buildProject(projectDir);
    return serveForeground(await new Launcher(artifact, runtime).launch());
}
