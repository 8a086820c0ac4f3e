import chalk from "chalk";
import nodePath from "node:path";
import {
    ArtifactStore,
    Launcher,
    ProjectConfig,
    RuntimeConfig,
    ServiceHandle,
    loadProjectConfig,
    messageOf,
    resolveRuntimeConfig,
    withEnvFile,
} from "@keelson/core";

export async function runtimeConfigFor(
    projectDir: string,
    config: ProjectConfig,
    env: NodeJS.ProcessEnv,
): Promise<RuntimeConfig> {
    const merged = config.launch.envFile
        ? await withEnvFile(env, nodePath.resolve(projectDir, config.launch.envFile))
        : env;
    return resolveRuntimeConfig(merged, config.launch.host);
}

/**
 * Keeps a launched service in the foreground until SIGINT or SIGTERM.
 * Resolves with the exit code: 0 after a signal, 1 when the server stopped
 * on its own.
 */
export async function serveForeground(service: ServiceHandle): Promise<number> {
    let stopping = false;
    const stop = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        console.log(chalk.dim(`\n[keelson] ${signal} received, shutting down`));
        void service.close().catch((e: unknown) => {
            console.error(chalk.red(`[keelson] ${messageOf(e)}`));
        });
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    await service.closed;
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    return stopping ? 0 : 1;
}

export async function launchProject(
    path: string,
    artifactId?: string,
): Promise<number> {
    const projectDir = nodePath.resolve(path);
    const config = await loadProjectConfig(projectDir);
    const store = new ArtifactStore(projectDir);

    const artifact = artifactId
        ? await store.read(artifactId)
        : await store.latest();
    const runtime = await runtimeConfigFor(projectDir, config, process.env);

    return serveForeground(await new Launcher(artifact, runtime).launch());
}
