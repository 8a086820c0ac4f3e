import chalk from "chalk";
import nodePath from "node:path";
import { BuildResult, ImageBuilder, loadProjectConfig } from "@keelson/core";

export async function buildProject(path: string): Promise<BuildResult> {
    const projectDir = nodePath.resolve(path);
    const config = await loadProjectConfig(projectDir);

    console.log(chalk.bold.magenta(`\n[keelson] Building ${projectDir}`));
    const result = await new ImageBuilder(projectDir, config).build();

    const { descriptor } = result.artifact;
    console.log(
        chalk.bold.magenta(
            `[keelson] Artifact ${descriptor.id} (${descriptor.source.files} files, ` +
                `${descriptor.dependencies.entries.length} dependencies)\n`,
        ),
    );
    return result;
}
