import chalk from "chalk";
import nodePath from "node:path";
import { ArtifactStore } from "@keelson/core";

export async function listArtifacts(path: string): Promise<string[]> {
    const store = new ArtifactStore(nodePath.resolve(path));
    const artifacts = await store.list();
    const latest = await store.latestId();

    if (artifacts.length === 0) {
        console.log(chalk.yellow("No artifacts built yet."));
        return [];
    }

    const lines = artifacts.map(({ descriptor }) => {
        const marker = descriptor.id === latest ? " (latest)" : "";
        return `${descriptor.id}  ${descriptor.createdAt}  ${descriptor.entry.module}#${descriptor.entry.export}${marker}`;
    });
    for (const line of lines) console.log(line);
    return lines;
}
