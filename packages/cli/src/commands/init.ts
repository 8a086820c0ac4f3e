import chalk from "chalk";
import fs from "node:fs/promises";
import nodePath from "node:path";
import { CONFIG_FILE, ConfigError, exists } from "@keelson/core";

const DEFAULT_CONFIG = `# keelson project
source: "."
manifest: "dependencies.txt"
entry:
    module: "app.js"
    export: "app"
runtime:
    node: ">=20"
build:
    packageManager: "npm"
    # commands native add-ons need, e.g. [python3, make, g++]
    toolchain: []
expose: 8080
`;

const DEFAULT_MANIFEST = `# One dependency per line, e.g.
#   express==4.19.2
#   pino@^9
`;

const DEFAULT_APP = `// Request listener served by "keelson launch"
exports.app = (req, res) => {
    res.setHeader("content-type", "application/json");
    res.end(JSON.stringify({ ok: true, path: req.url }));
};
`;

const FILES: [string, string][] = [
    [".gitignore", ".keelson\nnode_modules\n"],
    [CONFIG_FILE, DEFAULT_CONFIG],
    ["dependencies.txt", DEFAULT_MANIFEST],
    ["app.js", DEFAULT_APP],
];

/**
 * Scaffolds a project in `name` and returns the files written.
 */
export async function initProject(name: string): Promise<string[]> {
    const projectDir = nodePath.resolve(name);

    await fs.mkdir(projectDir, { recursive: true });
    console.log(chalk.green(`Created directory ${name}/`));

    const configPath = nodePath.join(projectDir, CONFIG_FILE);
    if (await exists(configPath)) {
        throw new ConfigError("project is already initialized", configPath);
    }

    const written: string[] = [];
    for (const [file, content] of FILES) {
        await fs.writeFile(nodePath.join(projectDir, file), content);
        console.log(chalk.gray(`Created ${name}/${file}`));
        written.push(file);
    }

    console.log(chalk.green(`\nProject '${name}' initialized successfully!`));
    console.log(chalk.white(`Run with: keelson run ${name}`));
    return written;
}
