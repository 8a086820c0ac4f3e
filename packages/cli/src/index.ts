#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { initProject } from "./commands/init";
import { buildProject } from "./commands/build";
import { launchProject } from "./commands/launch";
import { runProject } from "./commands/run";
import { listArtifacts } from "./commands/artifacts";
import { exitWith } from "./exit";

void yargs(hideBin(process.argv))
    .scriptName("keelson")
    .usage("$0 <cmd> [args]")
    .command(
        "init <name>",
        "Scaffold a new project",
        (yargs) =>
            yargs.positional("name", {
                describe: "Name of the new project directory",
                type: "string",
                demandOption: true,
            }),
        (argv) =>
            exitWith(async () => {
                await initProject(argv.name);
            }),
    )
    .command(
        "build [path]",
        "Build an artifact from the project's source and manifest",
        (yargs) =>
            yargs.positional("path", {
                describe: "Project directory",
                type: "string",
                default: ".",
            }),
        (argv) =>
            exitWith(async () => {
                await buildProject(argv.path);
            }),
    )
    .command(
        "launch [path]",
        "Serve the latest (or a given) artifact in the foreground",
        (yargs) =>
            yargs
                .positional("path", {
                    describe: "Project directory",
                    type: "string",
                    default: ".",
                })
                .option("artifact", {
                    alias: "a",
                    describe: "Artifact id to launch instead of the latest",
                    type: "string",
                }),
        (argv) => exitWith(() => launchProject(argv.path, argv.artifact)),
    )
    .command(
        "run [path]",
        "Build, then launch the new artifact",
        (yargs) =>
            yargs.positional("path", {
                describe: "Project directory",
                type: "string",
                default: ".",
            }),
        (argv) => exitWith(() => runProject(argv.path)),
    )
    .command(
        "artifacts [path]",
        "List built artifacts",
        (yargs) =>
            yargs.positional("path", {
                describe: "Project directory",
                type: "string",
                default: ".",
            }),
        (argv) =>
            exitWith(async () => {
                await listArtifacts(argv.path);
            }),
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
