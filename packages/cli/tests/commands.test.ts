import fs from "fs/promises";
import net from "net";
import os from "os";
import path from "path";
import {
    Artifact,
    BindError,
    ConfigError,
    DEFAULT_CONFIG,
    Launcher,
    ServiceHandle,
    loadProjectConfig,
    readManifest,
    resolveRuntimeConfig,
    silentLogger,
} from "@keelson/core";

import { initProject } from "../src/commands/init";
import { runtimeConfigFor, serveForeground } from "../src/commands/launch";
import { listArtifacts } from "../src/commands/artifacts";
import { exitWith } from "../src/exit";

async function freePort(): Promise<number> {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (address === null || typeof address === "string") {
        throw new Error("no TCP address");
    }
    return address.port;
}

async function launched(root: string): Promise<ServiceHandle> {
    const dir = path.join(root, "artifact");
    await fs.mkdir(path.join(dir, "app"), { recursive: true });
    await fs.writeFile(
        path.join(dir, "app", "app.js"),
        'exports.app = (req, res) => res.end("ok");\n',
    );
    const artifact: Artifact = {
        dir,
        descriptor: {
            id: "0123456789abcdef",
            createdAt: new Date().toISOString(),
            runtime: { node: process.versions.node },
            dependencies: { key: "none", packageManager: "npm", entries: [] },
            source: { digest: "none", files: 1 },
            entry: { module: "app.js", export: "app" },
            expose: 8080,
        },
    };
    const runtime = resolveRuntimeConfig(
        { PORT: String(await freePort()) },
        "127.0.0.1",
    );
    return new Launcher(artifact, runtime, silentLogger).launch();
}

describe("cli commands", () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), "keelson-cli-"));
        jest.spyOn(console, "log").mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("init scaffolds a project that loads with default settings", async () => {
        const projectDir = path.join(root, "demo");

        const written = await initProject(projectDir);

        expect(written).toEqual([
            ".gitignore",
            "keelson.yml",
            "dependencies.txt",
            "app.js",
        ]);
        expect(await loadProjectConfig(projectDir)).toEqual(DEFAULT_CONFIG);
        expect(
            await readManifest(path.join(projectDir, "dependencies.txt")),
        ).toEqual([]);
        expect(
            await fs.readFile(path.join(projectDir, ".gitignore"), "utf-8"),
        ).toBe(".keelson\nnode_modules\n");
    });

    test("init refuses to overwrite an existing project", async () => {
        const projectDir = path.join(root, "demo");
        await initProject(projectDir);

        await expect(initProject(projectDir)).rejects.toThrow(ConfigError);
    });

    test("runtime config merges the project's env file", async () => {
        await fs.writeFile(path.join(root, "service.env"), "PORT=9000\nMODE=test\n");
        const config = {
            ...DEFAULT_CONFIG,
            launch: { host: "127.0.0.1", envFile: "service.env" },
        };

        const runtime = await runtimeConfigFor(root, config, {});

        expect(runtime.port).toBe(9000);
        expect(runtime.host).toBe("127.0.0.1");
        expect(runtime.env.MODE).toBe("test");
    });

    test("runtime config without env file reads PORT from the environment", async () => {
        const runtime = await runtimeConfigFor(root, DEFAULT_CONFIG, {
            PORT: "9100",
        });

        expect(runtime.port).toBe(9100);
        expect(runtime.host).toBe("0.0.0.0");
    });

    test("artifacts reports when nothing is built", async () => {
        expect(await listArtifacts(root)).toEqual([]);
    });

    test("a termination signal stops the service with exit code 0", async () => {
        const service = await launched(root);
        const listeners = process.listenerCount("SIGTERM");

        const serving = serveForeground(service);
        expect(process.listenerCount("SIGTERM")).toBe(listeners + 1);
        process.emit("SIGTERM", "SIGTERM");

        expect(await serving).toBe(0);
        expect(service.server.listening).toBe(false);
        expect(process.listenerCount("SIGTERM")).toBe(listeners);
    });

    test("an interrupt stops the service with exit code 0", async () => {
        const service = await launched(root);

        const serving = serveForeground(service);
        process.emit("SIGINT", "SIGINT");

        expect(await serving).toBe(0);
    });

    test("a server that stops without a signal exits with code 1", async () => {
        const service = await launched(root);

        const serving = serveForeground(service);
        await service.close();

        expect(await serving).toBe(1);
    });
});

describe("exitWith", () => {
    let error: jest.SpyInstance;

    beforeEach(() => {
        error = jest.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("exits with the code the command returns", async () => {
        const exit = jest.fn();

        await exitWith(async () => 1, exit);
        await exitWith(async () => {}, exit);

        expect(exit.mock.calls).toEqual([[1], [0]]);
        expect(error).not.toHaveBeenCalled();
    });

    test("exits with the code of the error kind and prints it", async () => {
        const exit = jest.fn();

        await exitWith(async () => {
            throw new BindError("Cannot bind 0.0.0.0:80 (EACCES)", 80);
        }, exit);

        expect(exit).toHaveBeenCalledWith(20);
        expect(error).toHaveBeenCalledWith(
            expect.stringContaining("BindError: "),
        );
        expect(error).toHaveBeenCalledWith(
            expect.stringContaining("Cannot bind 0.0.0.0:80 (EACCES)"),
        );
    });

    test("unexpected errors exit with code 1", async () => {
        const exit = jest.fn();

        await exitWith(async () => {
            throw new Error("boom");
        }, exit);

        expect(exit).toHaveBeenCalledWith(1);
    });
});
