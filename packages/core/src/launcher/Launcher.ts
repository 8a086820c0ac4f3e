import http from "http";

import { Artifact, sourceDirOf } from "../artifact/Artifact";
import { RuntimeConfig } from "../config/RuntimeConfig";
import { BindError, LauncherStateError, messageOf } from "../utils/err";
import { errorCode } from "../utils/fs";
import { Logger, createLogger } from "../utils/log";
import { loadEntryPoint } from "./EntryPoint";

export type LauncherState = "not-started" | "serving" | "exited";

export interface ServiceHandle {
    readonly port: number;
    readonly host: string;
    readonly server: http.Server;
    /** settles once the server has stopped, for any reason */
    readonly closed: Promise<void>;
    close(): Promise<void>;
}

// ENOTFOUND and EAI_AGAIN come from resolving a host name that does not exist
const BIND_ERRORS = [
    "EADDRINUSE",
    "EACCES",
    "EADDRNOTAVAIL",
    "ENOTFOUND",
    "EAI_AGAIN",
];

/**
 * BindError for an error raised by `listen`, or the error itself when it is
 * not about the address.
 */
export function bindErrorFor(err: unknown, host: string, port: number): unknown {
    const code = errorCode(err);
    if (code !== undefined && BIND_ERRORS.includes(code)) {
        return new BindError(`Cannot bind ${host}:${port} (${code})`, port);
    }
    return err;
}

/**
 * Boots one artifact as one HTTP server. A launcher is used once:
 * not-started -> serving -> exited.
 */
export class Launcher {
    private _state: LauncherState = "not-started";

    constructor(
        private artifact: Artifact,
        private runtime: RuntimeConfig,
        private logger: Logger = createLogger("launcher"),
    ) {}

    get state(): LauncherState {
        return this._state;
    }

    public async launch(): Promise<ServiceHandle> {
        if (this._state !== "not-started") {
            throw new LauncherStateError(
                `Launcher is ${this._state}, it can only be launched once`,
            );
        }

        const { port, host } = this.runtime;
        const { descriptor } = this.artifact;

        try {
            this.exportEnvironment();
            const listener = loadEntryPoint(
                sourceDirOf(this.artifact),
                descriptor.entry,
            );
            const server = http.createServer(listener);
            await this.listen(server, port, host);

            this._state = "serving";
            this.logger.done(
                `Serving ${descriptor.id} on http://${host}:${port}`,
            );
            return this.handle(server);
        } catch (e) {
            this._state = "exited";
            throw e;
        }
    }

    // The application reads its settings from process.env; values already
    // set there win.
    private exportEnvironment(): void {
        for (const [key, value] of Object.entries(this.runtime.env)) {
            if (value !== undefined && process.env[key] === undefined) {
                process.env[key] = value;
            }
        }
    }

    private listen(
        server: http.Server,
        port: number,
        host: string,
    ): Promise<void> {
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => {
                server.close();
                reject(bindErrorFor(err, host, port));
            };

            server.once("error", onError);
            server.listen({ port, host, exclusive: true }, () => {
                server.off("error", onError);
                resolve();
            });
        });
    }

    private handle(server: http.Server): ServiceHandle {
        const closed = new Promise<void>((resolve) => {
            server.once("close", () => {
                this._state = "exited";
                this.logger.detail("Server closed");
                resolve();
            });
        });

        server.on("error", (err) => {
            this.logger.error(`Server error: ${messageOf(err)}`);
            server.close();
        });

        return {
            port: this.runtime.port,
            host: this.runtime.host,
            server,
            closed,
            close: () =>
                new Promise<void>((resolve, reject) => {
                    if (!server.listening) return resolve();
                    server.close((err) => (err ? reject(err) : resolve()));
                    server.closeAllConnections();
                }),
        };
    }
}
