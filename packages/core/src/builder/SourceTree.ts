import fs from "fs/promises";
import path from "path";
import { createHash } from "crypto";

import { STATE_DIR } from "../config/ProjectConfig";

/** Directory names never taken into an artifact, wherever they appear */
export const ALWAYS_EXCLUDED = [STATE_DIR, "node_modules", ".git"];

export interface SourceFile {
    /** path relative to the source root, "/"-separated */
    relative: string;
    absolute: string;
    symlink: boolean;
}

export class SourceTree {
    private constructor(
        public readonly root: string,
        public readonly files: readonly SourceFile[],
    ) {}

    /**
     * Lists the files under `root`, sorted by relative path.
     * @param exclude extra relative paths to leave out
     */
    static async scan(
        root: string,
        exclude: readonly string[] = [],
    ): Promise<SourceTree> {
        const excluded = exclude.map((p) =>
            p.split(path.sep).join("/").replace(/^\.\/|\/+$/g, ""),
        );
        const files: SourceFile[] = [];

        const walk = async (dir: string, prefix: string) => {
            const dirents = await fs.readdir(dir, { withFileTypes: true });
            for (const dirent of dirents) {
                if (ALWAYS_EXCLUDED.includes(dirent.name)) continue;

                const relative = prefix ? `${prefix}/${dirent.name}` : dirent.name;
                if (
                    excluded.some(
                        (e) => relative === e || relative.startsWith(`${e}/`),
                    )
                ) {
                    continue;
                }

                const absolute = path.join(dir, dirent.name);
                if (dirent.isDirectory()) {
                    await walk(absolute, relative);
                } else if (dirent.isFile() || dirent.isSymbolicLink()) {
                    files.push({
                        relative,
                        absolute,
                        symlink: dirent.isSymbolicLink(),
                    });
                }
            }
        };

        await walk(root, "");
        files.sort((a, b) => (a.relative < b.relative ? -1 : 1));
        return new SourceTree(root, files);
    }

    /**
     * sha256 over every relative path and its content (or link target).
     */
    async digest(): Promise<string> {
        const hash = createHash("sha256");
        for (const file of this.files) {
            hash.update(file.relative);
            hash.update("\0");
            if (file.symlink) {
                hash.update(`-> ${await fs.readlink(file.absolute)}`);
            } else {
                hash.update(await fs.readFile(file.absolute));
            }
            hash.update("\0");
        }
        return hash.digest("hex");
    }

    /**
     * Copies every file verbatim below `dest`.
     */
    async copyTo(dest: string): Promise<void> {
        await fs.mkdir(dest, { recursive: true });
        for (const file of this.files) {
            const target = path.join(dest, ...file.relative.split("/"));
            await fs.mkdir(path.dirname(target), { recursive: true });
            if (file.symlink) {
                await fs.symlink(await fs.readlink(file.absolute), target);
            } else {
                await fs.copyFile(file.absolute, target);
            }
        }
    }
}
