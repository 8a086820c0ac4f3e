import fs from "fs/promises";
import path from "path";

import { exists, stagingName } from "../utils/fs";

const COMPLETE_MARKER = ".complete";

export interface Layer {
    key: string;
    dir: string;
    cached: boolean;
}

/**
 * Content-addressed directories under `root`. A layer is visible only once
 * it has been populated completely.
 */
export class LayerStore {
    constructor(private root: string) {}

    pathOf(key: string): string {
        return path.join(this.root, key);
    }

    async has(key: string): Promise<boolean> {
        return exists(path.join(this.pathOf(key), COMPLETE_MARKER));
    }

    /**
     * Returns the layer for `key`, running `populate` in a staging directory
     * first when the layer does not exist yet.
     */
    async ensure(
        key: string,
        populate: (dir: string) => Promise<void>,
    ): Promise<Layer> {
        const dir = this.pathOf(key);
        if (await this.has(key)) return { key, dir, cached: true };

        await fs.mkdir(this.root, { recursive: true });
        const staging = path.join(this.root, stagingName());
        await fs.mkdir(staging);

        try {
            await populate(staging);
            await fs.writeFile(
                path.join(staging, COMPLETE_MARKER),
                new Date().toISOString(),
            );
            // leftover of an interrupted build
            await fs.rm(dir, { recursive: true, force: true });
            await fs.rename(staging, dir);
        } catch (e) {
            await fs.rm(staging, { recursive: true, force: true });
            throw e;
        }

        return { key, dir, cached: false };
    }
}
