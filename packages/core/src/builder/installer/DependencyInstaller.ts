import { PackageManager } from "../../config/ProjectConfig";
import { DependencyManifest } from "../../manifest/Manifest";

export interface DependencyInstaller {
    readonly packageManager: PackageManager;

    /**
     * Install every manifest entry into `dir`, leaving a `node_modules`
     * directory behind
     * @param dir empty staging directory owned by the builder
     * @param manifest entries to resolve
     */
    install(dir: string, manifest: DependencyManifest): Promise<void>;
}
