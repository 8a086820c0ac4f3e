export * from "./config/ProjectConfig";
export * from "./config/RuntimeConfig";
export * from "./manifest/Manifest";
export * from "./artifact/Artifact";
export { ImageBuilder, dependencyLayerKey } from "./builder/ImageBuilder";
export type { BuildOptions, BuildResult } from "./builder/ImageBuilder";
export { LayerStore } from "./builder/LayerStore";
export type { Layer } from "./builder/LayerStore";
export { SourceTree, ALWAYS_EXCLUDED } from "./builder/SourceTree";
export * from "./builder/installer/DependencyInstaller";
export {
    PackageManagerInstaller,
    identifyFailingEntry,
} from "./builder/installer/PackageManagerInstaller";
export * from "./builder/toolchain/ToolchainProbe";
export { Launcher, bindErrorFor } from "./launcher/Launcher";
export type { LauncherState, ServiceHandle } from "./launcher/Launcher";
export { loadEntryPoint, toRequestListener } from "./launcher/EntryPoint";
export * from "./utils/err";
export { exists } from "./utils/fs";
export { createLogger, silentLogger } from "./utils/log";
export type { Logger } from "./utils/log";
