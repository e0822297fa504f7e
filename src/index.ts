export { AssetServer, resolveAsset, MAIN_SCRIPT } from "./asset-server.js";
export type { AssetServerOptions, ServerAddress } from "./asset-server.js";
export { DirectoryAssetBundle, writeBundle, ASSET_MANIFEST } from "./bundle.js";
export type { AssetBundle } from "./bundle.js";
export { ChromeLauncher } from "./chrome-launcher.js";
export type { ChromeLauncherOptions } from "./chrome-launcher.js";
export { CommandWebCompiler } from "./compiler.js";
export type { CompileOptions, WebCompiler } from "./compiler.js";
export {
  resolveDeviceConfig,
  loadConfigFile,
  isWebEnabled,
  getWebBuildDirectory,
  getAssetBuildDirectory,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
} from "./config.js";
export type { ConfigFile, DeviceConfig, ResolveConfigOptions } from "./config.js";
export {
  ToolExit,
  BundleBuildFailure,
  UnsupportedPlatformError,
  ExecutableNotFoundError,
  BindError,
} from "./errors.js";
export { consoleLogger, currentPlatform, nodeFileSystem, nodeProcessManager } from "./host.js";
export {
  WebDevice,
  WebDevices,
  NoOpDeviceLogReader,
  createWebApplicationPackage,
  DEFAULT_MAIN_PATH,
} from "./web-device.js";
export type { WebDeviceOptions } from "./web-device.js";
export type * from "./types.js";
