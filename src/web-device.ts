/**
 * Web Device - compiles an app to JavaScript, serves it on loopback and
 * opens Chrome at the server
 *
 * Lifecycle: idle -> starting -> running -> stopping -> idle. startApp and
 * stopApp calls are queued, so a stop issued during a start runs once that
 * start has settled.
 */

import { basename, join, resolve } from "node:path";
import { AssetServer } from "./asset-server.js";
import { DirectoryAssetBundle, writeBundle, type AssetBundle } from "./bundle.js";
import { ChromeLauncher } from "./chrome-launcher.js";
import { CommandWebCompiler, type WebCompiler } from "./compiler.js";
import { getAssetBuildDirectory, getWebBuildDirectory, type DeviceConfig } from "./config.js";
import { BundleBuildFailure } from "./errors.js";
import { consoleLogger, nodeFileSystem, nodeProcessManager } from "./host.js";
import type {
  BundleContext,
  Device,
  DeviceLogReader,
  DeviceState,
  FileSystem,
  LaunchResult,
  Logger,
  ProcessManager,
  StartAppOptions,
  WebApplicationPackage,
} from "./types.js";

export const DEFAULT_MAIN_PATH = join("lib", "main.dart");

export function createWebApplicationPackage(
  projectDirectory: string,
  name?: string
): WebApplicationPackage {
  const directory = resolve(projectDirectory);
  const appName = name ?? basename(directory);
  return {
    id: appName,
    name: appName,
    projectDirectory: directory,
    webSourcePath: join(directory, "web"),
  };
}

export class NoOpDeviceLogReader implements DeviceLogReader {
  constructor(readonly name: string) {}

  onLine(_listener: (line: string) => void): () => void {
    return () => {};
  }

  dispose(): void {}
}

export interface WebDeviceOptions {
  config: DeviceConfig;
  server?: AssetServer;
  launcher?: ChromeLauncher;
  fs?: FileSystem;
  processManager?: ProcessManager;
  logger?: Logger;
  createCompiler?: (app: WebApplicationPackage) => WebCompiler;
  createBundle?: (app: WebApplicationPackage) => AssetBundle;
}

export class WebDevice implements Device {
  readonly id = "web";
  readonly name = "web";
  readonly targetPlatform = "web";
  readonly isLocalEmulator = false;
  readonly sdkNameAndVersion = "web";

  // Reload and restart are advertised; the protocols live elsewhere
  readonly supportsHotReload = true;
  readonly supportsHotRestart = true;
  readonly supportsStartPaused = true;
  readonly supportsStopApp = true;
  readonly supportsScreenshot = false;

  private readonly config: DeviceConfig;
  private readonly server: AssetServer;
  private readonly launcher: ChromeLauncher;
  private readonly fs: FileSystem;
  private readonly logger: Logger;
  private readonly createCompiler: (app: WebApplicationPackage) => WebCompiler;
  private readonly createBundle: (app: WebApplicationPackage) => AssetBundle;

  private currentState: DeviceState = "idle";
  private context: BundleContext | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: WebDeviceOptions) {
    this.config = options.config;
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? consoleLogger;

    const processManager = options.processManager ?? nodeProcessManager;
    this.server = options.server ?? new AssetServer({ fs: this.fs, logger: this.logger });
    this.launcher =
      options.launcher ??
      new ChromeLauncher({ fs: this.fs, processManager, logger: this.logger });
    this.createCompiler =
      options.createCompiler ??
      ((app) =>
        new CommandWebCompiler(
          this.config.compilerCommand,
          getWebBuildDirectory(this.config, app.projectDirectory),
          processManager
        ));
    this.createBundle =
      options.createBundle ?? ((app) => new DirectoryAssetBundle(app.projectDirectory, this.logger));
  }

  get state(): DeviceState {
    return this.currentState;
  }

  get bundleContext(): BundleContext | null {
    return this.context;
  }

  get serverUrl(): string | null {
    return this.server.address?.url ?? null;
  }

  isSupported(): boolean {
    return this.config.webEnabled;
  }

  isSupportedForProject(projectDirectory: string): boolean {
    return this.fs.isDirectory(join(projectDirectory, "web"));
  }

  async installApp(_app: WebApplicationPackage): Promise<boolean> {
    return true;
  }

  async isAppInstalled(_app: WebApplicationPackage): Promise<boolean> {
    return true;
  }

  async isLatestBuildInstalled(_app: WebApplicationPackage): Promise<boolean> {
    return true;
  }

  async uninstallApp(_app: WebApplicationPackage): Promise<boolean> {
    return true;
  }

  getLogReader(app: WebApplicationPackage): DeviceLogReader {
    return new NoOpDeviceLogReader(app.name);
  }

  clearLogs(): void {}

  /**
   * Compile, bundle, serve and open Chrome. A running session is stopped
   * first. Compile errors are reported in the result; bundle errors throw
   * BundleBuildFailure.
   */
  startApp(app: WebApplicationPackage, options: StartAppOptions = {}): Promise<LaunchResult> {
    return this.enqueue(() => this.runStart(app, options));
  }

  /**
   * Close the asset server. Chrome is left open.
   */
  stopApp(_app?: WebApplicationPackage): Promise<boolean> {
    return this.enqueue(async () => {
      await this.teardown();
      return true;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runStart(app: WebApplicationPackage, options: StartAppOptions): Promise<LaunchResult> {
    if (this.currentState !== "idle") {
      await this.teardown();
    }
    this.currentState = "starting";

    try {
      const entryPath = resolve(app.projectDirectory, options.mainPath ?? DEFAULT_MAIN_PATH);
      this.logger.log(`Compiling ${app.name} to JavaScript...`);
      const result = await this.createCompiler(app).compile(entryPath, {
        minify: false,
        enableAssertions: true,
      });
      if (result !== 0) {
        this.logger.error(`Failed to compile ${app.name} to JavaScript`);
        this.currentState = "idle";
        return { started: false, failure: "compile" };
      }

      const bundle = this.createBundle(app);
      if ((await bundle.build()) !== 0) {
        throw new BundleBuildFailure();
      }
      const assetBundlePath = getAssetBuildDirectory(this.config, app.projectDirectory);
      await writeBundle(assetBundlePath, bundle.entries);

      this.context = {
        appName: app.name,
        webSourcePath: app.webSourcePath,
        compiledOutputPath: getWebBuildDirectory(this.config, app.projectDirectory),
        assetBundlePath,
      };
      this.server.setContext(this.context);

      const { url } = await this.server.bind();
      this.logger.log(`Serving assets from ${url}`);
      this.launcher.launch(url);

      this.currentState = "running";
      return { started: true, url };
    } catch (err) {
      await this.teardown();
      throw err;
    }
  }

  private async teardown(): Promise<void> {
    if (this.currentState === "idle" && !this.server.isListening) return;

    this.currentState = "stopping";
    try {
      await this.server.shutdown();
    } finally {
      this.context = null;
      this.server.setContext(null);
      this.currentState = "idle";
    }
  }
}

/**
 * Discovery for the web device: lists the single device when enabled
 */
export class WebDevices {
  readonly name = "web";
  private readonly device: WebDevice;

  constructor(options: WebDeviceOptions) {
    this.device = new WebDevice(options);
  }

  get canListAnything(): boolean {
    return this.device.isSupported();
  }

  get supportsPlatform(): boolean {
    return this.device.isSupported();
  }

  async pollingGetDevices(): Promise<Device[]> {
    return [this.device];
  }

  async devices(): Promise<Device[]> {
    if (!this.canListAnything) return [];
    return this.pollingGetDevices();
  }
}
