// Shared types for the web device, its server and its host dependencies

import type { ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";

// ============================================================================
// Application / Session Types
// ============================================================================

export interface WebApplicationPackage {
  id: string;
  name: string;
  projectDirectory: string;
  /** Directory holding the web entry point (index.html) */
  webSourcePath: string;
}

/**
 * The application currently being served. Replaced on every start, never
 * mutated by the asset server.
 */
export interface BundleContext {
  appName: string;
  webSourcePath: string;
  /** Compiler output directory (contains main.dart.js) */
  compiledOutputPath: string;
  assetBundlePath: string;
}

export type DeviceState = "idle" | "starting" | "running" | "stopping";

export type LaunchResult =
  | { started: true; url: string }
  | { started: false; failure: "compile" };

export interface StartAppOptions {
  /** Entry point passed to the compiler, relative to the project directory */
  mainPath?: string;
}

export interface DeviceLogReader {
  name: string;
  onLine(listener: (line: string) => void): () => void;
  dispose(): void;
}

export type TargetPlatform = "web";

// ============================================================================
// Device Capabilities
// ============================================================================

export interface Device {
  readonly id: string;
  readonly name: string;
  readonly targetPlatform: TargetPlatform;
  readonly isLocalEmulator: boolean;
  readonly sdkNameAndVersion: string;

  readonly supportsHotReload: boolean;
  readonly supportsHotRestart: boolean;
  readonly supportsStartPaused: boolean;
  readonly supportsStopApp: boolean;
  readonly supportsScreenshot: boolean;

  isSupported(): boolean;
  isSupportedForProject(projectDirectory: string): boolean;

  installApp(app: WebApplicationPackage): Promise<boolean>;
  isAppInstalled(app: WebApplicationPackage): Promise<boolean>;
  isLatestBuildInstalled(app: WebApplicationPackage): Promise<boolean>;
  uninstallApp(app: WebApplicationPackage): Promise<boolean>;

  startApp(app: WebApplicationPackage, options?: StartAppOptions): Promise<LaunchResult>;
  stopApp(app?: WebApplicationPackage): Promise<boolean>;

  getLogReader(app: WebApplicationPackage): DeviceLogReader;
  clearLogs(): void;
}

// ============================================================================
// Host Dependencies
// ============================================================================

export interface PlatformInfo {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
}

export interface FileSystem {
  /** True only for regular files; directories do not count */
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  createReadStream(path: string): Readable;
}

export interface ProcessManager {
  /** Start a process without waiting for it */
  start(command: string, args: string[], options: { detached: boolean }): ChildProcess;
  /** Run a process to completion and return its exit code */
  run(command: string, args: string[]): Promise<number>;
}

export interface Logger {
  log(message: string): void;
  error(message: string, err?: unknown): void;
}
