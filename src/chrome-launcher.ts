/**
 * Chrome Launcher - Finds the system Chrome and opens it at a URL
 *
 * Chrome is started detached and never tracked afterwards. There is no way to
 * tell which Chrome processes belong to this tool, so stopping a device
 * leaves its browser window open rather than risk killing the user's own.
 */

import type { ChildProcess } from "node:child_process";
import { posix, win32 } from "node:path";
import { ExecutableNotFoundError, UnsupportedPlatformError } from "./errors.js";
import { consoleLogger, currentPlatform, nodeFileSystem, nodeProcessManager } from "./host.js";
import type { FileSystem, Logger, PlatformInfo, ProcessManager } from "./types.js";

export const LINUX_EXECUTABLE = "google-chrome";
export const MACOS_EXECUTABLE = "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome";
export const WINDOWS_EXECUTABLE = "Google\\Chrome\\Application\\chrome.exe";

// Returned when no Windows install prefix has Chrome; never an existing file
const WINDOWS_NOT_FOUND = ".";

// Install roots searched on Windows, in order
const WINDOWS_PREFIX_VARS = ["LOCALAPPDATA", "PROGRAMFILES", "PROGRAMFILES(X86)"] as const;

export interface ChromeLauncherOptions {
  platform?: PlatformInfo;
  fs?: FileSystem;
  processManager?: ProcessManager;
  logger?: Logger;
}

export class ChromeLauncher {
  private readonly platform: PlatformInfo;
  private readonly fs: FileSystem;
  private readonly processManager: ProcessManager;
  private readonly logger: Logger;

  constructor(options: ChromeLauncherOptions = {}) {
    this.platform = options.platform ?? currentPlatform();
    this.fs = options.fs ?? nodeFileSystem;
    this.processManager = options.processManager ?? nodeProcessManager;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Get the Chrome executable path for a platform
   */
  resolveExecutable(platform: NodeJS.Platform = this.platform.platform): string {
    switch (platform) {
      case "darwin":
        return MACOS_EXECUTABLE;
      case "linux":
        return this.searchPath(LINUX_EXECUTABLE);
      case "win32":
        return this.resolveWindowsExecutable(
          WINDOWS_PREFIX_VARS.map((name) => this.platform.env[name])
        );
      default:
        throw new UnsupportedPlatformError(platform);
    }
  }

  /**
   * First `<prefix>\Google\Chrome\Application\chrome.exe` that exists.
   * Unset prefixes are skipped.
   */
  resolveWindowsExecutable(prefixes: ReadonlyArray<string | null | undefined>): string {
    for (const prefix of prefixes) {
      if (!prefix) continue;
      const candidate = win32.join(prefix, WINDOWS_EXECUTABLE);
      if (this.fs.isFile(candidate)) {
        return candidate;
      }
    }
    return WINDOWS_NOT_FOUND;
  }

  /**
   * Launch Chrome to a particular `host` page
   */
  launch(host: string): ChildProcess {
    const executable = this.resolveExecutable();

    if (!this.fs.isFile(executable)) {
      throw new ExecutableNotFoundError(executable);
    }

    const chromeProcess = this.processManager.start(executable, [host], { detached: true });
    chromeProcess.on("error", (err) => {
      this.logger.error(`Chrome process error (${executable}):`, err);
    });
    chromeProcess.unref();

    return chromeProcess;
  }

  // Resolve a bare command name the way a shell would; returns the name
  // unchanged when nothing on PATH matches
  private searchPath(command: string): string {
    const searchDirs = (this.platform.env.PATH ?? "").split(posix.delimiter).filter(Boolean);
    for (const dir of searchDirs) {
      const candidate = posix.join(dir, command);
      if (this.fs.isFile(candidate)) {
        return candidate;
      }
    }
    return command;
  }
}
