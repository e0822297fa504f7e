/**
 * Default host dependencies backed by Node. Components take these through
 * their options so tests can swap them out.
 */

import { spawn } from "node:child_process";
import { createReadStream, statSync } from "node:fs";
import { platform } from "node:os";
import type { FileSystem, Logger, PlatformInfo, ProcessManager } from "./types.js";

function statOrNull(path: string) {
  return statSync(path, { throwIfNoEntry: false }) ?? null;
}

export const nodeFileSystem: FileSystem = {
  isFile(path) {
    return statOrNull(path)?.isFile() ?? false;
  },
  isDirectory(path) {
    return statOrNull(path)?.isDirectory() ?? false;
  },
  createReadStream(path) {
    return createReadStream(path);
  },
};

export const nodeProcessManager: ProcessManager = {
  start(command, args, { detached }) {
    return spawn(command, args, {
      detached,
      stdio: detached ? "ignore" : "inherit",
    });
  },

  run(command, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: "inherit" });
      child.on("error", reject);
      child.on("close", (code) => resolve(code ?? 1));
    });
  },
};

export function currentPlatform(): PlatformInfo {
  return { platform: platform(), env: process.env };
}

export const consoleLogger: Logger = {
  log(message) {
    console.log(message);
  },
  error(message, err) {
    if (err === undefined) {
      console.error(message);
    } else {
      console.error(message, err);
    }
  },
};
