import { describe, expect, it, vi } from "vitest";
import { ChildProcess } from "node:child_process";
import { Readable } from "node:stream";
import { ChromeLauncher, LINUX_EXECUTABLE, MACOS_EXECUTABLE } from "./chrome-launcher.js";
import { ExecutableNotFoundError, UnsupportedPlatformError } from "./errors.js";
import type { FileSystem, Logger, PlatformInfo, ProcessManager } from "./types.js";

function fakeFs(files: string[]): FileSystem {
  const existing = new Set(files);
  return {
    isFile: (path) => existing.has(path),
    isDirectory: () => false,
    createReadStream: () => Readable.from([]),
  };
}

function fakeProcessManager() {
  const child = new ChildProcess();
  const start = vi.fn<ProcessManager["start"]>(() => child);
  const run = vi.fn<ProcessManager["run"]>(async () => 0);
  const processManager: ProcessManager = { start, run };
  return { child, start, processManager };
}

const logger: Logger = { log: vi.fn(), error: vi.fn() };

function launcherFor(platform: PlatformInfo, files: string[] = []) {
  const pm = fakeProcessManager();
  const launcher = new ChromeLauncher({
    platform,
    fs: fakeFs(files),
    processManager: pm.processManager,
    logger,
  });
  return { launcher, ...pm };
}

describe("ChromeLauncher.resolveExecutable", () => {
  it("uses the fixed application path on macOS", () => {
    const { launcher } = launcherFor({ platform: "darwin", env: {} });

    expect(launcher.resolveExecutable()).toBe(MACOS_EXECUTABLE);
  });

  it("finds google-chrome on PATH on Linux", () => {
    const { launcher } = launcherFor(
      { platform: "linux", env: { PATH: "/usr/local/bin:/usr/bin" } },
      ["/usr/bin/google-chrome"]
    );

    expect(launcher.resolveExecutable()).toBe("/usr/bin/google-chrome");
  });

  it("returns the bare executable name when nothing on PATH matches", () => {
    const { launcher } = launcherFor({ platform: "linux", env: { PATH: "/usr/local/bin:/usr/bin" } });

    expect(launcher.resolveExecutable()).toBe(LINUX_EXECUTABLE);
  });

  it("searches the Windows install prefixes from the environment in order", () => {
    const { launcher } = launcherFor(
      {
        platform: "win32",
        env: {
          PROGRAMFILES: "C:\\Program Files",
          "PROGRAMFILES(X86)": "C:\\Program Files (x86)",
        },
      },
      [
        "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
        "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
      ]
    );

    expect(launcher.resolveExecutable()).toBe(
      "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe"
    );
  });

  it("prefers LOCALAPPDATA over the program files directories", () => {
    const { launcher } = launcherFor(
      {
        platform: "win32",
        env: {
          LOCALAPPDATA: "C:\\Users\\dev\\AppData\\Local",
          PROGRAMFILES: "C:\\Program Files",
          "PROGRAMFILES(X86)": "C:\\Program Files (x86)",
        },
      },
      [
        "C:\\Users\\dev\\AppData\\Local\\Google\\Chrome\\Application\\chrome.exe",
        "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
        "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
      ]
    );

    expect(launcher.resolveExecutable()).toBe(
      "C:\\Users\\dev\\AppData\\Local\\Google\\Chrome\\Application\\chrome.exe"
    );
  });

  it("returns the not-found sentinel when no Windows prefix has Chrome", () => {
    const { launcher } = launcherFor({ platform: "win32", env: { LOCALAPPDATA: "C:\\Users\\dev\\AppData\\Local" } });

    expect(launcher.resolveExecutable()).toBe(".");
  });

  it("throws UnsupportedPlatformError for other platforms", () => {
    const { launcher } = launcherFor({ platform: "freebsd", env: {} });

    expect(() => launcher.resolveExecutable()).toThrow(UnsupportedPlatformError);
    expect(() => launcher.resolveExecutable()).toThrow("Platform freebsd is not supported.");
  });

  it("resolves for an explicitly given platform", () => {
    const { launcher } = launcherFor({ platform: "linux", env: {} });

    expect(launcher.resolveExecutable("darwin")).toBe(MACOS_EXECUTABLE);
  });
});

describe("ChromeLauncher.resolveWindowsExecutable", () => {
  it("skips unset and missing prefixes", () => {
    const { launcher } = launcherFor({ platform: "win32", env: {} }, [
      "C:\\B\\Google\\Chrome\\Application\\chrome.exe",
    ]);

    expect(launcher.resolveWindowsExecutable([null, "C:\\A", "C:\\B"])).toBe(
      "C:\\B\\Google\\Chrome\\Application\\chrome.exe"
    );
  });

  it("returns the first matching prefix", () => {
    const { launcher } = launcherFor({ platform: "win32", env: {} }, [
      "C:\\A\\Google\\Chrome\\Application\\chrome.exe",
      "C:\\B\\Google\\Chrome\\Application\\chrome.exe",
    ]);

    expect(launcher.resolveWindowsExecutable([undefined, "C:\\A", "C:\\B"])).toBe(
      "C:\\A\\Google\\Chrome\\Application\\chrome.exe"
    );
  });
});

describe("ChromeLauncher.launch", () => {
  it("starts Chrome detached with the URL as its only argument", () => {
    const { launcher, start, child } = launcherFor({ platform: "darwin", env: {} }, [MACOS_EXECUTABLE]);

    const launched = launcher.launch("http://127.0.0.1:5000");

    expect(launched).toBe(child);
    expect(start).toHaveBeenCalledTimes(1);
    expect(start).toHaveBeenCalledWith(MACOS_EXECUTABLE, ["http://127.0.0.1:5000"], { detached: true });
  });

  it("throws ExecutableNotFoundError without starting a process", () => {
    const { launcher, start } = launcherFor({ platform: "darwin", env: {} });

    expect(() => launcher.launch("http://127.0.0.1:5000")).toThrow(ExecutableNotFoundError);
    expect(() => launcher.launch("http://127.0.0.1:5000")).toThrow(
      `Chrome executable not found at ${MACOS_EXECUTABLE}`
    );
    expect(start).not.toHaveBeenCalled();
  });

  it("fails on Windows when no prefix has Chrome", () => {
    const { launcher, start } = launcherFor({ platform: "win32", env: {} });

    expect(() => launcher.launch("http://127.0.0.1:5000")).toThrow("Chrome executable not found at .");
    expect(start).not.toHaveBeenCalled();
  });

  it("logs process errors instead of crashing", () => {
    const { launcher, child } = launcherFor({ platform: "darwin", env: {} }, [MACOS_EXECUTABLE]);
    launcher.launch("http://127.0.0.1:5000");

    const err = new Error("spawn EACCES");
    child.emit("error", err);

    expect(logger.error).toHaveBeenCalledWith(`Chrome process error (${MACOS_EXECUTABLE}):`, err);
  });
});
