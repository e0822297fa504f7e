/**
 * Asset bundle - collects the files an app ships and writes them to the
 * build directory the asset server reads from
 */

import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join, relative, sep } from "node:path";
import { consoleLogger } from "./host.js";
import type { Logger } from "./types.js";

export const ASSET_MANIFEST = "AssetManifest.json";

export interface AssetBundle {
  /** Output-relative path (always "/"-separated) to file contents */
  readonly entries: Map<string, Buffer>;
  /** Collect entries. Nonzero means failure. */
  build(): Promise<number>;
}

async function listFiles(dir: string): Promise<string[]> {
  const found: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await listFiles(path)));
    } else if (entry.isFile()) {
      found.push(path);
    }
  }
  return found;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Bundles every file under `<projectDirectory>/assets` as `assets/<path>`,
 * plus an AssetManifest.json listing them
 */
export class DirectoryAssetBundle implements AssetBundle {
  readonly entries = new Map<string, Buffer>();

  constructor(
    private readonly projectDirectory: string,
    private readonly logger: Logger = consoleLogger
  ) {}

  async build(): Promise<number> {
    this.entries.clear();
    const assetsDir = join(this.projectDirectory, "assets");

    let files: string[];
    try {
      files = await listFiles(assetsDir);
    } catch (err) {
      if (!isMissing(err)) {
        this.logger.error(`Failed to list assets in ${assetsDir}:`, err);
        return 1;
      }
      files = [];
    }

    const manifest: Record<string, string[]> = {};
    try {
      for (const file of files.sort()) {
        const key = ["assets", ...relative(assetsDir, file).split(sep)].join("/");
        this.entries.set(key, await readFile(file));
        manifest[key] = [key];
      }
    } catch (err) {
      this.logger.error("Failed to read asset:", err);
      this.entries.clear();
      return 1;
    }

    this.entries.set(ASSET_MANIFEST, Buffer.from(JSON.stringify(manifest)));
    return 0;
  }
}

/**
 * Replace the contents of `directory` with the bundle entries
 */
export async function writeBundle(directory: string, entries: Map<string, Buffer>): Promise<void> {
  await rm(directory, { recursive: true, force: true });
  await mkdir(directory, { recursive: true });

  for (const [key, content] of entries) {
    const target = join(directory, ...key.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}
