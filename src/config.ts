/**
 * Device configuration, resolved once at startup and passed down.
 *
 * The web device is only listed or launched when `FLUTTER_WEB=true` is set
 * and the configured channel is not "stable".
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join } from "node:path";
import { z } from "zod";

export const ENABLE_ENV_VAR = "FLUTTER_WEB";

const ConfigFileSchema = z.object({
  /** Release channel of the toolkit; the web device is hidden on "stable" */
  channel: z.string().min(1),
  /** Build output root, relative to the project unless absolute */
  buildDirectory: z.string().min(1),
  /** Command that compiles the entry point to JavaScript */
  compilerCommand: z.string().min(1),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface DeviceConfig extends ConfigFile {
  webEnabled: boolean;
}

export const DEFAULT_CONFIG: ConfigFile = {
  channel: "master",
  buildDirectory: "build",
  compilerCommand: "dart2js",
};

export const DEFAULT_CONFIG_PATH = join(homedir(), ".web-preview-device", "config.json");

/**
 * Load or create the config file
 */
export function loadConfigFile(configPath: string = DEFAULT_CONFIG_PATH): ConfigFile {
  if (!existsSync(configPath)) {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2));
    console.log(`Created default config at: ${configPath}`);
    return { ...DEFAULT_CONFIG };
  }

  const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
  const parsed = ConfigFileSchema.partial().safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config at ${configPath}: ${issues}`);
  }

  return { ...DEFAULT_CONFIG, ...parsed.data };
}

export function isWebEnabled(env: NodeJS.ProcessEnv, channel: string): boolean {
  return env[ENABLE_ENV_VAR]?.toLowerCase() === "true" && channel !== "stable";
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

export function resolveDeviceConfig(options: ResolveConfigOptions = {}): DeviceConfig {
  const env = options.env ?? process.env;
  const file = loadConfigFile(options.configPath);
  return { ...file, webEnabled: isWebEnabled(env, file.channel) };
}

function buildRoot(config: ConfigFile, projectDirectory: string): string {
  return isAbsolute(config.buildDirectory)
    ? config.buildDirectory
    : join(projectDirectory, config.buildDirectory);
}

/** Where the compiler writes main.dart.js */
export function getWebBuildDirectory(config: ConfigFile, projectDirectory: string): string {
  return join(buildRoot(config, projectDirectory), "web");
}

/** Where the asset bundle is written before serving */
export function getAssetBuildDirectory(config: ConfigFile, projectDirectory: string): string {
  return join(buildRoot(config, projectDirectory), "flutter_assets");
}
