#!/usr/bin/env npx tsx
/**
 * Compile a project, serve it and open Chrome
 *
 * Usage:
 *   FLUTTER_WEB=true npx tsx scripts/start-web-device.ts
 *   FLUTTER_WEB=true npx tsx scripts/start-web-device.ts --project ../my_app --target lib/main.dart
 *   FLUTTER_WEB=true npx tsx scripts/start-web-device.ts --name my_app --config /path/to/config.json
 */

import { resolveDeviceConfig } from "../src/config.js";
import { ToolExit } from "../src/errors.js";
import { WebDevice, createWebApplicationPackage } from "../src/web-device.js";

// Parse command line args
const args = process.argv.slice(2);
const flags: Record<string, string> = {};

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  const value = args[i + 1];
  if (arg?.startsWith("--") && value !== undefined) {
    flags[arg.slice(2)] = value;
    i++;
  }
}

async function main() {
  const config = resolveDeviceConfig({ configPath: flags.config });
  const device = new WebDevice({ config });

  if (!device.isSupported()) {
    throw new ToolExit("The web device is disabled. Set FLUTTER_WEB=true on a non-stable channel.");
  }

  const projectDirectory = flags.project ?? process.cwd();
  if (!device.isSupportedForProject(projectDirectory)) {
    throw new ToolExit(`No web/ directory found in ${projectDirectory}`);
  }

  const app = createWebApplicationPackage(projectDirectory, flags.name);
  const result = await device.startApp(app, { mainPath: flags.target });
  if (!result.started) {
    process.exit(1);
  }

  console.log("");
  console.log(`${app.name} is running at ${result.url}`);
  console.log("Press Ctrl+C to stop.");

  // Chrome stays open after we exit
  const signalHandler = () => {
    device.stopApp(app).then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Failed to stop asset server:", err);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", signalHandler);
  process.on("SIGTERM", signalHandler);
  process.on("SIGHUP", signalHandler);
}

main().catch((err: unknown) => {
  if (err instanceof ToolExit) {
    console.error(err.message);
    process.exit(err.exitCode);
  }
  console.error("Failed to start web device:", err);
  process.exit(1);
});
