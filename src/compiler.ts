import { join } from "node:path";
import { MAIN_SCRIPT } from "./asset-server.js";
import { nodeProcessManager } from "./host.js";
import type { ProcessManager } from "./types.js";

export interface CompileOptions {
  minify: boolean;
  enableAssertions: boolean;
}

export interface WebCompiler {
  /** Compile an entry point to JavaScript. Nonzero means failure. */
  compile(entryPath: string, options: CompileOptions): Promise<number>;
}

/**
 * Runs an external compiler command, writing `main.dart.js` into `outputDirectory`
 */
export class CommandWebCompiler implements WebCompiler {
  constructor(
    private readonly command: string,
    private readonly outputDirectory: string,
    private readonly processManager: ProcessManager = nodeProcessManager
  ) {}

  buildArgs(entryPath: string, options: CompileOptions): string[] {
    const args = ["-o", join(this.outputDirectory, MAIN_SCRIPT)];
    if (options.minify) {
      args.push("--minify");
    }
    if (options.enableAssertions) {
      args.push("--enable-asserts");
    }
    args.push(entryPath);
    return args;
  }

  compile(entryPath: string, options: CompileOptions): Promise<number> {
    return this.processManager.run(this.command, this.buildArgs(entryPath, options));
  }
}
