/**
 * A condition the tool cannot recover from. Scripts print the message and
 * exit with `exitCode`; nothing below them catches it.
 */
export class ToolExit extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ToolExit";
    this.exitCode = exitCode;
  }
}

export class BundleBuildFailure extends ToolExit {
  constructor(message = "Error: Failed to build asset bundle") {
    super(message);
    this.name = "BundleBuildFailure";
  }
}

export class UnsupportedPlatformError extends ToolExit {
  readonly platform: string;

  constructor(platform: string) {
    super(`Platform ${platform} is not supported.`);
    this.name = "UnsupportedPlatformError";
    this.platform = platform;
  }
}

export class ExecutableNotFoundError extends ToolExit {
  readonly executable: string;

  constructor(executable: string) {
    super(`Chrome executable not found at ${executable}`);
    this.name = "ExecutableNotFoundError";
    this.executable = executable;
  }
}

export class BindError extends Error {
  constructor(host: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to bind asset server on ${host}: ${reason}`, { cause });
    this.name = "BindError";
  }
}
