/**
 * Error classes thrown inside the pipeline.
 * Provider and recognition failures are returned as values instead; these
 * cover the conditions that must stop an item (or startup) outright.
 */

/** Output or staging directory could not be created, written or moved into */
export class FatalIOError extends Error {
  constructor(
    public readonly operation: string,
    public readonly targetPath: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for ${targetPath}: ${detail}`);
    this.name = "FatalIOError";
  }
}

/** Configuration file or flag values are unusable */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export interface MissingTool {
  command: string;
  purpose: string;
  installHint: string;
}

/** One or more external tools are not installed */
export class ToolNotFoundError extends Error {
  constructor(public readonly missing: MissingTool[]) {
    const details = missing
      .map((t) => `  ${t.command} (${t.purpose}):\n    ${t.installHint}`)
      .join("\n\n");
    super(`Missing required tool(s):\n\n${details}`);
    this.name = "ToolNotFoundError";
  }
}

/** Format any thrown value as a one-line reason */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
