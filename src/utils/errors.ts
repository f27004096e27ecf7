/**
 * Error taxonomy shared by the CLI, the file tools and the MCP server.
 *
 * The formatter itself never throws; everything here concerns reading and
 * writing files, configuration and command-line usage.
 */

export type FmtLatexErrorCode =
  | "read-failed"
  | "write-failed"
  | "outside-workspace"
  | "invalid-config"
  | "usage";

export class FmtLatexError extends Error {
  readonly code: FmtLatexErrorCode;

  constructor(code: FmtLatexErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FmtLatexError";
    this.code = code;
  }
}

export class FormatIoError extends FmtLatexError {
  readonly path: string;

  constructor(code: "read-failed" | "write-failed" | "outside-workspace", path: string, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "FormatIoError";
    this.path = path;
  }
}

export class ConfigError extends FmtLatexError {
  constructor(message: string, options?: ErrorOptions) {
    super("invalid-config", message, options);
    this.name = "ConfigError";
  }
}

export class UsageError extends FmtLatexError {
  constructor(message: string) {
    super("usage", message);
    this.name = "UsageError";
  }
}

// Node system errors carry e.g. "ENOENT" in `code`
export function systemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
