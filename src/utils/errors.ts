export type ToolErrorCode =
  | "invalid-argument"
  | "outside-workspace"
  | "not-found"
  | "not-a-file"
  | "not-readable"
  | "unsupported-extension"
  | "read-failed"
  | "shell-escape-disabled";

/** Raised when a tool cannot run at all (bad input, unreadable file). */
export class ToolError extends Error {
  readonly code: ToolErrorCode;

  constructor(code: ToolErrorCode, message: string) {
    super(message);
    this.name = "ToolError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
