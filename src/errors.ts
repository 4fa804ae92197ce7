export type SetupErrorCode = "SOURCE_INACCESSIBLE" | "TARGET_UNWRITABLE" | "AUDIT_UNAVAILABLE";

/**
 * Raised before any file is touched. The CLI maps it to exit code 1.
 */
export class SetupError extends Error {
  readonly code: SetupErrorCode;

  constructor(code: SetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetupError";
    this.code = code;
  }
}

export class MoveError extends Error {
  readonly source: string;
  readonly destination: string;

  constructor(source: string, destination: string, options?: { cause?: unknown }) {
    const reason = options?.cause === undefined ? "unknown error" : formatError(options.cause);
    super(`move ${source} -> ${destination} failed: ${reason}`, options);
    this.name = "MoveError";
    this.source = source;
    this.destination = destination;
  }
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
