/**
 * Bootstrap error taxonomy. Every variant is fatal to the current build and
 * none is retried: replaying a content-addressed install without a root-cause
 * change gives the same result.
 */
export type BootstrapErrorCode =
  | "CONFIG_MISSING"
  | "LOCK_MISMATCH"
  | "INTEGRITY_ERROR"
  | "INSTALL_IO_ERROR"
  | "LAUNCH_ERROR";

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: BootstrapErrorCode,
    message: string,
    opts?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "BootstrapError";
    this.code = code;
    this.details = opts?.details;
  }
}

export function isBootstrapError(e: unknown): e is BootstrapError {
  return e instanceof BootstrapError;
}

/** Node system errors carry a string `code` such as ENOENT or EACCES. */
export function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Wrap a filesystem failure raised while writing the environment.
 * BootstrapErrors pass through untouched.
 */
export function toInstallIOError(e: unknown, action: string): BootstrapError {
  if (isBootstrapError(e)) return e;
  return new BootstrapError("INSTALL_IO_ERROR", `${action}: ${errorMessage(e)}`, {
    details: { errno: errnoCode(e) ?? null },
    cause: e,
  });
}
