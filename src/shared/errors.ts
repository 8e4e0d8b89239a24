export enum BootstrapErrorCode {
  NOT_ROOT = "NOT_ROOT",
  CONFIG_INVALID = "CONFIG_INVALID",
  COMMAND_FAILED = "COMMAND_FAILED",
  FILE_ERROR = "FILE_ERROR",
  SUDOERS_INVALID = "SUDOERS_INVALID",
  SSH_VALIDATION_FAILED = "SSH_VALIDATION_FAILED",
  UNEXPECTED = "UNEXPECTED",
}

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BootstrapErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "BootstrapError";
    this.code = code;
    this.context = context;
  }
}

/**
 * Errors thrown by Node's fs and child_process carry a string errno code.
 * Checked structurally: errors created in another realm (a vm context, Jest's
 * sandbox) fail `instanceof Error`.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    && "message" in err && typeof err.message === "string";
}

export function errorMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

/** Wrap anything thrown by a step so the runner always reports a BootstrapError. */
export function toBootstrapError(err: unknown): BootstrapError {
  if (err instanceof BootstrapError) return err;
  // Node fs errors carry an errno code such as ENOENT or EACCES
  if (isErrnoException(err) && err.code?.startsWith("E")) {
    return new BootstrapError(BootstrapErrorCode.FILE_ERROR, err.message, { errno: err.code });
  }
  return new BootstrapError(BootstrapErrorCode.UNEXPECTED, errorMessage(err));
}
