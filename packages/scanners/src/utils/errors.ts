/**
 * Node errno-style error (ENOENT, EACCES, ...)
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error;
}

export function errorCode(error: unknown): string | undefined {
  if (isErrnoException(error) && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
