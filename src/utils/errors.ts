// Base class for every failure the CLI reports to the user
export class BookmarkError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

// Unknown URL on a bare lookup
export class NotFoundError extends BookmarkError {
  readonly url: string;

  constructor(url: string) {
    super(`No such bookmark: ${url}`);
    this.url = url;
  }
}

// Payload is not a map of URL to tag list
export class DecodeError extends BookmarkError {
  constructor(source: string, reason: string) {
    super(`Cannot decode database "${source}": ${reason}`);
  }
}

export class NetworkError extends BookmarkError {
  readonly locator: string;

  constructor(locator: string, reason: string) {
    super(`Cannot fetch "${locator}": ${reason}`);
    this.locator = locator;
  }
}

export class PermissionError extends BookmarkError {
  readonly path: string;

  constructor(path: string, operation: "read" | "write") {
    super(`Permission denied: cannot ${operation} "${path}"`);
    this.path = path;
  }
}

export class PatternError extends BookmarkError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
  }
}

export class UsageError extends BookmarkError {}

// Node system errors carry a string `code` (ENOENT, EACCES, ...)
export function errorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

export function isPermissionDenied(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EACCES" || code === "EPERM";
}
