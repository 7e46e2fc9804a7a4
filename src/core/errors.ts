export class AcquisitionError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "AcquisitionError";
  }
}

/** The page could not be reached or landed on a block/challenge screen. */
export class NavigationError extends AcquisitionError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = "NavigationError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export type DownloadErrorCode =
  | "TIMEOUT"
  | "CONNECTION_FAILED"
  | "HTTP_STATUS"
  | "INVALID_CONTENT"
  | "ALL_CANDIDATES_EXHAUSTED";

export class DownloadError extends Error {
  constructor(message: string, public code: DownloadErrorCode, public status?: number) {
    super(message);
    this.name = "DownloadError";
  }
}

export class LockContentionError extends Error {
  constructor(message: string, public lockName: string) {
    super(message);
    this.name = "LockContentionError";
  }
}

export class SessionMismatchError extends Error {
  constructor(message: string, public sessionId: string) {
    super(message);
    this.name = "SessionMismatchError";
  }
}

export class CancellationError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
