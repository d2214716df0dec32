/**
 * DogWatch — Error types
 *
 * Transient errors are caught at the cycle boundary; FatalStorageError ends the process.
 */

export class InferenceTimeoutError extends Error {
  constructor(message = "Inference acquisition timed out") {
    super(message);
    this.name = "InferenceTimeoutError";
  }
}

export class SourceClosedError extends Error {
  constructor(message = "Inference source closed") {
    super(message);
    this.name = "SourceClosedError";
  }
}

export class InvalidInferenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInferenceError";
  }
}

export class FatalStorageError extends Error {
  readonly consecutiveFailures: number;

  constructor(consecutiveFailures: number) {
    super(`Frame storage failed ${consecutiveFailures} times in a row`);
    this.name = "FatalStorageError";
    this.consecutiveFailures = consecutiveFailures;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") {
    return e.message;
  }
  return String(e);
}

/** fs errors are checked by code: they need not share this realm's Error. */
export function isNotFoundError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
