/** Calculator failure or unusable cached prayer data. */
export class PrayerDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PrayerDataError";
  }
}

export class LocationServiceError extends Error {
  readonly originalError?: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message, { cause: originalError });
    this.name = "LocationServiceError";
    this.originalError = originalError;
  }

  override toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.originalError !== undefined) {
      result += `\nOriginal error: ${String(this.originalError)}`;
    }
    if (this.stack) {
      result += `\nStack: ${this.stack}`;
    }
    return result;
  }
}

export type PersistenceOperation = "read" | "write" | "connect";

export class PersistenceError extends Error {
  readonly operation: PersistenceOperation;
  readonly key?: string;

  constructor(
    message: string,
    operation: PersistenceOperation,
    options?: { key?: string; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "PersistenceError";
    this.operation = operation;
    this.key = options?.key;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
