export class PosError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends PosError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends PosError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class TransientStoreError extends PosError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, { cause });
  }
}

export class ConfigurationError extends PosError {
  constructor(message: string) {
    super(message, 500);
  }
}

// Never surfaced to callers; only logged.
export class NotificationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "NotificationError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
