export type FatalReason =
  | "SessionLaunchError"
  | "AuthenticationError"
  | "NavigationTimeoutError"
  | "SessionExpired"
  | "ExtractionAborted"
  | "PersistenceError"
  | "Cancelled"
  | "ConfigError";

export class PipelineError extends Error {
  readonly reason: FatalReason;
  readonly retryable: boolean;

  constructor(reason: FatalReason, message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = reason;
    this.reason = reason;
    this.retryable = options?.retryable ?? false;
  }
}

/** The browser process could not be started (missing binary, driver mismatch). */
export class SessionLaunchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SessionLaunchError", message, options);
  }
}

export class AuthenticationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super("AuthenticationError", message, { retryable: true, ...options });
  }
}

export class NavigationTimeoutError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NavigationTimeoutError", message, { ...options, retryable: true });
  }
}

/** Raised when navigation lands on the login page: the portal dropped the session. */
export class SessionExpiredError extends PipelineError {
  constructor(message: string) {
    super("SessionExpired", message);
  }
}

export class ExtractionAbortedError extends PipelineError {
  constructor(message: string) {
    super("ExtractionAborted", message);
  }
}

export class PersistenceError extends PipelineError {
  readonly code: string | undefined;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super("PersistenceError", message, options);
    this.code = options?.code;
  }
}

export class CancelledError extends PipelineError {
  constructor(message: string) {
    super("Cancelled", message);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("ConfigError", message);
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
