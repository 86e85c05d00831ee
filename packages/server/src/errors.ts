// ---------------------------------------------------------------------------
// Error taxonomy. Every error the service raises on purpose extends
// RelayError so the HTTP layer can map it to a status code and a stable
// machine-readable code.
// ---------------------------------------------------------------------------

export abstract class RelayError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or incomplete job specification. Never touches the registry. */
export class InvalidRequestError extends RelayError {
  readonly code = "invalid_request";
  readonly statusCode = 400;

  constructor(detail: string) {
    super(`Invalid request: ${detail}`);
  }
}

export class UnauthorizedError extends RelayError {
  readonly code = "unauthorized";
  readonly statusCode = 401;

  constructor() {
    super("Missing or invalid API key");
  }
}

export class PathNotAllowedError extends RelayError {
  readonly code = "path_not_allowed";
  readonly statusCode = 403;

  constructor(readonly path: string) {
    super(`Path not allowed: ${path}`);
  }
}

export class JobNotFoundError extends RelayError {
  readonly code = "not_found";
  readonly statusCode = 404;

  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
  }
}

/**
 * The external tool ran and reported failure. Captured into the job's
 * `failed` record, never thrown to the caller that started the job.
 */
export class ExecutionFailure extends RelayError {
  readonly code = "execution_failed";
  readonly statusCode = 500;

  constructor(
    summary: string,
    readonly exitCode: number,
  ) {
    super(summary);
  }
}

/** The external tool could not be invoked at all. */
export class StartupFailureError extends RelayError {
  readonly code = "startup_failed";
  readonly statusCode = 500;

  constructor(command: string, cause: unknown) {
    super(
      `Failed to spawn ${command}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class InternalFailureError extends RelayError {
  readonly code = "internal_error";
  readonly statusCode = 500;
}

export class ToolchainUnavailableError extends RelayError {
  readonly code = "toolchain_unavailable";
  readonly statusCode = 503;

  constructor(tool: string, cause?: unknown) {
    super(`${tool} not found or not working`, { cause });
  }
}
