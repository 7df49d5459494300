/**
 * ZeroNorth Error Types
 *
 * Domain-specific error types for ZeroNorth API operations
 */

/**
 * Base error class for all ZeroNorth-related errors
 */
export class ZeroNorthError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ZeroNorthError";

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ZeroNorthError);
    }
  }
}

/**
 * Error thrown when configuration or caller input is invalid or missing
 */
export class ZeroNorthConfigError extends ZeroNorthError {
  constructor(message: string, cause?: Error) {
    super(message, undefined, undefined, cause);
    this.name = "ZeroNorthConfigError";
  }
}

/**
 * Connection-level failure: DNS, refused connection, reset socket
 */
export class TransportError extends ZeroNorthError {
  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, undefined, endpoint, cause);
    this.name = "TransportError";
  }
}

/**
 * Error thrown when a request exceeds its timeout
 */
export class TransportTimeoutError extends TransportError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    endpoint?: string,
    cause?: Error,
  ) {
    super(message, endpoint, cause);
    this.name = "TransportTimeoutError";
  }
}

/**
 * Response body carried an error shape (statusCode > 299)
 */
export class ApiError extends ZeroNorthError {
  constructor(
    message: string,
    statusCode: number,
    endpoint?: string,
    public readonly rawBody?: string,
  ) {
    super(message, statusCode, endpoint);
    this.name = "ApiError";
  }
}

export class EmptyResponseError extends ZeroNorthError {
  constructor(endpoint?: string) {
    super("Unexpected empty result from the API call", undefined, endpoint);
    this.name = "EmptyResponseError";
  }
}

export class MalformedResponseError extends ZeroNorthError {
  constructor(
    message: string,
    endpoint?: string,
    public readonly rawBody?: string,
  ) {
    super(message, undefined, endpoint);
    this.name = "MalformedResponseError";
  }
}

/**
 * Error thrown when a named resource does not exist
 */
export class NotFoundError extends ZeroNorthError {
  constructor(
    public readonly resourceType: string,
    public readonly identifier: string,
  ) {
    super(`${resourceType} not found: '${identifier}'`, 404);
    this.name = "NotFoundError";
  }
}

/**
 * More than one case-insensitive exact match for a name
 */
export class AmbiguousNameError extends ZeroNorthError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceName: string,
    public readonly matchingIds: string[],
  ) {
    super(
      `Found ${matchingIds.length} ${resourceType} matching the name '${resourceName}': ${matchingIds.join(", ")}`,
    );
    this.name = "AmbiguousNameError";
  }
}

/**
 * Rename target name already belongs to a different resource
 */
export class NameTakenError extends ZeroNorthError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceName: string,
    public readonly existingId: string,
  ) {
    super(`${resourceType} '${resourceName}' already exists with ID '${existingId}'`, 409);
    this.name = "NameTakenError";
  }
}

export class CreateFailedError extends ZeroNorthError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceName: string,
    cause?: Error,
  ) {
    super(
      `Failed to create ${resourceType} '${resourceName}'${cause ? `: ${cause.message}` : ""}`,
      cause instanceof ZeroNorthError ? cause.statusCode : undefined,
      undefined,
      cause,
    );
    this.name = "CreateFailedError";
  }
}

/**
 * Repeated lookups kept disagreeing, another process is creating the same name
 */
export class RaceDetectedError extends ZeroNorthError {
  constructor(resourceType: string, resourceName: string, attempts: number) {
    super(`Lookups of ${resourceType} '${resourceName}' did not agree after ${attempts} attempts`);
    this.name = "RaceDetectedError";
  }
}

export class JobStartError extends ZeroNorthError {
  constructor(
    public readonly policyId: string,
    cause?: Error,
  ) {
    super(
      `Failed to start a job for policy '${policyId}'${cause ? `: ${cause.message}` : ""}`,
      cause instanceof ZeroNorthError ? cause.statusCode : undefined,
      undefined,
      cause,
    );
    this.name = "JobStartError";
  }
}

export class JobStateError extends ZeroNorthError {
  constructor(message: string) {
    super(message);
    this.name = "JobStateError";
  }
}

export class PollTimeoutError extends ZeroNorthError {
  constructor(
    public readonly jobId: string,
    public readonly attempts: number,
    public readonly lastStatus: string,
  ) {
    super(`Job '${jobId}' still '${lastStatus}' after ${attempts} status checks`);
    this.name = "PollTimeoutError";
  }
}

/**
 * Nearest ApiError in a cause chain, if any
 */
function findApiError(error: unknown): ApiError | undefined {
  let current: unknown = error;
  for (let depth = 0; current instanceof Error && depth < 10; depth++) {
    if (current instanceof ApiError) {
      return current;
    }
    current = current instanceof ZeroNorthError ? current.cause : undefined;
  }
  return undefined;
}

/**
 * Render an error for a one-line diagnostic, including the raw API payload when present
 */
export function describeError(error: unknown): string {
  if (error instanceof ApiError && error.rawBody) {
    return `${error.message} (HTTP ${error.statusCode}) with message:\n${error.rawBody}`;
  }
  if (error instanceof MalformedResponseError && error.rawBody) {
    return `${error.message}:\n${error.rawBody.slice(0, 500)}`;
  }
  const apiError = findApiError(error);
  if (error instanceof Error && apiError?.rawBody) {
    return `${error.message} with message:\n${apiError.rawBody}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
