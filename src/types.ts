/**
 * Common types for the Disk Insights server
 *
 * This module defines error types and response structures used throughout the server.
 */

/**
 * Validation error - thrown when input validation fails
 *
 * Validation errors indicate invalid input parameters, malformed tool
 * arguments or a configuration file that does not match the schema.
 * These errors should be fixed by correcting the input.
 *
 * @example
 * ```typescript
 * throw new ValidationError("Unknown analyzer: Docker Desktop");
 * ```
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Filesystem error - thrown when a filesystem probe cannot proceed
 *
 * Analyzers absorb permission and path problems while they walk; this error
 * is reserved for requests aimed at a path that cannot be scanned at all,
 * such as asking for the folder info of a regular file.
 *
 * @example
 * ```typescript
 * throw new FileSystemError("Directory not found: /home/user/missing");
 * ```
 */
export class FileSystemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileSystemError";
  }
}

/**
 * Cancellation error - thrown when a scan's AbortSignal fires
 *
 * Cancellation is not a failure: the aggregator re-throws it instead of
 * recording it against the analyzer that was running.
 */
export class CancellationError extends Error {
  constructor(message: string = "The operation was cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

/**
 * Throw a CancellationError if the signal has been aborted
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}

/**
 * Message of a thrown value. Errors raised in another realm (Node's fs
 * under Jest) fail instanceof, so the message is read by shape.
 */
export function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

/**
 * MCP error response structure
 *
 * Standard error response format returned by all MCP tools.
 *
 * @example
 * ```json
 * {
 *   "error": {
 *     "code": "SCAN_NOT_FOUND",
 *     "message": "Scan not found: 3f7c...",
 *     "details": { "type": "validation_error" }
 *   }
 * }
 * ```
 */
export interface MCPErrorResponse {
  error: {
    /** Error code (e.g., "VALIDATION_ERROR", "PERMISSION_DENIED") */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Optional additional error details */
    details?: Record<string, unknown>;
  };
}
