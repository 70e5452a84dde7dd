/**
 * Error handler for the Disk Insights server
 * Provides structured error responses with specific error codes
 */

import {
  CancellationError,
  errorMessage,
  FileSystemError,
  MCPErrorResponse,
  ValidationError,
} from "../types";

/**
 * Error codes for different error types
 */
export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INVALID_PATH = "INVALID_PATH",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  UNKNOWN_ANALYZER = "UNKNOWN_ANALYZER",
  SCAN_NOT_FOUND = "SCAN_NOT_FOUND",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",

  // Filesystem errors
  FILESYSTEM_ERROR = "FILESYSTEM_ERROR",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  DIRECTORY_NOT_FOUND = "DIRECTORY_NOT_FOUND",
  NOT_A_DIRECTORY = "NOT_A_DIRECTORY",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  PATH_TOO_LONG = "PATH_TOO_LONG",

  // Operation errors
  OPERATION_CANCELLED = "OPERATION_CANCELLED",

  // Generic errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Error handler class
 * Provides methods to convert errors to structured MCP error responses
 */
export class ErrorHandler {
  /**
   * Convert an error to an MCP error response with structured error codes
   */
  static toMCPError(error: unknown): MCPErrorResponse {
    if (error instanceof CancellationError) {
      return {
        error: {
          code: ErrorCode.OPERATION_CANCELLED,
          message: error.message,
          details: {
            type: "cancelled",
            remediation: "Run the scan again to get fresh results",
          },
        },
      };
    }

    if (error instanceof ValidationError) {
      return this.handleValidationError(error);
    }

    if (error instanceof FileSystemError) {
      return this.handleFileSystemError(error);
    }

    if (this.isNodeError(error)) {
      return this.handleNodeError(error);
    }

    const message =
      error instanceof Error ? error.message : String(error ?? "");

    return {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: message || "An unexpected error occurred",
        details: {
          name: error instanceof Error ? error.name : typeof error,
          stack:
            process.env["NODE_ENV"] === "development" && error instanceof Error
              ? error.stack
              : undefined,
        },
      },
    };
  }

  /**
   * Handle validation errors with specific error codes
   */
  private static handleValidationError(
    error: ValidationError
  ): MCPErrorResponse {
    const message = error.message.toLowerCase();

    let code = ErrorCode.VALIDATION_ERROR;

    if (message.includes("scan not found")) {
      code = ErrorCode.SCAN_NOT_FOUND;
    } else if (message.includes("unknown analyzer")) {
      code = ErrorCode.UNKNOWN_ANALYZER;
    } else if (message.includes("configuration")) {
      code = ErrorCode.INVALID_CONFIGURATION;
    } else if (message.includes("path")) {
      code = ErrorCode.INVALID_PATH;
    } else if (message.includes("argument")) {
      code = ErrorCode.INVALID_ARGUMENT;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "validation_error",
          remediation: this.getValidationRemediation(code),
        },
      },
    };
  }

  /**
   * Handle filesystem errors with specific error codes
   */
  private static handleFileSystemError(
    error: FileSystemError
  ): MCPErrorResponse {
    const message = error.message.toLowerCase();

    let code = ErrorCode.FILESYSTEM_ERROR;

    if (message.includes("not a directory")) {
      code = ErrorCode.NOT_A_DIRECTORY;
    } else if (message.includes("not found") || message.includes("enoent")) {
      code = message.includes("directory")
        ? ErrorCode.DIRECTORY_NOT_FOUND
        : ErrorCode.FILE_NOT_FOUND;
    } else if (message.includes("permission") || message.includes("eacces")) {
      code = ErrorCode.PERMISSION_DENIED;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "filesystem_error",
          remediation: this.getFileSystemRemediation(code),
        },
      },
    };
  }

  /**
   * Handle Node.js system errors (ENOENT, EACCES, etc.)
   */
  private static handleNodeError(
    error: NodeJS.ErrnoException
  ): MCPErrorResponse {
    let code = ErrorCode.FILESYSTEM_ERROR;
    let remediation = "Check the path and permissions";

    switch (error.code) {
      case "ENOENT":
        code = ErrorCode.FILE_NOT_FOUND;
        remediation = "The specified file or directory does not exist";
        break;
      case "EACCES":
      case "EPERM":
        code = ErrorCode.PERMISSION_DENIED;
        remediation =
          "Insufficient permissions to read the file or directory";
        break;
      case "ENOTDIR":
        code = ErrorCode.NOT_A_DIRECTORY;
        remediation = "Not a directory";
        break;
      case "ENAMETOOLONG":
        code = ErrorCode.PATH_TOO_LONG;
        remediation = "The path exceeds the platform's length limit";
        break;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "filesystem_error",
          errno: error.errno,
          syscall: error.syscall,
          path: error.path,
          remediation,
        },
      },
    };
  }

  /**
   * Check if error is a Node.js system error
   */
  private static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      typeof error.code === "string" &&
      error.code.startsWith("E") &&
      "message" in error &&
      typeof error.message === "string"
    );
  }

  private static getValidationRemediation(code: ErrorCode): string {
    switch (code) {
      case ErrorCode.SCAN_NOT_FOUND:
        return "Run insights_analyze and use the scanId it returns";
      case ErrorCode.UNKNOWN_ANALYZER:
        return "Use insights_list_analyzers to see the registered names";
      case ErrorCode.INVALID_CONFIGURATION:
        return "Fix the configuration file and restart the server";
      default:
        return "Check the input parameters and try again";
    }
  }

  /**
   * Get remediation advice for filesystem errors
   */
  private static getFileSystemRemediation(code: ErrorCode): string {
    switch (code) {
      case ErrorCode.FILE_NOT_FOUND:
        return "Verify the file path exists";
      case ErrorCode.DIRECTORY_NOT_FOUND:
        return "Verify the directory path exists";
      case ErrorCode.NOT_A_DIRECTORY:
        return "Pass a directory, not a file";
      case ErrorCode.PERMISSION_DENIED:
        return "Check permissions and ensure the server has read access";
      default:
        return "Check the filesystem and try again";
    }
  }

  /**
   * Log error for debugging
   */
  static logError(error: unknown, context?: Record<string, unknown>): void {
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: "ERROR",
        message: errorMessage(error),
        name: error instanceof Error ? error.name : undefined,
        stack: error instanceof Error ? error.stack : undefined,
        context,
      })
    );
  }
}
