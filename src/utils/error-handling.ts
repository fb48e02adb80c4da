/**
 * Error Handling Utilities for keyed-field-crypto
 */

import type { ErrorContext } from "../types/errors";
import { ServiceError } from "../types/errors";
import type { ILogger } from "./logger";
import { defaultLogger } from "./logger";

const VALID_SEVERITIES = ["low", "medium", "high", "critical"];

export class ErrorUtils {
  private static logger: ILogger = defaultLogger;

  /**
   * Set the logger used when handleError is called without one
   */
  public static setLogger(logger: ILogger): void {
    ErrorUtils.logger = logger;
  }

  /**
   * Create error context for consistent error logging
   */
  public static createContext(
    service: string,
    operation: string,
    additionalContext?: Record<string, unknown>
  ): ErrorContext {
    if (!service) {
      throw new ServiceError("Service name is required", {
        code: "INVALID_ERROR_CONTEXT",
        details: { service, operation },
      });
    }

    if (!operation) {
      throw new ServiceError("Operation name is required", {
        code: "INVALID_ERROR_CONTEXT",
        details: { service, operation },
      });
    }

    if (additionalContext?.severity !== undefined) {
      const severityValue = String(additionalContext.severity);
      if (!VALID_SEVERITIES.includes(severityValue)) {
        throw new ServiceError(
          `Invalid severity level: ${severityValue}. Must be one of: ${VALID_SEVERITIES.join(", ")}`,
          {
            code: "INVALID_ERROR_CONTEXT",
            details: { service, operation, severity: severityValue },
          }
        );
      }
    }

    return {
      message: `${service}: ${operation}`,
      type: "service_error",
      source: service,
      operation,
      timestamp: Date.now(),
      severity: "medium",
      ...additionalContext,
    };
  }

  /**
   * Code of a ServiceError, "UNEXPECTED_ERROR" for anything else
   */
  public static getErrorCode(error: unknown): string {
    if (error instanceof ServiceError && error.code) {
      return error.code;
    }
    return "UNEXPECTED_ERROR";
  }

  /**
   * Log an error once with its context
   */
  public static handleError(
    error: unknown,
    context: ErrorContext,
    logger: ILogger = ErrorUtils.logger
  ): void {
    logger.error(`Error in ${context.source}.${context.operation}`, error, {
      ...context,
      errorCode: ErrorUtils.getErrorCode(error),
    });
  }
}
