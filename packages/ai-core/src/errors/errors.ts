/**
 * Advisor Errors
 *
 * Typed failures raised while an invocation runs through the advisor chain:
 * - Configuration errors fail fast while the request is being built
 * - Collaborator errors wrap a model, memory or retrieval failure
 * - Warnings record degradations that do not fail the invocation
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ConfigurationErrorCode =
  | "MISSING_REQUIRED_PARAM" // A required advisor parameter is unset
  | "INVALID_PARAM" // An advisor parameter has the wrong shape
  | "INVALID_REQUEST"; // The request cannot be sent (e.g. nothing to ask)

export type CollaboratorErrorCode =
  | "MODEL_CALL_FAILED"
  | "MODEL_STREAM_FAILED"
  | "QUERY_TRANSFORM_FAILED"
  | "RETRIEVAL_FAILED"
  | "MEMORY_READ_FAILED"
  | "MEMORY_WRITE_FAILED";

export type AdvisorErrorCode = ConfigurationErrorCode | CollaboratorErrorCode;

export type AdvisorErrorKind = "configuration" | "collaborator";

/** External collaborator that failed */
export type Collaborator = "model" | "memory" | "retrieval";

export interface AdvisorErrorOptions {
  cause?: unknown;
  /** Name of the advisor that raised or observed the failure */
  advisor?: string;
  details?: Record<string, unknown>;
  recovery?: string;
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for failures raised by the advisor chain.
 */
export class AdvisorError extends Error {
  readonly code: AdvisorErrorCode;
  readonly kind: AdvisorErrorKind;
  readonly retryable: boolean;
  readonly advisor?: string;
  readonly details?: Record<string, unknown>;
  readonly recovery?: string;

  constructor(
    kind: AdvisorErrorKind,
    code: AdvisorErrorCode,
    message: string,
    options: AdvisorErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "AdvisorError";
    this.kind = kind;
    this.code = code;
    this.retryable = RETRYABLE_CODES.has(code);
    this.advisor = options.advisor;
    this.details = options.details;
    this.recovery = options.recovery ?? RECOVERY_MAP[code];
  }

  /**
   * Convert to JSON-serializable response.
   */
  toResponse(): AdvisorErrorResponse {
    return {
      error: {
        code: this.code,
        kind: this.kind,
        message: this.message,
        retryable: this.retryable,
        advisor: this.advisor,
        recovery: this.recovery,
        details: this.details,
      },
    };
  }
}

/**
 * A request could not be built from the configured advisors and parameters.
 * Raised before the model is called.
 */
export class ConfigurationError extends AdvisorError {
  declare readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string, options?: AdvisorErrorOptions) {
    super("configuration", code, message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * A model, memory or retrieval call failed.
 */
export class CollaboratorError extends AdvisorError {
  declare readonly code: CollaboratorErrorCode;
  readonly collaborator: Collaborator;

  constructor(
    code: CollaboratorErrorCode,
    collaborator: Collaborator,
    message: string,
    options?: AdvisorErrorOptions
  ) {
    super("collaborator", code, message, options);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
  }
}

// ============================================================================
// Warnings
// ============================================================================

/**
 * A degradation reported on the side channel of an invocation.
 * The invocation still produced (or will produce) its response.
 */
export interface AdvisorWarning {
  /** Advisor that observed the failure */
  advisor: string;
  code: CollaboratorErrorCode;
  message: string;
  cause?: unknown;
}

// ============================================================================
// Response Types
// ============================================================================

export interface AdvisorErrorResponse {
  error: {
    code: AdvisorErrorCode;
    kind: AdvisorErrorKind;
    message: string;
    retryable: boolean;
    advisor?: string;
    recovery?: string;
    details?: Record<string, unknown>;
  };
}

// ============================================================================
// Classification
// ============================================================================

const RETRYABLE_CODES = new Set<AdvisorErrorCode>([
  "MODEL_CALL_FAILED",
  "MODEL_STREAM_FAILED",
  "QUERY_TRANSFORM_FAILED",
  "RETRIEVAL_FAILED",
]);

const RECOVERY_MAP: Partial<Record<AdvisorErrorCode, string>> = {
  MISSING_REQUIRED_PARAM: "Set the parameter through the advisor spec or the advisor's options.",
  INVALID_PARAM: "Check the type of the advisor parameter.",
  INVALID_REQUEST: "Provide user text or messages before calling the model.",
  MODEL_CALL_FAILED: "The model is unavailable. Please try again in a moment.",
  MODEL_STREAM_FAILED: "The response stream was interrupted. Please try again.",
  RETRIEVAL_FAILED: "The document store is unavailable. Please try again in a moment.",
};

// ============================================================================
// Type Guards & Helpers
// ============================================================================

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isCollaboratorError(error: unknown): error is CollaboratorError {
  return error instanceof CollaboratorError;
}

/**
 * Human-readable message of an unknown throwable.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pass advisor errors through; wrap anything else as a collaborator error.
 */
export function toAdvisorError(
  error: unknown,
  fallback: { code: CollaboratorErrorCode; collaborator: Collaborator; advisor?: string }
): AdvisorError {
  if (isAdvisorError(error)) {
    return error;
  }
  return new CollaboratorError(fallback.code, fallback.collaborator, errorMessage(error), {
    cause: error,
    advisor: fallback.advisor,
  });
}
