/**
 * @module error-codes
 * Structured error type, error code registry, and factory for imageforge.
 *
 * Every fatal condition of a build run surfaces as an {@link ImageForgeError}
 * with a machine-readable code, so callers can branch without parsing messages.
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known imageforge error codes. */
export type ImageForgeErrorCode =
  | 'CONFIG_INVALID'
  | 'MANIFEST_ENTRY_MISSING'
  | 'UNKNOWN_REPO'
  | 'COMMAND_FAILED'
  | 'RETRY_EXHAUSTED'
  | 'HOOK_FAILED'
  | 'DOCKERFILE_IO';

/** Broad classification of error origin. */
export type ErrorCategory = 'configuration' | 'external-command' | 'hook' | 'io';

/** Machine-readable error payload. */
export interface StructuredError {
  code: ImageForgeErrorCode;
  category: ErrorCategory;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  suggestedActions: string[];
}

/** Default classification and recovery hints for every error code. */
const ERROR_METADATA: Readonly<Record<ImageForgeErrorCode, ErrorMetadataEntry>> = {
  CONFIG_INVALID: {
    category: 'configuration',
    suggestedActions: ['Fix the reported manifest fields', 'Check YAML indentation'],
  },
  MANIFEST_ENTRY_MISSING: {
    category: 'configuration',
    suggestedActions: ['Declare the entry in the manifest', 'Check the filter options'],
  },
  UNKNOWN_REPO: {
    category: 'configuration',
    suggestedActions: ['Declare the repo in the manifest', 'Remove the base image from overriddenBaseImages'],
  },
  COMMAND_FAILED: {
    category: 'external-command',
    suggestedActions: ['Inspect the command output', 'Re-run with --retry for transient failures'],
  },
  RETRY_EXHAUSTED: {
    category: 'external-command',
    suggestedActions: ['Inspect the last attempt output', 'Increase settings.retry.maxAttempts'],
  },
  HOOK_FAILED: {
    category: 'hook',
    suggestedActions: ['Run the hook script by hand from the build context'],
  },
  DOCKERFILE_IO: {
    category: 'io',
    suggestedActions: ['Check file permissions next to the Dockerfile'],
  },
};

// =====================================================================
// Factory Function
// =====================================================================

/**
 * Create a complete StructuredError from an error code.
 *
 * @param code - imageforge error code
 * @param message - Human-readable error message
 * @param details - Additional contextual data
 */
function createStructuredError(
  code: ImageForgeErrorCode,
  message: string,
  details: Record<string, unknown> = {},
): StructuredError {
  const metadata = ERROR_METADATA[code];
  return {
    code,
    category: metadata.category,
    message,
    details,
    suggestedActions: [...metadata.suggestedActions],
    timestamp: Date.now(),
  };
}

// =====================================================================
// ImageForgeError Class
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 */
export class ImageForgeError extends Error {
  public readonly structuredError: StructuredError;
  public readonly code: ImageForgeErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: Record<string, unknown>;
  public readonly suggestedActions: readonly string[];

  constructor(
    code: ImageForgeErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ImageForgeError';
    this.structuredError = createStructuredError(code, message, details);
    this.code = this.structuredError.code;
    this.category = this.structuredError.category;
    this.details = this.structuredError.details;
    this.suggestedActions = this.structuredError.suggestedActions;
  }

  /** Serialize the structured error payload for JSON output. */
  toJSON(): StructuredError {
    return this.structuredError;
  }
}

/** Type guard for {@link ImageForgeError}, optionally narrowing on code. */
export function isImageForgeError(err: unknown, code?: ImageForgeErrorCode): err is ImageForgeError {
  return err instanceof ImageForgeError && (code === undefined || err.code === code);
}
