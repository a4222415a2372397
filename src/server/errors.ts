/**
 * MCP Server Error Handling
 *
 * Every failure the server reports carries a category so a calling agent can
 * tell "retry with a password" apart from "give up".
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Document errors
  | 'DOCUMENT_NOT_FOUND'
  | 'PASSWORD_REQUIRED'
  | 'PASSWORD_REJECTED'
  | 'EXTRACTION_FAILED'

  // Artifact storage errors
  | 'STORAGE_FAILED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 * PdfError subclasses also carry their own `.category`, which wins in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  PdfError: 'EXTRACTION_FAILED',
  PdfOpenError: 'EXTRACTION_FAILED',
  PdfPageError: 'EXTRACTION_FAILED',
  ArtifactWriteError: 'STORAGE_FAILED',
  // pdfjs-dist throws these while parsing broken files
  InvalidPDFException: 'EXTRACTION_FAILED',
  PasswordException: 'PASSWORD_REJECTED',
  UnknownErrorException: 'EXTRACTION_FAILED',
};

function readStringField(error: Error, field: 'category' | 'code'): string | undefined {
  if (!(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

function isErrorCategory(value: string | undefined): value is ErrorCategory {
  return value !== undefined && value in RECOVERY_HINTS;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const ownCategory = readStringField(error, 'category');
      const code = readStringField(error, 'code');

      const category: ErrorCategory = isErrorCategory(ownCategory)
        ? ownCategory
        : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'read_pdf', hint: 'Check parameter types and required fields' },
  DOCUMENT_NOT_FOUND: {
    tool: 'read_pdf',
    hint: 'Verify the file path exists; relative paths resolve against the server working directory',
  },
  PASSWORD_REQUIRED: {
    tool: 'read_pdf',
    hint: 'Ask the user for the document password and call read_pdf again with password set',
  },
  PASSWORD_REJECTED: {
    tool: 'read_pdf',
    hint: 'The password did not decrypt the document; ask the user to confirm it and retry',
  },
  EXTRACTION_FAILED: {
    tool: 'read_pdf',
    hint: 'The file may be corrupt or not a PDF; try a smaller page selection or another copy',
  },
  STORAGE_FAILED: {
    tool: 'pdf_cleanup_artifacts',
    hint: 'Free space in the artifact directory or check PDF_READER_ARTIFACT_DIR permissions',
  },
  CONFIGURATION_ERROR: {
    tool: 'pdf_config_get',
    hint: 'Check PDF_READER_* environment variables and restart the server',
  },
  INTERNAL_ERROR: { tool: 'pdf_config_get', hint: 'Inspect server stderr for diagnostics' },
};

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response.
 * The recovery field tells AI agents which tool to call next and how to fix the issue.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create document not found error
 */
export function documentNotFoundError(filePath: string): MCPError {
  return new MCPError('DOCUMENT_NOT_FOUND', `File not found: ${filePath}`, { filePath });
}

export function passwordRequiredError(filePath: string): MCPError {
  return new MCPError(
    'PASSWORD_REQUIRED',
    'This PDF is password-protected. Please provide a password.',
    { filePath }
  );
}

export function passwordRejectedError(filePath: string): MCPError {
  return new MCPError('PASSWORD_REJECTED', 'Incorrect password or PDF could not be decrypted', {
    filePath,
  });
}

/**
 * Create configuration error for invalid environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
