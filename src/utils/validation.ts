/**
 * PDF Reader MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool, plus file path sanitizing.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for read_pdf
 */
export const ReadPdfInput = z.object({
  file_path: z.string().min(1, 'file_path is required'),
  password: z.string().optional(),
  pages: z
    .array(z.number().int('Page numbers must be integers'))
    .optional()
    .describe('1-indexed page numbers to extract; omit for all pages'),
});

/**
 * Schema for pdf_cleanup_artifacts
 */
export const CleanupArtifactsInput = z.object({
  max_age_hours: z
    .number()
    .min(0, 'max_age_hours must be 0 or more')
    .optional()
    .describe('Delete artifacts older than this many hours (default: configured retention)'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve a caller-supplied file path to an absolute path.
 *
 * - Rejects null bytes
 * - Resolves relative paths against the working directory and removes '..' segments
 * - When allowedBaseDirs is non-empty, the resolved path must sit inside one of them
 *
 * @returns The resolved absolute path
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs: readonly string[] = []): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);
  if (allowedBaseDirs.length === 0) {
    return resolved;
  }

  const resolvedBases = allowedBaseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, add its directory to the PDF_READER_ALLOWED_DIRS environment variable ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}
