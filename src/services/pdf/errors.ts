/**
 * PDF Error Classes
 *
 * Thrown by the document parser and the artifact store. MCPError.fromUnknown()
 * reads `.category` to classify them.
 */

type PdfErrorCategory = 'EXTRACTION_FAILED' | 'STORAGE_FAILED';

export class PdfError extends Error {
  constructor(
    message: string,
    public readonly category: PdfErrorCategory = 'EXTRACTION_FAILED'
  ) {
    super(message);
    this.name = 'PdfError';
  }
}

export class PdfOpenError extends PdfError {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'PdfOpenError';
  }
}

export class PdfPageError extends PdfError {
  constructor(
    message: string,
    public readonly pageNumber: number
  ) {
    super(message);
    this.name = 'PdfPageError';
  }
}

export class ArtifactWriteError extends PdfError {
  constructor(
    message: string,
    public readonly artifactPath: string,
    public readonly code?: string
  ) {
    super(message, 'STORAGE_FAILED');
    this.name = 'ArtifactWriteError';
  }
}

/**
 * Render a caught value as the message text used in result payloads and logs.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
