/**
 * Extraction Orchestrator
 *
 * Runs one extraction request end to end:
 *   existence check -> open -> credential gate -> metadata -> page selection
 *   -> per-page text (inline, or staged to artifacts) -> structured result
 *
 * extract() never rejects. Every failure comes back as `success: false` with a
 * readable `error` string and its category; the two password outcomes also set
 * `password_required` so the caller knows a retry with credentials can work.
 *
 * @module services/extraction/orchestrator
 */

import fs from 'fs';
import path from 'path';
import {
  MCPError,
  configurationError,
  documentNotFoundError,
  passwordRejectedError,
  passwordRequiredError,
  validationError,
  type ErrorCategory,
} from '../../server/errors.js';
import type { DocumentHandle, DocumentParser, RawDocumentMetadata } from '../pdf/parser.js';
import { PdfOpenError, describeError } from '../pdf/errors.js';
import type { ArtifactStore, ExtractionSession } from '../storage/artifact-store.js';
import { isLocked, unlock } from './credential-gate.js';
import { resolvePages } from './page-selector.js';
import { isFile } from '../../utils/files.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ResponseMode = 'inline' | 'staged';

export interface ExtractionRequest {
  /** Absolute path to the document */
  filePath: string;
  password?: string;
  /** 1-indexed page numbers; omitted or empty means all pages */
  pages?: readonly number[];
}

export interface ExtractionFailure {
  success: false;
  error: string;
  error_category: ErrorCategory;
  is_encrypted?: true;
  password_required?: true;
}

interface ExtractionSuccessBase {
  success: true;
  is_encrypted: boolean;
  total_pages: number;
  extracted_pages: number[];
  metadata: Record<string, unknown>;
}

export interface InlineExtraction extends ExtractionSuccessBase {
  response_mode: 'inline';
  /** Page number -> extracted text */
  content: Record<number, string>;
}

export interface StagedExtraction extends ExtractionSuccessBase {
  response_mode: 'staged';
  /** Page number -> path of the page artifact */
  content_files: Record<number, string>;
  session_id: string;
  metadata_file: string;
  artifact_directory: string;
}

export type ExtractionResult = ExtractionFailure | InlineExtraction | StagedExtraction;

export interface OrchestratorOptions {
  parser: DocumentParser;
  mode: ResponseMode;
  /** Required in staged mode */
  store?: ArtifactStore;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Strip the leading `/` name marker PDF dictionaries put on keys.
 */
export function normalizeMetadata(raw: RawDocumentMetadata): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    metadata[key.startsWith('/') ? key.slice(1) : key] = value;
  }
  return metadata;
}

/**
 * Read the document bytes. A read failure is a failure to open the input, never
 * an artifact storage failure, whatever its fs error code.
 */
function readDocumentBytes(filePath: string): Uint8Array {
  try {
    return fs.readFileSync(filePath);
  } catch (error) {
    throw new PdfOpenError(`Cannot read ${filePath}: ${describeError(error)}`, filePath);
  }
}

function failure(error: MCPError, message: string = error.message): ExtractionFailure {
  const result: ExtractionFailure = {
    success: false,
    error: message,
    error_category: error.category,
  };
  if (error.category === 'PASSWORD_REQUIRED' || error.category === 'PASSWORD_REJECTED') {
    result.is_encrypted = true;
    result.password_required = true;
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class ExtractionOrchestrator {
  private readonly parser: DocumentParser;
  private readonly store: ArtifactStore | undefined;
  readonly mode: ResponseMode;

  constructor(options: OrchestratorOptions) {
    if (options.mode === 'staged' && !options.store) {
      throw configurationError('Staged response mode requires an artifact store');
    }
    this.parser = options.parser;
    this.mode = options.mode;
    this.store = options.store;
  }

  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    const { filePath, password } = request;

    if (!path.isAbsolute(filePath)) {
      return failure(validationError(`file_path must be absolute: ${filePath}`, { filePath }));
    }
    if (!isFile(filePath)) {
      return failure(documentNotFoundError(filePath));
    }

    let document: DocumentHandle | undefined;
    try {
      document = await this.parser.open(readDocumentBytes(filePath));
      const isEncrypted = document.isEncrypted();

      const credentials = await unlock(document, password);
      if (isLocked(credentials)) {
        console.error(`[extract] ${path.basename(filePath)}: ${credentials}`);
        return failure(
          credentials === 'PASSWORD_REQUIRED'
            ? passwordRequiredError(filePath)
            : passwordRejectedError(filePath)
        );
      }

      const totalPages = document.pageCount();
      const metadata = normalizeMetadata(await document.metadata());
      const pages = resolvePages(request.pages, totalPages);

      const session =
        this.mode === 'staged'
          ? this.requireStore().beginSession(path.parse(filePath).name)
          : undefined;

      // Page number -> text (inline) or artifact path (staged), in resolved order.
      // A page requested twice is produced once so its artifact is created exactly once.
      const produced = new Map<number, string>();
      for (const pageNumber of pages) {
        if (produced.has(pageNumber)) continue;
        const text = await document.extractPageText(pageNumber);
        produced.set(
          pageNumber,
          session ? this.requireStore().writePageArtifact(session, pageNumber, text) : text
        );
      }

      const base: ExtractionSuccessBase = {
        success: true,
        is_encrypted: isEncrypted,
        total_pages: totalPages,
        extracted_pages: [...produced.keys()],
        metadata,
      };

      if (!session) {
        return { ...base, response_mode: 'inline', content: Object.fromEntries(produced) };
      }
      return this.finishSession(session, filePath, base, produced);
    } catch (error) {
      const mcpError = MCPError.fromUnknown(error, 'EXTRACTION_FAILED');
      console.error(`[extract] ${mcpError.category}: ${mcpError.message}`);
      const prefix =
        mcpError.category === 'STORAGE_FAILED'
          ? 'Error staging PDF artifacts'
          : 'Error processing PDF';
      return failure(mcpError, `${prefix}: ${mcpError.message}`);
    } finally {
      if (document) {
        await document
          .close()
          .catch((error: unknown) =>
            console.error(`[extract] Failed to release document: ${describeError(error)}`)
          );
      }
    }
  }

  private finishSession(
    session: ExtractionSession,
    filePath: string,
    base: ExtractionSuccessBase,
    contentFiles: Map<number, string>
  ): StagedExtraction {
    const store = this.requireStore();
    const metadataFile = store.writeMetadataArtifact(session, {
      filename: path.basename(filePath),
      total_pages: base.total_pages,
      is_encrypted: base.is_encrypted,
      metadata: base.metadata,
      session_id: session.sessionId,
      extracted_pages: base.extracted_pages,
    });
    console.error(
      `[extract] Staged ${contentFiles.size} page(s) of ${path.basename(filePath)} as session ${session.sessionId}`
    );

    return {
      ...base,
      response_mode: 'staged',
      content_files: Object.fromEntries(contentFiles),
      session_id: session.sessionId,
      metadata_file: metadataFile,
      artifact_directory: store.directory,
    };
  }

  private requireStore(): ArtifactStore {
    if (!this.store) {
      throw configurationError('Staged response mode requires an artifact store');
    }
    return this.store;
  }
}
