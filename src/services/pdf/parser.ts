/**
 * PDF Document Parser
 *
 * The extraction core talks to documents only through DocumentParser and
 * DocumentHandle. PdfJsDocumentParser is the production implementation over
 * pdfjs-dist (legacy build, the one that runs under plain Node.js).
 *
 * CRITICAL: pdfjs-dist prints warnings with console.log, which would corrupt the
 * JSON-RPC stream on stdout. Verbosity is pinned to ERRORS for every load.
 *
 * @module services/pdf/parser
 */

import { getDocument, PasswordResponses, VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { PdfError, PdfOpenError, PdfPageError, describeError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATOR INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

/** Raw values from the document information dictionary, keys as the parser reports them */
export type RawDocumentMetadata = Record<string, unknown>;

/**
 * An opened document. Every method may reject with an opaque parser error.
 */
export interface DocumentHandle {
  isEncrypted(): boolean;
  /** One decrypt attempt. Resolves false when the password is wrong. */
  decrypt(password: string): Promise<boolean>;
  pageCount(): number;
  metadata(): Promise<RawDocumentMetadata>;
  /** 1-indexed page number */
  extractPageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

export interface DocumentParser {
  open(data: Uint8Array): Promise<DocumentHandle>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PDF.JS IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Info dictionary entries pdfjs-dist derives from the file structure rather than
 * reading from the document's own metadata. They are not reported as metadata.
 */
const DERIVED_INFO_KEYS = new Set([
  'PDFFormatVersion',
  'Language',
  'EncryptFilterName',
  'IsLinearized',
  'IsAcroFormPresent',
  'IsXFAPresent',
  'IsCollectionPresent',
  'IsSignaturesPresent',
]);

function isPasswordError(error: unknown, code: number): boolean {
  return (
    error instanceof Error &&
    error.name === 'PasswordException' &&
    'code' in error &&
    error.code === code
  );
}

async function loadDocument(data: Uint8Array, password?: string): Promise<PDFDocumentProxy> {
  // pdfjs-dist may detach the buffer it is given, so each load gets its own copy
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    password,
    verbosity: VerbosityLevel.ERRORS,
    isEvalSupported: false,
    useSystemFonts: false,
    disableFontFace: true,
  });
  try {
    return await loadingTask.promise;
  } catch (error) {
    await loadingTask.destroy();
    throw error;
  }
}

/**
 * Flatten a pdfjs-dist info value to something JSON can carry.
 * Name objects such as /Trapped arrive as `{ name: 'False' }`.
 */
function toMetadataValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if ('name' in value && typeof value.name === 'string') {
    return value.name;
  }
  return JSON.parse(JSON.stringify(value));
}

class PdfJsDocumentHandle implements DocumentHandle {
  private document: PDFDocumentProxy | null;

  constructor(
    private readonly data: Uint8Array,
    document: PDFDocumentProxy | null,
    private readonly encrypted: boolean
  ) {
    this.document = document;
  }

  isEncrypted(): boolean {
    return this.encrypted;
  }

  async decrypt(password: string): Promise<boolean> {
    try {
      const unlocked = await loadDocument(this.data, password);
      await this.document?.destroy();
      this.document = unlocked;
      return true;
    } catch (error) {
      if (
        isPasswordError(error, PasswordResponses.INCORRECT_PASSWORD) ||
        isPasswordError(error, PasswordResponses.NEED_PASSWORD)
      ) {
        return false;
      }
      throw error;
    }
  }

  pageCount(): number {
    return this.requireDocument().numPages;
  }

  async metadata(): Promise<RawDocumentMetadata> {
    const { info } = await this.requireDocument().getMetadata();
    const result: RawDocumentMetadata = {};
    if (typeof info !== 'object' || info === null) {
      return result;
    }

    const entries: Array<[string, unknown]> = Object.entries(info);
    for (const [key, value] of entries) {
      if (DERIVED_INFO_KEYS.has(key) || value === undefined || value === null) continue;
      if (key === 'Custom' && typeof value === 'object') {
        const custom: Array<[string, unknown]> = Object.entries(value);
        for (const [customKey, customValue] of custom) {
          result[customKey] = toMetadataValue(customValue);
        }
        continue;
      }
      result[key] = toMetadataValue(value);
    }
    return result;
  }

  async extractPageText(pageNumber: number): Promise<string> {
    const document = this.requireDocument();
    if (!Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > document.numPages) {
      throw new PdfPageError(
        `Page ${pageNumber} is out of range (document has ${document.numPages} pages)`,
        pageNumber
      );
    }

    const page = await document.getPage(pageNumber);
    try {
      const textContent = await page.getTextContent();
      let text = '';
      for (const item of textContent.items) {
        if (!('str' in item)) continue;
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      return text;
    } finally {
      page.cleanup();
    }
  }

  async close(): Promise<void> {
    const document = this.document;
    this.document = null;
    await document?.destroy();
  }

  private requireDocument(): PDFDocumentProxy {
    if (!this.document) {
      throw new PdfError('Document is locked or closed; decrypt it before reading content');
    }
    return this.document;
  }
}

/**
 * DocumentParser backed by pdfjs-dist.
 *
 * A file that needs a password to open reports isEncrypted() with no document
 * loaded yet; a file encrypted with an empty user password opens directly but
 * still reports isEncrypted() from its /Encrypt filter.
 */
export class PdfJsDocumentParser implements DocumentParser {
  async open(data: Uint8Array): Promise<DocumentHandle> {
    let document: PDFDocumentProxy;
    try {
      document = await loadDocument(data);
    } catch (error) {
      if (isPasswordError(error, PasswordResponses.NEED_PASSWORD)) {
        return new PdfJsDocumentHandle(data, null, true);
      }
      throw new PdfOpenError(`Could not open PDF: ${describeError(error)}`);
    }

    const { info } = await document.getMetadata();
    const encrypted =
      typeof info === 'object' &&
      info !== null &&
      'EncryptFilterName' in info &&
      typeof info.EncryptFilterName === 'string';
    return new PdfJsDocumentHandle(data, document, encrypted);
  }
}
