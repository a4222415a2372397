/**
 * Artifact Store
 *
 * Owns the on-disk representation of staged extraction results. One process-wide
 * directory holds every session's files:
 *
 *   {base}_{sessionId}_page_{n}.txt     raw UTF-8 page text
 *   {base}_{sessionId}_metadata.json    session sidecar
 *
 * Artifacts are created exactly once (exclusive create) and never rewritten.
 * Nothing here deletes files; stale artifacts are reclaimed by the retention
 * sweeper.
 *
 * @module services/storage/artifact-store
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ArtifactWriteError, describeError } from '../pdf/errors.js';

/** File extensions of everything the store writes */
export const ARTIFACT_EXTENSIONS: readonly string[] = ['.txt', '.json'];

/** Length of the hex session id taken from a UUID v4 */
const SESSION_ID_LENGTH = 8;

export interface ExtractionSession {
  sessionId: string;
  documentBaseName: string;
  createdAt: string;
}

/**
 * Metadata sidecar contents. Field names are the persisted JSON schema.
 */
export interface SessionMetadataRecord {
  filename: string;
  total_pages: number;
  is_encrypted: boolean;
  metadata: Record<string, unknown>;
  session_id: string;
  extracted_pages: number[];
}

/**
 * Draw a fresh session id: the first 8 hex characters of a random UUID.
 *
 * Uniqueness is probabilistic (32 random bits), which is ample for the number
 * of sessions alive inside one retention window.
 */
export function createSessionId(): string {
  return uuidv4().slice(0, SESSION_ID_LENGTH);
}

export class ArtifactStore {
  private readonly root: string;

  constructor(directory: string) {
    this.root = path.resolve(directory);
  }

  get directory(): string {
    return this.root;
  }

  /**
   * Create the artifact directory (and parents) if missing.
   *
   * @throws ArtifactWriteError when the directory cannot be created
   */
  ensureDirectory(): void {
    try {
      fs.mkdirSync(this.root, { recursive: true });
    } catch (error) {
      throw new ArtifactWriteError(
        `Cannot create artifact directory ${this.root}: ${describeError(error)}`,
        this.root,
        errorCode(error)
      );
    }
  }

  beginSession(documentBaseName: string): ExtractionSession {
    this.ensureDirectory();
    return {
      sessionId: createSessionId(),
      documentBaseName,
      createdAt: new Date().toISOString(),
    };
  }

  pagePath(session: ExtractionSession, pageNumber: number): string {
    return path.join(
      this.root,
      `${session.documentBaseName}_${session.sessionId}_page_${pageNumber}.txt`
    );
  }

  metadataPath(session: ExtractionSession): string {
    return path.join(this.root, `${session.documentBaseName}_${session.sessionId}_metadata.json`);
  }

  writePageArtifact(session: ExtractionSession, pageNumber: number, text: string): string {
    const artifactPath = this.pagePath(session, pageNumber);
    this.writeArtifact(artifactPath, text);
    return artifactPath;
  }

  writeMetadataArtifact(session: ExtractionSession, record: SessionMetadataRecord): string {
    const artifactPath = this.metadataPath(session);
    this.writeArtifact(artifactPath, JSON.stringify(record, null, 2));
    return artifactPath;
  }

  /**
   * Whole-file exclusive write. The path is handed out only after the content
   * is fully on disk; an existing file at the path is an error, never replaced.
   */
  private writeArtifact(artifactPath: string, content: string): void {
    try {
      fs.writeFileSync(artifactPath, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new ArtifactWriteError(
        `Failed to write artifact ${path.basename(artifactPath)}: ${describeError(error)}`,
        artifactPath,
        errorCode(error)
      );
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
