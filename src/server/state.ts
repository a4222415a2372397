/**
 * MCP Server State Management
 *
 * Holds the server configuration and the service instances built from it.
 * Services are created lazily and rebuilt whenever the configuration changes,
 * so tests can point the artifact store at an isolated directory.
 *
 * @module server/state
 */

import os from 'os';
import path from 'path';
import { ExtractionOrchestrator, type ResponseMode } from '../services/extraction/orchestrator.js';
import { PdfJsDocumentParser, type DocumentParser } from '../services/pdf/parser.js';
import { ArtifactStore } from '../services/storage/artifact-store.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_ARTIFACT_DIRECTORY = path.join(os.tmpdir(), 'pdf-reader-mcp', 'artifacts');

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  responseMode: 'inline',
  artifactDirectory: DEFAULT_ARTIFACT_DIRECTORY,
  retentionHours: 24,
  sweepIntervalMinutes: 60,
  allowedDirectories: [],
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  config: { ...defaultConfig },
};

let _parser: DocumentParser | null = null;
let _store: ArtifactStore | null = null;
let _orchestrator: ExtractionOrchestrator | null = null;

function clearServices(): void {
  _store = null;
  _orchestrator = null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

export function getDocumentParser(): DocumentParser {
  if (!_parser) {
    _parser = new PdfJsDocumentParser();
  }
  return _parser;
}

/**
 * Replace the document parser (tests substitute an in-process fake).
 */
export function setDocumentParser(parser: DocumentParser | null): void {
  _parser = parser;
  _orchestrator = null;
}

export function getArtifactStore(): ArtifactStore {
  if (!_store) {
    _store = new ArtifactStore(state.config.artifactDirectory);
  }
  return _store;
}

/**
 * Orchestrator for the configured response mode, or an explicit override
 * (the pdf:// resources always render inline).
 */
export function getOrchestrator(mode?: ResponseMode): ExtractionOrchestrator {
  if (mode && mode !== state.config.responseMode) {
    return new ExtractionOrchestrator({ parser: getDocumentParser(), mode, store: getArtifactStore() });
  }
  if (!_orchestrator) {
    _orchestrator = new ExtractionOrchestrator({
      parser: getDocumentParser(),
      mode: state.config.responseMode,
      store: getArtifactStore(),
    });
  }
  return _orchestrator;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config, allowedDirectories: [...state.config.allowedDirectories] };
}

/**
 * Update server configuration. Services built from the old values are dropped.
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
  clearServices();
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig };
  clearServices();
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  resetConfig();
  _parser = null;
}
