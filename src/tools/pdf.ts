/**
 * PDF Reader MCP Tools
 *
 * Tools: read_pdf, pdf_cleanup_artifacts, pdf_config_get
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/pdf
 */

import { getConfig, getOrchestrator, getArtifactStore } from '../server/state.js';
import { retentionMs } from '../server/startup.js';
import { successResult } from '../server/types.js';
import { sweep } from '../services/storage/retention-sweeper.js';
import {
  validateInput,
  sanitizePath,
  ReadPdfInput,
  CleanupArtifactsInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

const HOUR_MS = 60 * 60 * 1000;

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * read_pdf: resolve the path, then hand off to the extraction orchestrator.
 *
 * Extraction failures come back in the orchestrator's own shape
 * (`success: false`, `error` string). Password outcomes are not flagged as tool
 * errors because the expected next step is a retry with a password.
 */
export async function handleReadPdf(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReadPdfInput, params);
    const filePath = sanitizePath(input.file_path, getConfig().allowedDirectories);

    const result = await getOrchestrator().extract({
      filePath,
      password: input.password,
      pages: input.pages,
    });

    const isError = !result.success && !result.password_required;
    return formatResponse(result, isError);
  } catch (error) {
    return handleError(error);
  }
}

export async function handleCleanupArtifacts(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(CleanupArtifactsInput, params);
    const config = getConfig();
    const maxAgeMs =
      input.max_age_hours !== undefined ? input.max_age_hours * HOUR_MS : retentionMs(config);

    const report = sweep(getArtifactStore().directory, maxAgeMs);
    return formatResponse(
      successResult({
        ...report,
        max_age_hours: maxAgeMs / HOUR_MS,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigGet(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const config = getConfig();
    return formatResponse(
      successResult({
        response_mode: config.responseMode,
        artifact_directory: config.artifactDirectory,
        retention_hours: config.retentionHours,
        sweep_interval_minutes: config.sweepIntervalMinutes,
        allowed_directories: config.allowedDirectories,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * PDF tools collection for MCP server registration
 */
export const pdfTools: Record<string, ToolDefinition> = {
  read_pdf: {
    description:
      'Read a PDF file and extract its text page by page. Works with both protected and unprotected PDFs. ' +
      'If the result has password_required=true, ask the user for the password and call again with it. ' +
      'Depending on server configuration, page text is returned inline (content) or as paths to ' +
      'temporary text files (content_files) that expire after the retention window.',
    inputSchema: {
      file_path: ReadPdfInput.shape.file_path.describe(
        'Path to the PDF file (relative paths resolve against the server working directory)'
      ),
      password: ReadPdfInput.shape.password.describe(
        'Password to decrypt the PDF if it is protected'
      ),
      pages: ReadPdfInput.shape.pages,
    },
    handler: handleReadPdf,
  },
  pdf_cleanup_artifacts: {
    description:
      'Delete staged PDF text artifacts older than the retention window (or max_age_hours). Returns a sweep report.',
    inputSchema: {
      max_age_hours: CleanupArtifactsInput.shape.max_age_hours,
    },
    handler: handleCleanupArtifacts,
  },
  pdf_config_get: {
    description:
      'Show the PDF reader configuration: response mode, artifact directory, retention and allowed directories.',
    inputSchema: {},
    handler: handleConfigGet,
  },
};
