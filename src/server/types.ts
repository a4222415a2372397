/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { ResponseMode } from '../services/extraction/orchestrator.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Shape of read_pdf results: page text inline, or paths to staged artifacts */
  responseMode: ResponseMode;

  /** Process-wide directory for staged artifacts */
  artifactDirectory: string;

  /** Artifacts older than this are deleted by the sweeper (default: 24) */
  retentionHours: number;

  /** Minutes between periodic sweeps; 0 disables them (default: 60) */
  sweepIntervalMinutes: number;

  /** Directories read_pdf may open files under; empty means unrestricted */
  allowedDirectories: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Server configuration */
  config: ServerConfig;
}
