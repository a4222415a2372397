/**
 * Shared Startup
 *
 * Applies environment-driven config, prepares the artifact directory and runs
 * the startup retention sweep.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import path from 'path';
import { z } from 'zod';
import { getArtifactStore, getConfig, updateConfig } from './state.js';
import { configurationError } from './errors.js';
import { startPeriodicSweep, sweep, type SweepReport } from '../services/storage/retention-sweeper.js';
import type { ServerConfig } from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

/**
 * Environment variables read at startup. Empty strings count as unset.
 */
const EnvironmentConfig = z.object({
  PDF_READER_RESPONSE_MODE: z.string().toLowerCase().pipe(z.enum(['inline', 'staged'])).optional(),
  PDF_READER_ARTIFACT_DIR: z.string().optional(),
  PDF_READER_RETENTION_HOURS: z.coerce
    .number()
    .positive('PDF_READER_RETENTION_HOURS must be greater than 0')
    .optional(),
  PDF_READER_SWEEP_INTERVAL_MINUTES: z.coerce
    .number()
    .min(0, 'PDF_READER_SWEEP_INTERVAL_MINUTES must be 0 or more')
    .optional(),
  PDF_READER_ALLOWED_DIRS: z.string().optional(),
});

type EnvironmentKey = keyof z.infer<typeof EnvironmentConfig>;

const ENVIRONMENT_KEYS: EnvironmentKey[] = [
  'PDF_READER_RESPONSE_MODE',
  'PDF_READER_ARTIFACT_DIR',
  'PDF_READER_RETENTION_HOURS',
  'PDF_READER_SWEEP_INTERVAL_MINUTES',
  'PDF_READER_ALLOWED_DIRS',
];

/**
 * Map PDF_READER_* environment variables onto the server config.
 *
 * @throws MCPError with CONFIGURATION_ERROR when a variable has an invalid value
 */
export function applyEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present: Partial<Record<EnvironmentKey, string>> = {};
  for (const key of ENVIRONMENT_KEYS) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = EnvironmentConfig.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw configurationError(`Invalid environment configuration: ${problems.join('; ')}`, {
      variables: parsed.error.errors.map((e) => e.path.join('.')),
    });
  }

  const values = parsed.data;
  const updates: Partial<ServerConfig> = {};
  if (values.PDF_READER_RESPONSE_MODE) updates.responseMode = values.PDF_READER_RESPONSE_MODE;
  if (values.PDF_READER_ARTIFACT_DIR) {
    updates.artifactDirectory = path.resolve(values.PDF_READER_ARTIFACT_DIR);
  }
  if (values.PDF_READER_RETENTION_HOURS !== undefined) {
    updates.retentionHours = values.PDF_READER_RETENTION_HOURS;
  }
  if (values.PDF_READER_SWEEP_INTERVAL_MINUTES !== undefined) {
    updates.sweepIntervalMinutes = values.PDF_READER_SWEEP_INTERVAL_MINUTES;
  }
  if (values.PDF_READER_ALLOWED_DIRS) {
    updates.allowedDirectories = values.PDF_READER_ALLOWED_DIRS.split(',')
      .map((d) => d.trim())
      .filter((d) => d.length > 0)
      .map((d) => path.resolve(d));
  }

  if (Object.keys(updates).length > 0) {
    updateConfig(updates);
  }
  return getConfig();
}

export function retentionMs(config: ServerConfig): number {
  return config.retentionHours * HOUR_MS;
}

export interface ArtifactStorageHandle {
  startupSweep: SweepReport;
  /** Stops the periodic sweep; a no-op when periodic sweeping is disabled */
  stop: () => void;
}

/**
 * Create the artifact directory, sweep it once, and schedule periodic sweeps.
 */
export function initializeArtifactStorage(): ArtifactStorageHandle {
  const config = getConfig();
  const store = getArtifactStore();
  store.ensureDirectory();

  const startupSweep = sweep(store.directory, retentionMs(config));
  console.error(
    `[startup] Artifact directory ${store.directory} (mode=${config.responseMode}, ` +
      `retention=${config.retentionHours}h, swept ${startupSweep.deleted} stale file(s))`
  );

  if (config.sweepIntervalMinutes <= 0) {
    return { startupSweep, stop: () => undefined };
  }
  const stop = startPeriodicSweep(
    store.directory,
    retentionMs(config),
    config.sweepIntervalMinutes * MINUTE_MS
  );
  return { startupSweep, stop };
}
