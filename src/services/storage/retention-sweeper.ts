/**
 * Retention Sweeper
 *
 * Deletes artifacts older than the retention window from the shared artifact
 * directory, whichever session wrote them. Never throws: every failure is
 * logged to stderr and counted in the report.
 *
 * @module services/storage/retention-sweeper
 */

import fs from 'fs';
import path from 'path';
import { ARTIFACT_EXTENSIONS } from './artifact-store.js';
import { describeError } from '../pdf/errors.js';

export const DEFAULT_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export interface SweepReport {
  directory: string;
  scanned: number;
  deleted: number;
  failed: number;
  errors: Array<{ file: string; error: string }>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Sweep artifact files directly under `directory` whose modification time is
 * older than `now - maxAgeMs`. Subdirectories and files with other extensions
 * are left alone. A file that disappears mid-sweep is not a failure.
 */
export function sweep(
  directory: string,
  maxAgeMs: number = DEFAULT_MAX_AGE_MS,
  now: number = Date.now()
): SweepReport {
  const report: SweepReport = { directory, scanned: 0, deleted: 0, failed: 0, errors: [] };
  const threshold = now - maxAgeMs;

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    if (!isMissing(error)) {
      console.error(`[sweeper] Cannot read ${directory}: ${describeError(error)}`);
      report.failed++;
      report.errors.push({ file: directory, error: describeError(error) });
    }
    return report;
  }

  for (const entry of entries) {
    if (!entry.isFile() || !ARTIFACT_EXTENSIONS.includes(path.extname(entry.name))) continue;
    report.scanned++;

    const filePath = path.join(directory, entry.name);
    try {
      const { mtimeMs } = fs.statSync(filePath);
      if (mtimeMs >= threshold) continue;
      fs.unlinkSync(filePath);
      report.deleted++;
    } catch (error) {
      if (isMissing(error)) continue;
      console.error(`[sweeper] Failed to delete ${entry.name}: ${describeError(error)}`);
      report.failed++;
      report.errors.push({ file: entry.name, error: describeError(error) });
    }
  }

  if (report.deleted > 0 || report.failed > 0) {
    console.error(
      `[sweeper] ${directory}: deleted ${report.deleted} of ${report.scanned} artifact(s), ${report.failed} failure(s)`
    );
  }
  return report;
}

/**
 * Re-run sweep() every `intervalMs`. The timer is unref'd so it never holds
 * the process open. Returns a function that stops it.
 */
export function startPeriodicSweep(
  directory: string,
  maxAgeMs: number,
  intervalMs: number
): () => void {
  const timer = setInterval(() => {
    sweep(directory, maxAgeMs);
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
