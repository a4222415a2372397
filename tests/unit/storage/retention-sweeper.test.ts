/**
 * Unit Tests for the Retention Sweeper
 *
 * @module tests/unit/storage/retention-sweeper
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  sweep,
  startPeriodicSweep,
  DEFAULT_MAX_AGE_MS,
} from '../../../src/services/storage/retention-sweeper.js';
import { createTempDir, cleanupTempDir, listFiles } from '../../helpers/fake-parser.js';

const HOUR_MS = 60 * 60 * 1000;
const NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

function writeAged(dir: string, name: string, ageMs: number): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, name);
  const mtime = new Date(NOW - ageMs);
  fs.utimesSync(filePath, mtime, mtime);
  return filePath;
}

describe('sweep', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('test-pdf-sweep-');
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('defaults to a 24 hour retention window', () => {
    expect(DEFAULT_MAX_AGE_MS).toBe(24 * HOUR_MS);
  });

  it('deletes artifacts older than the window and keeps newer ones', () => {
    writeAged(dir, 'old_aaaa1111_page_1.txt', 30 * HOUR_MS);
    writeAged(dir, 'old_aaaa1111_metadata.json', 25 * HOUR_MS);
    writeAged(dir, 'new_bbbb2222_page_1.txt', 1 * HOUR_MS);
    writeAged(dir, 'new_bbbb2222_metadata.json', 23 * HOUR_MS);

    const report = sweep(dir, 24 * HOUR_MS, NOW);

    expect(report).toEqual({ directory: dir, scanned: 4, deleted: 2, failed: 0, errors: [] });
    expect(listFiles(dir)).toEqual(['new_bbbb2222_metadata.json', 'new_bbbb2222_page_1.txt']);
  });

  it('is a no-op when run twice in a row', () => {
    writeAged(dir, 'old_aaaa1111_page_1.txt', 48 * HOUR_MS);
    writeAged(dir, 'new_bbbb2222_page_1.txt', HOUR_MS);

    const first = sweep(dir, 24 * HOUR_MS, NOW);
    const second = sweep(dir, 24 * HOUR_MS, NOW);

    expect(first.deleted).toBe(1);
    expect(second).toEqual({ directory: dir, scanned: 1, deleted: 0, failed: 0, errors: [] });
  });

  it('ignores files with other extensions and subdirectories', () => {
    writeAged(dir, 'keep.pdf', 48 * HOUR_MS);
    writeAged(dir, 'keep.log', 48 * HOUR_MS);
    fs.mkdirSync(path.join(dir, 'nested.txt'));

    const report = sweep(dir, 24 * HOUR_MS, NOW);

    expect(report.scanned).toBe(0);
    expect(report.deleted).toBe(0);
    expect(listFiles(dir)).toEqual(['keep.log', 'keep.pdf', 'nested.txt']);
  });

  it('returns an empty report for a missing directory', () => {
    const missing = path.join(dir, 'does-not-exist');

    expect(sweep(missing, 24 * HOUR_MS, NOW)).toEqual({
      directory: missing,
      scanned: 0,
      deleted: 0,
      failed: 0,
      errors: [],
    });
  });

  it('reports a directory it cannot read without throwing', () => {
    const notADirectory = writeAged(dir, 'plain.txt', 0);

    const report = sweep(notADirectory, 24 * HOUR_MS, NOW);

    expect(report.failed).toBe(1);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].file).toBe(notADirectory);
  });

  it('deletes everything with a zero max age', () => {
    writeAged(dir, 'a_11111111_page_1.txt', HOUR_MS);
    writeAged(dir, 'a_11111111_metadata.json', HOUR_MS);

    expect(sweep(dir, 0, NOW).deleted).toBe(2);
    expect(listFiles(dir)).toEqual([]);
  });
});

describe('startPeriodicSweep', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('test-pdf-periodic-');
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    cleanupTempDir(dir);
  });

  it('sweeps on each interval until stopped', () => {
    const stale = path.join(dir, 'x_22222222_page_1.txt');
    fs.writeFileSync(stale, 'stale');
    const past = new Date(Date.now() - 2 * HOUR_MS);
    fs.utimesSync(stale, past, past);

    const stop = startPeriodicSweep(dir, HOUR_MS, 60_000);
    expect(fs.existsSync(stale)).toBe(true);

    vi.advanceTimersByTime(60_000);
    expect(fs.existsSync(stale)).toBe(false);

    stop();
    const later = path.join(dir, 'y_33333333_page_1.txt');
    fs.writeFileSync(later, 'stale');
    fs.utimesSync(later, past, past);
    vi.advanceTimersByTime(120_000);
    expect(fs.existsSync(later)).toBe(true);
  });
});
