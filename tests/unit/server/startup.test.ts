/**
 * Unit Tests for Environment Config and Artifact Storage Startup
 *
 * @module tests/unit/server/startup
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  applyEnvironmentConfig,
  initializeArtifactStorage,
  retentionMs,
} from '../../../src/server/startup.js';
import { getConfig, resetState, updateConfig, DEFAULT_ARTIFACT_DIRECTORY } from '../../../src/server/state.js';
import { MCPError } from '../../../src/server/errors.js';
import { createTempDir, cleanupTempDir, listFiles } from '../../helpers/fake-parser.js';

describe('applyEnvironmentConfig', () => {
  beforeEach(() => {
    resetState();
  });

  afterEach(() => {
    resetState();
  });

  it('keeps defaults when no variables are set', () => {
    expect(applyEnvironmentConfig({})).toEqual({
      responseMode: 'inline',
      artifactDirectory: DEFAULT_ARTIFACT_DIRECTORY,
      retentionHours: 24,
      sweepIntervalMinutes: 60,
      allowedDirectories: [],
    });
  });

  it('maps every PDF_READER_* variable onto the config', () => {
    const config = applyEnvironmentConfig({
      PDF_READER_RESPONSE_MODE: 'STAGED',
      PDF_READER_ARTIFACT_DIR: '/var/tmp/pdf-artifacts',
      PDF_READER_RETENTION_HOURS: '2.5',
      PDF_READER_SWEEP_INTERVAL_MINUTES: '0',
      PDF_READER_ALLOWED_DIRS: ' /data/docs , /srv/pdfs ,',
    });

    expect(config).toEqual({
      responseMode: 'staged',
      artifactDirectory: '/var/tmp/pdf-artifacts',
      retentionHours: 2.5,
      sweepIntervalMinutes: 0,
      allowedDirectories: ['/data/docs', '/srv/pdfs'],
    });
    expect(getConfig()).toEqual(config);
  });

  it('treats blank values as unset', () => {
    const config = applyEnvironmentConfig({
      PDF_READER_RESPONSE_MODE: '   ',
      PDF_READER_RETENTION_HOURS: '',
    });

    expect(config.responseMode).toBe('inline');
    expect(config.retentionHours).toBe(24);
  });

  it('rejects a zero retention window', () => {
    expect(() => applyEnvironmentConfig({ PDF_READER_RETENTION_HOURS: '0' })).toThrow(
      'Invalid environment configuration: PDF_READER_RETENTION_HOURS: PDF_READER_RETENTION_HOURS must be greater than 0'
    );
  });

  it('rejects an unknown response mode with CONFIGURATION_ERROR', () => {
    let caught: unknown;
    try {
      applyEnvironmentConfig({ PDF_READER_RESPONSE_MODE: 'streamed' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MCPError);
    if (caught instanceof MCPError) {
      expect(caught.category).toBe('CONFIGURATION_ERROR');
      expect(caught.details).toEqual({ variables: ['PDF_READER_RESPONSE_MODE'] });
    }
    expect(getConfig().responseMode).toBe('inline');
  });

  it('rejects a non-numeric sweep interval', () => {
    expect(() => applyEnvironmentConfig({ PDF_READER_SWEEP_INTERVAL_MINUTES: 'hourly' })).toThrow(
      /PDF_READER_SWEEP_INTERVAL_MINUTES/
    );
  });
});

describe('retentionMs', () => {
  it('converts retention hours to milliseconds', () => {
    resetState();
    expect(retentionMs({ ...getConfig(), retentionHours: 2 })).toBe(7_200_000);
  });
});

describe('initializeArtifactStorage', () => {
  let root: string;

  beforeEach(() => {
    resetState();
    root = createTempDir('test-pdf-startup-');
  });

  afterEach(() => {
    resetState();
    cleanupTempDir(root);
  });

  it('creates a missing artifact directory', () => {
    const artifactDir = path.join(root, 'nested', 'artifacts');
    updateConfig({ artifactDirectory: artifactDir, sweepIntervalMinutes: 0 });

    const handle = initializeArtifactStorage();
    handle.stop();

    expect(fs.statSync(artifactDir).isDirectory()).toBe(true);
    expect(handle.startupSweep).toEqual({
      directory: artifactDir,
      scanned: 0,
      deleted: 0,
      failed: 0,
      errors: [],
    });
  });

  it('sweeps artifacts left over from a previous run', () => {
    updateConfig({ artifactDirectory: root, retentionHours: 1, sweepIntervalMinutes: 0 });
    const stale = path.join(root, 'old_aaaa1111_metadata.json');
    fs.writeFileSync(stale, '{}');
    fs.writeFileSync(path.join(root, 'new_bbbb2222_page_1.txt'), 'fresh');
    fs.writeFileSync(path.join(root, 'notes.md'), 'not an artifact');
    const yesterday = new Date(Date.now() - 24 * 60 * 60 * 1000);
    fs.utimesSync(stale, yesterday, yesterday);

    const handle = initializeArtifactStorage();
    handle.stop();

    expect(handle.startupSweep.scanned).toBe(2);
    expect(handle.startupSweep.deleted).toBe(1);
    expect(listFiles(root)).toEqual(['new_bbbb2222_page_1.txt', 'notes.md']);
  });

  it('returns a stop function for the periodic sweep', () => {
    updateConfig({ artifactDirectory: root, sweepIntervalMinutes: 5 });

    const handle = initializeArtifactStorage();

    expect(() => handle.stop()).not.toThrow();
  });
});
