/**
 * Unit Tests for File System Helpers
 *
 * @module tests/unit/utils/files
 */

import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { isFile } from '../../../src/utils/files.js';
import { createTempDir, cleanupTempDir, writeFakePdf } from '../../helpers/fake-parser.js';

describe('isFile', () => {
  let dir: string;
  let report: string;

  beforeEach(() => {
    dir = createTempDir('test-pdf-files-');
    report = writeFakePdf(dir, 'report.pdf', 'fake-pdf:empty');
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('accepts a regular file', () => {
    expect(isFile(report)).toBe(true);
  });

  it('rejects a directory', () => {
    expect(isFile(dir)).toBe(false);
  });

  it('rejects a missing path', () => {
    expect(isFile(path.join(dir, 'missing.pdf'))).toBe(false);
  });

  it('rejects a path that treats a file as a directory', () => {
    expect(isFile(path.join(report, 'secret'))).toBe(false);
  });

  it('rejects a name longer than the file system allows', () => {
    expect(isFile(path.join(dir, `${'x'.repeat(300)}.pdf`))).toBe(false);
  });
});
