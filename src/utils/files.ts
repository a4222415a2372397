/**
 * File System Helpers
 *
 * @module utils/files
 */

import fs from 'fs';

/**
 * True when `filePath` names an existing regular file.
 *
 * Any stat failure (missing entry, a file used as a directory segment, a name
 * too long for the platform, no permission) counts as "not a file".
 */
export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
