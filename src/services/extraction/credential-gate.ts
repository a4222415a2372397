/**
 * Credential Gate
 *
 * Decides whether a document needs a password and whether a supplied one
 * unlocks it. At most one decrypt attempt per request; nothing is remembered
 * between requests.
 *
 * @module services/extraction/credential-gate
 */

import type { DocumentHandle } from '../pdf/parser.js';

export type CredentialState =
  | 'NO_PASSWORD_NEEDED'
  | 'PASSWORD_REQUIRED'
  | 'PASSWORD_ACCEPTED'
  | 'PASSWORD_REJECTED';

/**
 * States that end the request without reading content.
 */
export function isLocked(
  state: CredentialState
): state is 'PASSWORD_REQUIRED' | 'PASSWORD_REJECTED' {
  return state === 'PASSWORD_REQUIRED' || state === 'PASSWORD_REJECTED';
}

/**
 * Unlock a document with an optional password.
 *
 * An empty string counts as a supplied password; only `undefined` means none.
 */
export async function unlock(
  document: Pick<DocumentHandle, 'isEncrypted' | 'decrypt'>,
  password?: string
): Promise<CredentialState> {
  if (!document.isEncrypted()) {
    return 'NO_PASSWORD_NEEDED';
  }
  if (password === undefined) {
    return 'PASSWORD_REQUIRED';
  }
  return (await document.decrypt(password)) ? 'PASSWORD_ACCEPTED' : 'PASSWORD_REJECTED';
}
