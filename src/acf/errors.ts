// ============================================================
// acf-locate — Error Formatting
// ============================================================

import type { AcfError, NotFoundSubject } from '../types/index.js';

const NOT_FOUND_LABELS: Record<NotFoundSubject, string> = {
  app: 'No library contains app',
  field: 'Field not present',
  user: 'No user record in loginusers.vdf',
  game: 'No installed game named',
  file: 'File not found',
  client: 'Steam installation not found',
  appdata: 'No save-data directory found for app',
};

/**
 * One-line, human-readable description of an error.
 */
export function formatError(error: AcfError): string {
  switch (error.kind) {
    case 'malformed-document': {
      const where = error.source ? `${error.source}: ` : '';
      return `${where}Expected ${error.expected} at fragment ${error.position}, got ${error.found}`;
    }
    case 'schema-mismatch':
      return `Root node '${error.expectedRootKey}' not found. Wrong file?`;
    case 'not-found': {
      const label = NOT_FOUND_LABELS[error.what];
      return error.key !== undefined ? `${label}: ${error.key}` : label;
    }
    case 'io-error':
      return `Could not read ${error.path}: ${error.message}`;
    case 'unsupported':
      return `Unsupported platform: ${error.platform}`;
  }
}

/** True for "not installed" style answers, which the CLI treats as non-fatal */
export function isAbsence(error: AcfError): boolean {
  return error.kind === 'not-found' && (error.what === 'app' || error.what === 'game' || error.what === 'appdata');
}
