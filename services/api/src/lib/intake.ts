/**
 * Intake Request Validation
 */

import type { ExtractionMode, IntakeRequest } from '@formsift/shared';

export type IntakeValidation = { valid: true; request: Required<IntakeRequest> } | { valid: false; message: string };

function isMode(value: unknown): value is ExtractionMode {
  return value === 'config' || value === 'dynamic';
}

function basename(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts[parts.length - 1] || filePath;
}

export function validateIntake(body: unknown, defaultMode: ExtractionMode): IntakeValidation {
  if (typeof body !== 'object' || body === null) {
    return { valid: false, message: 'Request body must be a JSON object' };
  }

  const filePath = 'file_path' in body ? body.file_path : undefined;
  if (typeof filePath !== 'string' || !filePath.trim()) {
    return { valid: false, message: 'file_path is required' };
  }
  if (!filePath.toLowerCase().endsWith('.pdf')) {
    return { valid: false, message: 'file_path must point to a PDF' };
  }

  const mode = 'mode' in body && body.mode !== undefined ? body.mode : defaultMode;
  if (!isMode(mode)) {
    return { valid: false, message: 'mode must be config or dynamic' };
  }

  const sourceFilename = 'source_filename' in body ? body.source_filename : undefined;
  if (sourceFilename !== undefined && typeof sourceFilename !== 'string') {
    return { valid: false, message: 'source_filename must be a string' };
  }

  return {
    valid: true,
    request: {
      file_path: filePath.trim(),
      mode,
      source_filename: sourceFilename?.trim() || basename(filePath.trim()),
    },
  };
}
