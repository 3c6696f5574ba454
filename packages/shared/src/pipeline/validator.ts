/**
 * Document Validator
 *
 * Cheap acceptance checks run before any provider is contacted.
 */

import { getExtension } from '../text-extraction/formats';
import type { DocumentPolicy, DocumentValidation } from '../types';

function formatList(extensions: readonly string[]): string {
  return extensions.join(', ');
}

/**
 * Check a document's extension and size against a policy.
 * Extension is checked first; a document of exactly the maximum size passes.
 */
export function validateDocument(
  filename: string,
  sizeBytes: number,
  policy: DocumentPolicy
): DocumentValidation {
  const extension = getExtension(filename);

  if (extension === '') {
    return {
      ok: false,
      reason: `File has no extension. Supported formats: ${formatList(policy.supportedExtensions)}`,
    };
  }

  if (!policy.supportedExtensions.includes(extension)) {
    return {
      ok: false,
      reason: `Unsupported file format "${extension}". Supported formats: ${formatList(policy.supportedExtensions)}`,
    };
  }

  if (sizeBytes > policy.maxDocumentBytes) {
    return {
      ok: false,
      reason: `File too large (${sizeBytes} bytes). Maximum allowed: ${policy.maxDocumentBytes} bytes`,
    };
  }

  return { ok: true, extension };
}
