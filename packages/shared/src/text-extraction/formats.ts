/**
 * Document Formats
 *
 * Extension and MIME helpers shared by the validator and the extractors.
 */

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.txt': 'text/plain',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export const IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg'];

/**
 * Lower-cased extension of a filename including the dot, or '' when there
 * is none. Dotfiles such as `.env` have no extension.
 */
export function getExtension(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) {
    return '';
  }
  return base.slice(dot).toLowerCase();
}

export function mimeTypeFor(extension: string): string {
  return MIME_TYPES[extension] ?? 'application/octet-stream';
}

export function toDataUrl(bytes: Buffer, extension: string): string {
  return `data:${mimeTypeFor(extension)};base64,${bytes.toString('base64')}`;
}
