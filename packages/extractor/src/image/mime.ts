import { extname } from 'node:path';

interface FileSignature {
  bytes: number[];
  offset?: number;
}

/**
 * Magic bytes of the formats a vision provider may receive.
 * Checked in order; every signature of an entry must match.
 */
const FILE_SIGNATURES: Array<{ mime: string; signatures: FileSignature[] }> = [
  { mime: 'image/png', signatures: [{ bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] }] },
  { mime: 'image/jpeg', signatures: [{ bytes: [0xff, 0xd8, 0xff] }] },
  {
    mime: 'image/webp',
    signatures: [
      { bytes: [0x52, 0x49, 0x46, 0x46] }, // RIFF
      { bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 }, // WEBP
    ],
  },
  { mime: 'image/gif', signatures: [{ bytes: [0x47, 0x49, 0x46, 0x38] }] }, // GIF8
  { mime: 'image/bmp', signatures: [{ bytes: [0x42, 0x4d] }] }, // BM
  { mime: 'image/tiff', signatures: [{ bytes: [0x49, 0x49, 0x2a, 0x00] }] }, // little endian
  { mime: 'image/tiff', signatures: [{ bytes: [0x4d, 0x4d, 0x00, 0x2a] }] }, // big endian
  { mime: 'application/pdf', signatures: [{ bytes: [0x25, 0x50, 0x44, 0x46] }] }, // %PDF
];

const EXTENSION_MIME: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.pdf': 'application/pdf',
};

export const DEFAULT_IMAGE_MIME = 'image/jpeg';

function matchesSignature(bytes: Uint8Array, signature: FileSignature): boolean {
  const offset = signature.offset ?? 0;
  if (bytes.length < offset + signature.bytes.length) {
    return false;
  }
  return signature.bytes.every((byte, i) => bytes[offset + i] === byte);
}

/**
 * Detect the MIME type from magic bytes, or null when unknown
 */
export function detectMimeType(bytes: Uint8Array): string | null {
  for (const entry of FILE_SIGNATURES) {
    if (entry.signatures.every((signature) => matchesSignature(bytes, signature))) {
      return entry.mime;
    }
  }
  return null;
}

export function mimeTypeFromExtension(filePath: string): string | null {
  return EXTENSION_MIME[extname(filePath).toLowerCase()] ?? null;
}

export function isPdf(filePath: string, bytes?: Uint8Array): boolean {
  if (bytes && detectMimeType(bytes) === 'application/pdf') return true;
  return extname(filePath).toLowerCase() === '.pdf';
}
