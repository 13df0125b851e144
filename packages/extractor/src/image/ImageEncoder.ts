import { readFile } from 'node:fs/promises';
import type { EncodedImage } from '../types';
import type { PdfRenderer } from './PdfRenderer';
import { DEFAULT_IMAGE_MIME, detectMimeType, isPdf, mimeTypeFromExtension } from './mime';

/**
 * Load a source file as image bytes ready for a provider.
 * PDFs are rendered to PNG (first page) through the renderer.
 */
export async function loadImage(sourcePath: string, renderer: PdfRenderer): Promise<EncodedImage> {
  if (isPdf(sourcePath)) {
    return rasterize(sourcePath, renderer);
  }

  const bytes = await readFile(sourcePath);

  // Misnamed PDFs still need rendering
  if (isPdf(sourcePath, bytes)) {
    return rasterize(sourcePath, renderer);
  }

  return {
    sourcePath,
    bytes,
    mimeType: detectMimeType(bytes) ?? mimeTypeFromExtension(sourcePath) ?? DEFAULT_IMAGE_MIME,
    rasterized: false,
  };
}

async function rasterize(sourcePath: string, renderer: PdfRenderer): Promise<EncodedImage> {
  const bytes = await renderer.renderFirstPage(sourcePath);
  return {
    sourcePath,
    bytes,
    mimeType: detectMimeType(bytes) ?? 'image/png',
    rasterized: true,
  };
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function toDataUrl(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${toBase64(bytes)}`;
}
