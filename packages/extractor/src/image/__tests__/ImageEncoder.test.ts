import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadImage, toDataUrl } from '../ImageEncoder';
import { detectMimeType, isPdf, mimeTypeFromExtension } from '../mime';
import type { PdfRenderer } from '../PdfRenderer';

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);
const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xdb]);
const WEBP = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0x00, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50]);
const PDF = new TextEncoder().encode('%PDF-1.7');

describe('mime detection', () => {
  it('should recognize formats by magic bytes', () => {
    expect(detectMimeType(PNG)).toBe('image/png');
    expect(detectMimeType(JPEG)).toBe('image/jpeg');
    expect(detectMimeType(WEBP)).toBe('image/webp');
    expect(detectMimeType(PDF)).toBe('application/pdf');
    expect(detectMimeType(new Uint8Array([0x00, 0x01]))).toBeNull();
  });

  it('should map extensions case-insensitively', () => {
    expect(mimeTypeFromExtension('scan.JPG')).toBe('image/jpeg');
    expect(mimeTypeFromExtension('scan.heic')).toBeNull();
    expect(isPdf('receipt.PDF')).toBe(true);
    expect(isPdf('receipt.jpg', PDF)).toBe(true);
  });

  it('should build data URLs', () => {
    expect(toDataUrl(JPEG, 'image/jpeg')).toBe('data:image/jpeg;base64,/9j/2w==');
  });
});

describe('loadImage', () => {
  let dir: string;
  const renderFirstPage = vi.fn<PdfRenderer['renderFirstPage']>();
  const renderer: PdfRenderer = { renderFirstPage };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'image-test-'));
    renderFirstPage.mockReset();
    renderFirstPage.mockResolvedValue(PNG);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should prefer the detected type over the extension', async () => {
    const path = join(dir, 'scan.jpg');
    await writeFile(path, PNG);

    const image = await loadImage(path, renderer);

    expect(image.mimeType).toBe('image/png');
    expect(image.rasterized).toBe(false);
    expect(renderFirstPage).not.toHaveBeenCalled();
  });

  it('should fall back to the extension for unknown bytes', async () => {
    const path = join(dir, 'scan.webp');
    await writeFile(path, 'not really an image');

    expect((await loadImage(path, renderer)).mimeType).toBe('image/webp');
  });

  it('should render PDFs, including misnamed ones', async () => {
    const path = join(dir, 'invoice.png');
    await writeFile(path, PDF);

    const image = await loadImage(path, renderer);

    expect(image).toEqual({ sourcePath: path, bytes: PNG, mimeType: 'image/png', rasterized: true });
    expect(renderFirstPage).toHaveBeenCalledWith(path);
  });
});
