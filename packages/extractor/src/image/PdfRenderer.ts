import { execFile } from 'node:child_process';
import { createHash } from 'node:crypto';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { PdfRenderError, errorMessage } from '../errors';

const execFileAsync = promisify(execFile);

/**
 * Rasterizes the first page of a PDF into image bytes
 */
export interface PdfRenderer {
  renderFirstPage(pdfPath: string): Promise<Uint8Array>;
}

export interface PdftoppmOptions {
  /** Executable name or absolute path (default: pdftoppm on PATH) */
  binary?: string;
  /** Output resolution in DPI (default: 150) */
  resolution?: number;
  timeoutMs?: number;
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return '';
}

/**
 * poppler's pdftoppm, writing a single PNG into a scratch directory.
 *
 * The output prefix is a short hash of the input path: long or non-ASCII
 * file names break pdftoppm on some platforms.
 */
export class PdftoppmRenderer implements PdfRenderer {
  private binary: string;
  private resolution: number;
  private timeoutMs: number;

  constructor(options: PdftoppmOptions = {}) {
    this.binary = options.binary ?? 'pdftoppm';
    this.resolution = options.resolution ?? 150;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async renderFirstPage(pdfPath: string): Promise<Uint8Array> {
    const workDir = await mkdtemp(join(tmpdir(), 'invoice-ledger-'));
    const prefix = join(workDir, createHash('md5').update(pdfPath).digest('hex').slice(0, 8));

    try {
      await execFileAsync(
        this.binary,
        ['-png', '-singlefile', '-f', '1', '-l', '1', '-r', String(this.resolution), pdfPath, prefix],
        { timeout: this.timeoutMs }
      );
    } catch (error) {
      await rm(workDir, { recursive: true, force: true });
      const detail = stderrOf(error) || errorMessage(error);
      throw new PdfRenderError(pdfPath, `pdftoppm failed: ${detail}`, { cause: error });
    }

    try {
      return await readFile(`${prefix}.png`);
    } catch (error) {
      throw new PdfRenderError(pdfPath, 'pdftoppm produced no output image', { cause: error });
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
