import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

export const INVOICE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.pdf',
  '.png',
  '.jpg',
  '.jpeg',
  '.webp',
  '.bmp',
  '.tif',
  '.tiff',
]);

/** Travel itineraries sit next to invoices but are not invoices */
export const DEFAULT_EXCLUDE_KEYWORDS: readonly string[] = ['行程单', 'itinerary'];

export interface FileWalkerOptions {
  /** File names containing any of these (case-insensitive) are skipped */
  excludeKeywords?: readonly string[];
}

function byCodeUnit(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Lazy, restartable walk over the invoice files below a root directory.
 *
 * Entries are visited depth-first with each directory's entries sorted by
 * code unit, so a tree always yields the same sequence. Each iteration
 * re-reads the file system.
 */
export class FileWalker implements AsyncIterable<string> {
  readonly root: string;
  private readonly excludeKeywords: string[];

  constructor(root: string, options: FileWalkerOptions = {}) {
    this.root = resolve(root);
    this.excludeKeywords = (options.excludeKeywords ?? DEFAULT_EXCLUDE_KEYWORDS)
      .map((keyword) => keyword.trim().toLowerCase())
      .filter((keyword) => keyword !== '');
  }

  isEligible(fileName: string): boolean {
    if (!INVOICE_EXTENSIONS.has(extname(fileName).toLowerCase())) return false;
    const lower = fileName.toLowerCase();
    return !this.excludeKeywords.some((keyword) => lower.includes(keyword));
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.walk(this.root);
  }

  async list(): Promise<string[]> {
    const files: string[] = [];
    for await (const file of this) {
      files.push(file);
    }
    return files;
  }

  private async *walk(directory: string): AsyncGenerator<string> {
    const entries = await readdir(directory, { withFileTypes: true });
    entries.sort(byCodeUnit);

    for (const entry of entries) {
      const path = join(directory, entry.name);
      if (entry.isDirectory()) {
        yield* this.walk(path);
      } else if (entry.isFile() && this.isEligible(entry.name)) {
        yield path;
      }
    }
  }
}
