import { link, rename, stat, unlink } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { RenameError, errorMessage, systemErrorCode } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { InvoiceRecord } from '../types';
import { formatAmount } from '../utils';

export const MAX_BUYER_LENGTH = 40;

/** `target_unchecked`: the file system could not say whether a name was free */
export type SkipReason = 'failed' | 'missing_buyer' | 'target_unchecked';

export type RenamePlanEntry =
  | { action: 'rename'; sourcePath: string; targetPath: string }
  | { action: 'keep'; sourcePath: string }
  | { action: 'skip'; sourcePath: string; reason: SkipReason };

export type RenameOutcome =
  | { status: 'renamed'; sourcePath: string; targetPath: string }
  | { status: 'unchanged'; sourcePath: string }
  | { status: 'skipped'; sourcePath: string; reason: SkipReason }
  | { status: 'failed'; sourcePath: string; targetPath: string; error: RenameError };

/** Errors after which a plain rename is tried instead of link + unlink */
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EXDEV', 'ENOSYS', 'EOPNOTSUPP']);

/**
 * Make a buyer name usable inside a file name: whitespace removed,
 * reserved and control characters replaced with `_`, leading dots
 * stripped, at most MAX_BUYER_LENGTH characters.
 */
export function sanitizeFileComponent(value: string): string {
  const cleaned = value
    .replace(/\s+/g, '')
    .replace(/[/\\:*?"<>|\u0000-\u001f\u007f]/g, '_')
    .replace(/^\.+/, '');
  return Array.from(cleaned).slice(0, MAX_BUYER_LENGTH).join('');
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

function withSuffix(name: string, ext: string, n: number): string {
  return n === 0 ? `${name}${ext}` : `${name}-${n}${ext}`;
}

async function claimTarget(sourcePath: string, stem: string, claimed: Set<string>): Promise<RenamePlanEntry> {
  const directory = dirname(sourcePath);
  const ext = extname(sourcePath);

  for (let n = 0; ; n++) {
    const targetPath = join(directory, withSuffix(stem, ext, n));

    if (targetPath === sourcePath) {
      claimed.add(targetPath);
      return { action: 'keep', sourcePath };
    }
    if (claimed.has(targetPath)) continue;

    try {
      if (await exists(targetPath)) continue;
    } catch {
      return { action: 'skip', sourcePath, reason: 'target_unchecked' };
    }

    claimed.add(targetPath);
    return { action: 'rename', sourcePath, targetPath };
  }
}

/**
 * Propose `<amount>-<buyer><ext>` names beside each source file.
 * Names already on disk or claimed earlier in the plan get -1, -2, ...
 */
export async function planRenames(records: readonly InvoiceRecord[]): Promise<RenamePlanEntry[]> {
  const claimed = new Set<string>();
  const plan: RenamePlanEntry[] = [];

  for (const record of records) {
    const { sourcePath } = record;

    if (record.extractionStatus === 'failed') {
      plan.push({ action: 'skip', sourcePath, reason: 'failed' });
      continue;
    }

    const buyer = sanitizeFileComponent(record.buyerName ?? '');
    if (!buyer) {
      plan.push({ action: 'skip', sourcePath, reason: 'missing_buyer' });
      continue;
    }

    plan.push(await claimTarget(sourcePath, `${formatAmount(record.amountTotal)}-${buyer}`, claimed));
  }

  return plan;
}

async function moveFile(sourcePath: string, targetPath: string): Promise<void> {
  try {
    // link fails with EEXIST instead of overwriting
    await link(sourcePath, targetPath);
  } catch (error) {
    const code = systemErrorCode(error);
    if (code === undefined || !LINK_UNSUPPORTED.has(code)) throw error;

    if (await exists(targetPath)) {
      throw new Error(`Target already exists: ${basename(targetPath)}`);
    }
    await rename(sourcePath, targetPath);
    return;
  }

  try {
    await unlink(sourcePath);
  } catch (error) {
    await unlink(targetPath);
    throw error;
  }
}

/**
 * Apply a plan. Each file is renamed completely or not at all;
 * a failure is reported in its outcome and the rest still run.
 */
export async function executeRenames(
  plan: readonly RenamePlanEntry[],
  logger: Logger = silentLogger
): Promise<RenameOutcome[]> {
  const outcomes: RenameOutcome[] = [];

  for (const entry of plan) {
    switch (entry.action) {
      case 'skip':
        outcomes.push({ status: 'skipped', sourcePath: entry.sourcePath, reason: entry.reason });
        break;

      case 'keep':
        outcomes.push({ status: 'unchanged', sourcePath: entry.sourcePath });
        break;

      case 'rename':
        try {
          await moveFile(entry.sourcePath, entry.targetPath);
          logger.info('Renamed file', { sourcePath: entry.sourcePath, targetPath: entry.targetPath });
          outcomes.push({ status: 'renamed', sourcePath: entry.sourcePath, targetPath: entry.targetPath });
        } catch (error) {
          const renameError = new RenameError(
            entry.sourcePath,
            entry.targetPath,
            `Could not rename ${basename(entry.sourcePath)}: ${errorMessage(error)}`,
            { cause: error }
          );
          logger.warn('Rename failed', { sourcePath: entry.sourcePath, error: renameError.message });
          outcomes.push({
            status: 'failed',
            sourcePath: entry.sourcePath,
            targetPath: entry.targetPath,
            error: renameError,
          });
        }
        break;
    }
  }

  return outcomes;
}
