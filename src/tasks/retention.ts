import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule from '../logger.js';
import metricsModule, { type MetricsRegistry, type RetentionSweepKind } from '../metrics/index.js';
import type { RetentionWarning } from '../types.js';
import { forgetKey, unixSeconds, type Ledger, type LedgerStore } from '../archive/ledger.js';
import {
  dayOutputPath,
  hourOutputPath,
  mergedRootPath,
  originalFolderPath,
  parseDayKey,
  parseFolderName,
  parseHourKey,
  parseOriginalKey,
  type ArchiveLayout
} from '../archive/naming.js';

type RetentionLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

const SECONDS_PER_DAY = 86_400;

export interface RetentionTaskOptions {
  layout: ArchiveLayout;
  ledger: Ledger;
  store: LedgerStore;
  deleteOriginalAfterDays: number;
  deleteMergedAfterDays: number;
  now?: () => Date;
  logger?: RetentionLogger;
  metrics?: MetricsRegistry;
}

export type RetentionSweepResult = {
  sweep: RetentionSweepKind;
  skipped: boolean;
  removed: number;
  keysRemoved: number;
  warnings: RetentionWarning[];
};

export type RetentionRunResult = {
  original: RetentionSweepResult;
  merged: RetentionSweepResult;
};

type SweepContext = {
  options: RetentionTaskOptions;
  logger: RetentionLogger;
  metrics: MetricsRegistry;
  nowSeconds: number;
  result: RetentionSweepResult;
};

function createContext(
  options: RetentionTaskOptions,
  sweep: RetentionSweepKind,
  windowDays: number
): SweepContext {
  const now = options.now ?? (() => new Date());
  return {
    options,
    logger: options.logger ?? loggerModule,
    metrics: options.metrics ?? metricsModule,
    nowSeconds: unixSeconds(now().getTime()),
    result: { sweep, skipped: windowDays <= 0, removed: 0, keysRemoved: 0, warnings: [] }
  };
}

function isExpired(context: SweepContext, stamp: number | undefined, windowDays: number) {
  return typeof stamp === 'number' && context.nowSeconds - stamp > windowDays * SECONDS_PER_DAY;
}

function warn(context: SweepContext, warning: RetentionWarning, err?: Error) {
  context.result.warnings.push(warning);
  context.metrics.recordRetentionWarning(warning);
  context.logger.warn({ err, path: warning.path, key: warning.key }, warning.reason);
}

async function finish(context: SweepContext) {
  const { result } = context;
  if (result.removed > 0 || result.keysRemoved > 0) {
    await context.options.store.save(context.options.ledger);
  }
  context.metrics.recordRetentionRun({ sweep: result.sweep, removed: result.removed });
  context.logger.info(
    {
      sweep: result.sweep,
      removed: result.removed,
      keysRemoved: result.keysRemoved,
      warnings: result.warnings.length
    },
    'Retention sweep completed'
  );
  return result;
}

/**
 * Deletes the files of original hour folders whose `original` timestamp is
 * past the window, then the folder itself when it ends up empty. A folder
 * that is gone already just loses its key.
 */
export async function cleanupOriginalSources(options: RetentionTaskOptions): Promise<RetentionSweepResult> {
  const windowDays = options.deleteOriginalAfterDays;
  const context = createContext(options, 'original', windowDays);
  if (context.result.skipped) {
    context.logger.info({ sweep: 'original' }, 'Original source retention disabled');
    return context.result;
  }

  const { ledger, layout } = options;
  for (const [raw, stamp] of Array.from(ledger.timestamps.entries())) {
    const key = parseOriginalKey(raw);
    if (!key || !isExpired(context, stamp, windowDays)) {
      continue;
    }

    const folder = originalFolderPath(layout, key);
    let handled = true;
    try {
      const entries = await fs.readdir(folder, { withFileTypes: true });
      let deletedFiles = 0;
      for (const entry of entries) {
        if (!entry.isFile()) {
          continue;
        }
        const filePath = path.join(folder, entry.name);
        try {
          await fs.unlink(filePath);
          deletedFiles += 1;
        } catch (error) {
          handled = false;
          warn(context, { path: filePath, reason: 'Failed to delete original file', key: raw }, toError(error));
        }
      }

      if ((await fs.readdir(folder)).length === 0) {
        await fs.rmdir(folder);
        context.result.removed += 1;
        context.logger.info({ folder, deletedFiles }, 'Removed original hour folder');
      } else {
        warn(context, { path: folder, reason: 'Original folder not empty, left in place', key: raw });
      }
    } catch (error) {
      if (!isNotFound(error)) {
        handled = false;
        warn(context, { path: folder, reason: 'Failed to clean original folder', key: raw }, toError(error));
      }
    }

    if (handled && forgetKey(ledger, raw)) {
      context.result.keysRemoved += 1;
    }
  }

  return finish(context);
}

/**
 * Deletes hour and day outputs whose merge timestamp is past the window and
 * drops their keys together with the timestamps. Empty day directories under
 * the merged root are removed afterwards.
 */
export async function cleanupMergedOutputs(options: RetentionTaskOptions): Promise<RetentionSweepResult> {
  const windowDays = options.deleteMergedAfterDays;
  const context = createContext(options, 'merged', windowDays);
  if (context.result.skipped) {
    context.logger.info({ sweep: 'merged' }, 'Merged output retention disabled');
    return context.result;
  }

  const { ledger, layout } = options;
  const candidates: Array<{ raw: string; output: string }> = [];

  for (const raw of Array.from(ledger.hours).sort()) {
    const key = parseHourKey(raw);
    if (key && isExpired(context, ledger.timestamps.get(raw), windowDays)) {
      candidates.push({ raw, output: hourOutputPath(layout, key) });
    }
  }
  for (const raw of Array.from(ledger.days).sort()) {
    const key = parseDayKey(raw);
    if (key && isExpired(context, ledger.timestamps.get(raw), windowDays)) {
      candidates.push({ raw, output: dayOutputPath(layout, key) });
    }
  }

  for (const { raw, output } of candidates) {
    try {
      await fs.unlink(output);
      context.result.removed += 1;
      context.logger.info({ output, key: raw }, 'Removed expired merged output');
    } catch (error) {
      if (!isNotFound(error)) {
        warn(context, { path: output, reason: 'Failed to delete merged output', key: raw }, toError(error));
        continue;
      }
    }
    if (forgetKey(ledger, raw)) {
      context.result.keysRemoved += 1;
    }
  }

  await removeEmptyDayDirectories(context, mergedRootPath(layout));

  return finish(context);
}

async function removeEmptyDayDirectories(context: SweepContext, mergedRoot: string) {
  let entries: string[];
  try {
    entries = (await fs.readdir(mergedRoot, { withFileTypes: true }))
      .filter(entry => entry.isDirectory() && parseFolderName(entry.name)?.hour === null)
      .map(entry => entry.name);
  } catch (error) {
    if (!isNotFound(error)) {
      warn(context, { path: mergedRoot, reason: 'Failed to list merged output root' }, toError(error));
    }
    return;
  }

  for (const name of entries) {
    const dayDir = path.join(mergedRoot, name);
    try {
      if ((await fs.readdir(dayDir)).length === 0) {
        await fs.rmdir(dayDir);
        context.logger.info({ dir: dayDir }, 'Removed empty merged day directory');
      }
    } catch (error) {
      warn(context, { path: dayDir, reason: 'Failed to remove merged day directory' }, toError(error));
    }
  }
}

export async function runRetentionOnce(options: RetentionTaskOptions): Promise<RetentionRunResult> {
  const original = await cleanupOriginalSources(options);
  const merged = await cleanupMergedOutputs(options);
  return { original, merged };
}

function toError(error: unknown) {
  return error instanceof Error ? error : new Error(String(error));
}

function isNotFound(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
