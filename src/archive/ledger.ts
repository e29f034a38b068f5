import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule, { type ArchiverLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { DayKey, HourKey, OriginalFolderKey } from '../types.js';
import {
  cameraSourcePath,
  dayOutputPath,
  hourOutputPath,
  parseDayKey,
  parseHourKey,
  parseOriginalKey,
  serializeLedgerKey,
  type ArchiveLayout
} from './naming.js';
import type { ValidityChecker } from './validity.js';

/**
 * In-memory idempotency state. `hours` and `days` hold serialized keys of
 * completed merges; `timestamps` maps any key (hour, day or original) to the
 * Unix time in seconds it was produced.
 */
export type Ledger = {
  hours: Set<string>;
  days: Set<string>;
  timestamps: Map<string, number>;
};

export type LedgerDocument = {
  hours: string[];
  days: string[];
  merge_timestamps: Record<string, number>;
};

export type LedgerLoadResult = {
  ledger: Ledger;
  status: 'loaded' | 'missing' | 'corrupt';
};

export interface LedgerStore {
  load(): Promise<LedgerLoadResult>;
  save(ledger: Ledger): Promise<boolean>;
}

export function createLedger(): Ledger {
  return { hours: new Set(), days: new Set(), timestamps: new Map() };
}

export function unixSeconds(ms: number) {
  return ms / 1000;
}

export function hasHour(ledger: Ledger, key: HourKey) {
  return ledger.hours.has(serializeLedgerKey(key));
}

export function hasDay(ledger: Ledger, key: DayKey) {
  return ledger.days.has(serializeLedgerKey(key));
}

export function markHour(ledger: Ledger, key: HourKey, nowMs: number) {
  const raw = serializeLedgerKey(key);
  ledger.hours.add(raw);
  ledger.timestamps.set(raw, unixSeconds(nowMs));
}

export function markDay(ledger: Ledger, key: DayKey, nowMs: number) {
  const raw = serializeLedgerKey(key);
  ledger.days.add(raw);
  ledger.timestamps.set(raw, unixSeconds(nowMs));
}

/** First stamp wins so a re-merge never pushes the source retention deadline back. */
export function stampOriginal(ledger: Ledger, key: OriginalFolderKey, nowMs: number) {
  const raw = serializeLedgerKey(key);
  if (!ledger.timestamps.has(raw)) {
    ledger.timestamps.set(raw, unixSeconds(nowMs));
  }
}

export function hasOriginalStamp(ledger: Ledger, key: OriginalFolderKey) {
  return ledger.timestamps.has(serializeLedgerKey(key));
}

export function forgetKey(ledger: Ledger, raw: string) {
  const hadHour = ledger.hours.delete(raw);
  const hadDay = ledger.days.delete(raw);
  const hadTimestamp = ledger.timestamps.delete(raw);
  return hadHour || hadDay || hadTimestamp;
}

/** Completion sets emptied, timestamps kept so retention windows are not reset. */
export function withoutCompletions(ledger: Ledger): Ledger {
  return { hours: new Set(), days: new Set(), timestamps: new Map(ledger.timestamps) };
}

export function toDocument(ledger: Ledger): LedgerDocument {
  const merge_timestamps: Record<string, number> = {};
  for (const key of Array.from(ledger.timestamps.keys()).sort()) {
    const value = ledger.timestamps.get(key);
    if (typeof value === 'number') {
      merge_timestamps[key] = value;
    }
  }
  return {
    hours: Array.from(new Set(ledger.hours)).sort(),
    days: Array.from(new Set(ledger.days)).sort(),
    merge_timestamps
  };
}

export function fromDocument(value: unknown): Ledger | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }

  const hours = 'hours' in value ? value.hours : [];
  const days = 'days' in value ? value.days : [];
  const timestamps = 'merge_timestamps' in value ? value.merge_timestamps : {};

  if (!isStringArray(hours) || !isStringArray(days)) {
    return null;
  }
  if (typeof timestamps !== 'object' || timestamps === null || Array.isArray(timestamps)) {
    return null;
  }

  const ledger = createLedger();
  hours.forEach(key => ledger.hours.add(key));
  days.forEach(key => ledger.days.add(key));
  for (const [key, stamp] of Object.entries(timestamps)) {
    if (typeof stamp === 'number' && Number.isFinite(stamp)) {
      ledger.timestamps.set(key, stamp);
    }
  }
  return ledger;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export type FileLedgerStoreOptions = {
  logger?: ArchiverLogger;
  metrics?: MetricsRegistry;
};

/** JSON ledger file, replaced atomically through a sibling temp file. */
export class FileLedgerStore implements LedgerStore {
  private readonly logger: ArchiverLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly filePath: string, options: FileLedgerStoreOptions = {}) {
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  async load(): Promise<LedgerLoadResult> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.info({ path: this.filePath }, 'No ledger file, starting empty');
        return { ledger: createLedger(), status: 'missing' };
      }
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ err, path: this.filePath }, 'Failed to read ledger, starting empty');
      return { ledger: createLedger(), status: 'corrupt' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ err, path: this.filePath }, 'Ledger is not valid JSON, starting empty');
      return { ledger: createLedger(), status: 'corrupt' };
    }

    const ledger = fromDocument(parsed);
    if (!ledger) {
      this.logger.error({ path: this.filePath }, 'Ledger has an unexpected shape, starting empty');
      return { ledger: createLedger(), status: 'corrupt' };
    }

    this.logger.info(
      { path: this.filePath, hours: ledger.hours.size, days: ledger.days.size },
      'Ledger loaded'
    );
    return { ledger, status: 'loaded' };
  }

  async save(ledger: Ledger): Promise<boolean> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(toDocument(ledger), null, 2)}\n`, 'utf-8');
      await fs.rename(tempPath, this.filePath);
      return true;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.metrics.recordLedgerSaveFailure();
      this.logger.error({ err, path: this.filePath }, 'Failed to save ledger');
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
      return false;
    }
  }
}

function isNotFound(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export type ReconcileReport = {
  invalidHours: string[];
  invalidDays: string[];
};

export type VerifyContext = {
  layout: ArchiveLayout;
  validity: ValidityChecker;
  deep: boolean;
};

/**
 * Re-derives every completed key's output path from the key alone and
 * re-checks it. Keys that do not parse, whose camera directory is gone, or
 * whose output is missing or invalid are reported.
 */
export async function verifyLedger(ledger: Ledger, context: VerifyContext): Promise<ReconcileReport> {
  const invalidHours: string[] = [];
  const invalidDays: string[] = [];

  for (const raw of Array.from(ledger.hours).sort()) {
    const key = parseHourKey(raw);
    if (!key) {
      invalidHours.push(raw);
      continue;
    }
    const cameraDir = cameraSourcePath(context.layout, key.location, key.cameraId);
    if (!(await isDirectory(cameraDir))) {
      invalidHours.push(raw);
      continue;
    }
    if (!(await context.validity.isValid(hourOutputPath(context.layout, key), context.deep))) {
      invalidHours.push(raw);
    }
  }

  for (const raw of Array.from(ledger.days).sort()) {
    const key = parseDayKey(raw);
    if (!key) {
      invalidDays.push(raw);
      continue;
    }
    if (!(await context.validity.isValid(dayOutputPath(context.layout, key), context.deep))) {
      invalidDays.push(raw);
    }
  }

  return { invalidHours, invalidDays };
}

/**
 * Removes reported keys. A day whose output went missing also loses the
 * original stamps of its hours so the next pass merges it again.
 */
export function cleanRecords(ledger: Ledger, report: ReconcileReport): number {
  let removed = 0;
  for (const raw of [...report.invalidHours, ...report.invalidDays]) {
    if (forgetKey(ledger, raw)) {
      removed += 1;
    }
  }
  for (const raw of report.invalidDays) {
    const day = parseDayKey(raw);
    if (day) {
      forgetOriginalStamps(ledger, day);
    }
  }
  return removed;
}

function forgetOriginalStamps(ledger: Ledger, day: DayKey) {
  for (const raw of [...ledger.timestamps.keys()]) {
    const key = parseOriginalKey(raw);
    if (key && key.location === day.location && key.day === day.day) {
      ledger.timestamps.delete(raw);
    }
  }
}

export type ReconcileOptions = VerifyContext & {
  store: LedgerStore;
  clean: boolean;
  logger?: ArchiverLogger;
  metrics?: MetricsRegistry;
};

export async function reconcileLedger(ledger: Ledger, options: ReconcileOptions) {
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? metricsModule;
  const checkedHours = ledger.hours.size;
  const checkedDays = ledger.days.size;

  const report = await verifyLedger(ledger, options);
  const invalidCount = report.invalidHours.length + report.invalidDays.length;
  logger.info(
    {
      checkedHours,
      checkedDays,
      invalidHours: report.invalidHours.length,
      invalidDays: report.invalidDays.length
    },
    'Ledger verified'
  );

  let removed = 0;
  if (options.clean && invalidCount > 0) {
    removed = cleanRecords(ledger, report);
    await options.store.save(ledger);
    logger.warn(
      { hours: report.invalidHours, days: report.invalidDays },
      'Removed invalid ledger records'
    );
  }

  metrics.recordReconciliation({
    checkedHours,
    checkedDays,
    invalidHours: report.invalidHours.length,
    invalidDays: report.invalidDays.length,
    removed: options.clean && invalidCount > 0
  });

  return { report, removed };
}

export type MergedOutputListing = {
  hours: string[];
  days: string[];
};

export async function listMergedOutputs(ledger: Ledger, layout: ArchiveLayout): Promise<MergedOutputListing> {
  const hours: string[] = [];
  const days: string[] = [];

  for (const raw of Array.from(ledger.hours).sort()) {
    const key = parseHourKey(raw);
    if (!key) {
      continue;
    }
    const output = hourOutputPath(layout, key);
    if (await isFile(output)) {
      hours.push(output);
    }
  }

  for (const raw of Array.from(ledger.days).sort()) {
    const key = parseDayKey(raw);
    if (!key) {
      continue;
    }
    const output = dayOutputPath(layout, key);
    if (await isFile(output)) {
      days.push(output);
    }
  }

  return { hours, days };
}

async function isDirectory(target: string) {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string) {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}
