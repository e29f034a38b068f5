import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLedger, type Ledger } from '../src/archive/ledger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import {
  cleanupMergedOutputs,
  cleanupOriginalSources,
  runRetentionOnce,
  type RetentionTaskOptions
} from '../src/tasks/retention.js';
import { MemoryLedgerStore, createLoggerStub, writeSizedFile } from './helpers/fakes.js';

const NOW = new Date(2025, 0, 10, 12, 0, 0);
const NOW_SECONDS = NOW.getTime() / 1000;
const OLD = NOW_SECONDS - 2 * 86_400;
const FRESH = NOW_SECONDS - 3_600;

describe('RetentionSweeps', () => {
  let tmpDir: string;
  let ledger: Ledger;
  let store: MemoryLedgerStore;
  let metrics: MetricsRegistry;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archiver-retention-'));
    ledger = createLedger();
    store = new MemoryLedgerStore();
    metrics = new MetricsRegistry();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<RetentionTaskOptions> = {}): RetentionTaskOptions {
    return {
      layout: { videoRoot: tmpDir, mergedDir: 'merged_videos', sourceDir: 'xiaomi_camera_videos' },
      ledger,
      store,
      deleteOriginalAfterDays: 1,
      deleteMergedAfterDays: 1,
      now: () => NOW,
      logger: createLoggerStub(),
      metrics,
      ...overrides
    };
  }

  function hourFolder(name: string) {
    return path.join(tmpDir, 'Loc', 'xiaomi_camera_videos', 'cam1', name);
  }

  function mergedFile(day: string, name: string) {
    return path.join(tmpDir, 'merged_videos', day, name);
  }

  it('removes expired original folders and their keys', async () => {
    writeSizedFile(path.join(hourFolder('2025010100'), '00M00S.mp4'), 10);
    writeSizedFile(path.join(hourFolder('2025010100'), '30M00S.mp4'), 10);
    writeSizedFile(path.join(hourFolder('2025010101'), '00M00S.mp4'), 10);
    writeSizedFile(path.join(hourFolder('2025010103'), '00M00S.mp4'), 10);
    fs.mkdirSync(path.join(hourFolder('2025010103'), 'nested'));

    ledger.timestamps.set('original_Loc_cam1_2025010100', OLD);
    ledger.timestamps.set('original_Loc_cam1_2025010101', FRESH);
    ledger.timestamps.set('original_Loc_cam1_2025010102', OLD);
    ledger.timestamps.set('original_Loc_cam1_2025010103', OLD);
    ledger.timestamps.set('Loc_cam1_2025010100', OLD);

    const result = await cleanupOriginalSources(options());

    expect(result.removed).toBe(1);
    expect(result.keysRemoved).toBe(3);
    expect(result.warnings).toEqual([
      {
        path: hourFolder('2025010103'),
        reason: 'Original folder not empty, left in place',
        key: 'original_Loc_cam1_2025010103'
      }
    ]);
    expect(fs.existsSync(hourFolder('2025010100'))).toBe(false);
    expect(fs.existsSync(path.join(hourFolder('2025010101'), '00M00S.mp4'))).toBe(true);
    expect(fs.existsSync(path.join(hourFolder('2025010103'), '00M00S.mp4'))).toBe(false);
    expect(fs.existsSync(path.join(hourFolder('2025010103'), 'nested'))).toBe(true);
    expect(Array.from(ledger.timestamps.keys()).sort()).toEqual([
      'Loc_cam1_2025010100',
      'original_Loc_cam1_2025010101'
    ]);
    expect(store.saves).toBe(1);

    const snapshot = metrics.snapshot();
    expect(snapshot.retention.runs).toEqual({ original: 1 });
    expect(snapshot.retention.removed).toEqual({ original: 1 });
    expect(snapshot.retention.warnings).toBe(1);
  });

  it('skips a sweep whose window is disabled', async () => {
    ledger.timestamps.set('original_Loc_cam1_2025010100', OLD);
    writeSizedFile(path.join(hourFolder('2025010100'), '00M00S.mp4'), 10);

    const result = await cleanupOriginalSources(options({ deleteOriginalAfterDays: 0 }));

    expect(result).toEqual({ sweep: 'original', skipped: true, removed: 0, keysRemoved: 0, warnings: [] });
    expect(fs.existsSync(hourFolder('2025010100'))).toBe(true);
    expect(store.saves).toBe(0);
  });

  it('deletes only expired merged outputs and drops key and timestamp together', async () => {
    writeSizedFile(mergedFile('20250101', '20250101_Loc_00.mp4'), 10);
    writeSizedFile(mergedFile('20250101', '20250101_Loc_01.mp4'), 10);
    writeSizedFile(mergedFile('20250101', '20250101_Loc_02.mp4'), 10);
    fs.mkdirSync(path.join(tmpDir, 'merged_videos', '20250105'), { recursive: true });

    ledger.hours.add('Loc_cam1_2025010100');
    ledger.hours.add('Loc_cam1_2025010101');
    ledger.hours.add('Loc_cam1_2025010102');
    ledger.days.add('Loc_20250101');
    ledger.timestamps.set('Loc_cam1_2025010100', OLD);
    ledger.timestamps.set('Loc_cam1_2025010101', FRESH);
    ledger.timestamps.set('Loc_20250101', OLD);
    ledger.timestamps.set('original_Loc_cam1_2025010100', OLD);

    const result = await cleanupMergedOutputs(options());

    expect(result.removed).toBe(1);
    expect(result.keysRemoved).toBe(2);
    expect(fs.existsSync(mergedFile('20250101', '20250101_Loc_00.mp4'))).toBe(false);
    expect(fs.existsSync(mergedFile('20250101', '20250101_Loc_01.mp4'))).toBe(true);
    expect(fs.existsSync(mergedFile('20250101', '20250101_Loc_02.mp4'))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, 'merged_videos', '20250105'))).toBe(false);
    expect(Array.from(ledger.hours).sort()).toEqual(['Loc_cam1_2025010101', 'Loc_cam1_2025010102']);
    expect(ledger.days.size).toBe(0);
    expect(Array.from(ledger.timestamps.keys()).sort()).toEqual([
      'Loc_cam1_2025010101',
      'original_Loc_cam1_2025010100'
    ]);
    expect(store.saves).toBe(1);
  });

  it('removes the day directory once its last output expires', async () => {
    writeSizedFile(mergedFile('20250101', '20250101_Loc.mp4'), 10);
    ledger.days.add('Loc_20250101');
    ledger.timestamps.set('Loc_20250101', OLD);

    const result = await runRetentionOnce(options());

    expect(result.original.removed).toBe(0);
    expect(result.merged.removed).toBe(1);
    expect(fs.existsSync(path.join(tmpDir, 'merged_videos', '20250101'))).toBe(false);
    expect(fs.existsSync(path.join(tmpDir, 'merged_videos'))).toBe(true);
  });
});
