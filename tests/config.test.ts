import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  resolveArchiveSettings,
  type ArchiverConfig
} from '../src/config/index.js';

function baseConfig(): ArchiverConfig {
  return {
    app: { name: 'camera-archiver' },
    logging: { level: 'info' },
    archive: { videoRoot: '/srv/camera' }
  };
}

describe('ArchiverConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archiver-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads the shipped default configuration', () => {
    const config = loadConfigFromFile(path.resolve('config/default.json'));

    expect(config.app.name).toBe('camera-archiver');
    expect(config.archive.mergedDir).toBe('merged_videos');
    expect(config.schedule?.minCurrentDayFiles).toBe(5);
  });

  it('reports missing and unknown keys', () => {
    const contents = JSON.stringify({ app: { name: 'x' }, logging: { level: 'info' }, archive: {}, extra: 1 });

    expect(() => parseConfig(contents)).toThrow(
      'config.extra is not allowed; config.archive.videoRoot is required'
    );
  });

  it('reports type and range errors with their path', () => {
    const config = { ...baseConfig(), merge: { maxRetries: 0, timeoutSeconds: 'long' } };

    expect(() => parseConfig(JSON.stringify(config))).toThrow(
      'config.merge.timeoutSeconds must be a number; config.merge.maxRetries must be >= 1'
    );
  });

  it('rejects logical mistakes the schema cannot express', () => {
    const config = {
      ...baseConfig(),
      archive: {
        videoRoot: '/srv/camera',
        mergedDir: 'a/b',
        requiredLocations: ['Door', 'Door'],
        videoExtensions: ['mp4']
      }
    };

    expect(() => parseConfig(JSON.stringify(config))).toThrow(
      [
        'config.archive.mergedDir must be a single directory name',
        'config.archive.requiredLocations[1] duplicates location "Door"',
        'config.archive.videoExtensions[0] must start with "." (got "mp4")'
      ].join('; ')
    );
  });

  it('wraps JSON syntax errors', () => {
    expect(() => parseConfig('{')).toThrow(/^Failed to parse configuration: /);
  });

  it('fills defaults and converts durations to milliseconds', () => {
    const settings = resolveArchiveSettings(baseConfig(), { cwd: '/work', env: {} });

    expect(settings).toEqual({
      videoRoot: '/srv/camera',
      mergedDir: 'merged_videos',
      sourceDir: 'xiaomi_camera_videos',
      ledgerPath: '/work/processed.json',
      requiredLocations: [],
      minValidSizeKb: 1024,
      saveHourly: false,
      deepCheck: false,
      autoCleanRecords: true,
      videoExtensions: ['.mp4', '.mp4.old'],
      merge: {
        timeoutMs: 1_800_000,
        maxRetries: 3,
        retryDelayMs: 5000,
        invocationCeilingMs: 600_000,
        probeTimeoutMs: 30_000
      },
      schedule: {
        scanIntervalMs: 600_000,
        errorCooldownMs: 60_000,
        watchdogTimeoutMs: 3_600_000,
        heartbeatMs: 30_000,
        minCurrentDayFiles: 5
      },
      retention: { deleteOriginalAfterDays: 1, deleteMergedAfterDays: 1 },
      transcoder: { ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe' }
    });
  });

  it('lets the environment override transcoder paths', () => {
    const config: ArchiverConfig = { ...baseConfig(), transcoder: { ffmpegPath: '/opt/ffmpeg', ffprobePath: '/opt/ffprobe' } };

    const fromConfig = resolveArchiveSettings(config, { cwd: '/work', env: {} });
    const fromEnv = resolveArchiveSettings(config, { cwd: '/work', env: { FFMPEG_PATH: '/usr/local/bin/ffmpeg' } });

    expect(fromConfig.transcoder).toEqual({ ffmpegPath: '/opt/ffmpeg', ffprobePath: '/opt/ffprobe' });
    expect(fromEnv.transcoder).toEqual({ ffmpegPath: '/usr/local/bin/ffmpeg', ffprobePath: '/opt/ffprobe' });
  });

  it('rejects scan and cool-down intervals below one second', () => {
    const config = { ...baseConfig(), schedule: { scanIntervalSeconds: 0, errorCooldownSeconds: 0.5 } };

    expect(() => parseConfig(JSON.stringify(config))).toThrow(
      'config.schedule.scanIntervalSeconds must be >= 1; config.schedule.errorCooldownSeconds must be >= 1'
    );
  });

  it('loads the configuration file once and keeps serving it', () => {
    const filePath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(filePath, JSON.stringify(baseConfig()));
    const manager = new ConfigManager(filePath);

    const first = manager.getConfig();
    fs.writeFileSync(filePath, JSON.stringify({ ...baseConfig(), archive: { videoRoot: '/srv/other' } }));

    expect(manager.getConfig()).toBe(first);
    expect(first.archive.videoRoot).toBe('/srv/camera');
  });
});
