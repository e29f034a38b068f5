import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { MergeEngine, formatManifest } from '../src/archive/merge.js';
import { ValidityChecker } from '../src/archive/validity.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { Transcoder, TranscodeOutcome } from '../src/archive/transcoder.js';
import {
  FakeTranscoder,
  concatManifest,
  createLoggerStub,
  readManifest,
  writeSizedFile
} from './helpers/fakes.js';

const EXIT_FAILURE: TranscodeOutcome = { ok: false, reason: 'exit', message: 'ffmpeg exited with code 1', exitCode: 1 };
const TIMEOUT_FAILURE: TranscodeOutcome = { ok: false, reason: 'timeout', message: 'timed out' };

describe('MergeEngine', () => {
  let tmpDir: string;
  let inputA: string;
  let inputB: string;
  let logger: ReturnType<typeof createLoggerStub>;
  let metrics: MetricsRegistry;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archiver-merge-'));
    inputA = path.join(tmpDir, 'in', 'a.mp4');
    inputB = path.join(tmpDir, 'in', 'b.mp4');
    writeSizedFile(inputA, 2048, 'a');
    writeSizedFile(inputB, 2048, 'b');
    logger = createLoggerStub();
    metrics = new MetricsRegistry();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createEngine(
    transcoder: Transcoder,
    overrides: { timeoutMs?: number; maxRetries?: number; invocationCeilingMs?: number } = {}
  ) {
    const validity = new ValidityChecker({ minValidSizeKb: 1, deep: false, probeTimeoutMs: 30_000 }, transcoder);
    return new MergeEngine({
      transcoder,
      validity,
      timeoutMs: overrides.timeoutMs ?? 1000,
      maxRetries: overrides.maxRetries ?? 3,
      retryDelayMs: 5000,
      invocationCeilingMs: overrides.invocationCeilingMs ?? 10_000,
      sleep,
      logger,
      metrics
    });
  }

  function failWithPartialOutput(outcome: TranscodeOutcome) {
    return (request: { outputPath: string }) => {
      fs.writeFileSync(request.outputPath, 'partial');
      return outcome;
    };
  }

  it('writes the inputs to a manifest in order and removes it afterwards', async () => {
    let manifestLines: string[] = [];
    const transcoder = new FakeTranscoder(request => {
      manifestLines = readManifest(request.manifestPath);
      return concatManifest(request);
    });
    const output = path.join(tmpDir, 'out', 'hour.mp4');

    const result = await createEngine(transcoder).mergeHour([inputA, inputB], output);

    expect(result).toEqual({ ok: true, strategy: 'concat-aac', attempts: 1 });
    expect(manifestLines).toEqual([inputA, inputB]);
    expect(transcoder.calls).toHaveLength(1);
    expect(transcoder.calls[0]).toMatchObject({ audio: 'aac', timeoutMs: 1000, outputPath: output });
    expect(fs.existsSync(`${output}.txt`)).toBe(false);
    expect(fs.statSync(output).size).toBe(4096);
  });

  it('records merge and transcoder metrics', async () => {
    const transcoder = new FakeTranscoder();
    await createEngine(transcoder).mergeHour([inputA], path.join(tmpDir, 'out', 'hour.mp4'));

    const snapshot = metrics.snapshot();
    expect(snapshot.merges.hour).toEqual({ success: 1 });
    expect(snapshot.merges.byStrategy).toEqual({ 'concat-aac': 1 });
    expect(snapshot.transcoder.invocations).toBe(1);
    expect(snapshot.transcoder.byOutcome).toEqual({ ok: 1 });
    expect(snapshot.latencies['merge.hour.ms']?.count).toBe(1);
  });

  it('retries hourly merges with a delay until one succeeds', async () => {
    const transcoder = new FakeTranscoder((request, index) =>
      index < 2 ? failWithPartialOutput(EXIT_FAILURE)(request) : concatManifest(request)
    );
    const output = path.join(tmpDir, 'out', 'hour.mp4');

    const result = await createEngine(transcoder).mergeHour([inputA, inputB], output);

    expect(result).toEqual({ ok: true, strategy: 'concat-aac', attempts: 3 });
    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
    expect(fs.statSync(output).size).toBe(4096);
  });

  it('gives up after the retry bound and leaves no partial output', async () => {
    const transcoder = new FakeTranscoder(failWithPartialOutput(EXIT_FAILURE));
    const output = path.join(tmpDir, 'out', 'hour.mp4');

    const result = await createEngine(transcoder).mergeHour([inputA, inputB], output);

    expect(result).toEqual({ ok: false, attempts: 3 });
    expect(transcoder.calls).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(fs.existsSync(output)).toBe(false);
    expect(fs.existsSync(`${output}.txt`)).toBe(false);
    expect(metrics.snapshot().merges.hour).toEqual({ failure: 1 });
  });

  it('discards an output that fails validation', async () => {
    const transcoder = new FakeTranscoder(request => {
      fs.writeFileSync(request.outputPath, 'tiny');
      return { ok: true };
    });
    const output = path.join(tmpDir, 'out', 'hour.mp4');

    const result = await createEngine(transcoder, { maxRetries: 1 }).mergeHour([inputA], output);

    expect(result).toEqual({ ok: false, attempts: 1 });
    expect(fs.existsSync(output)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      { output, attempt: 1 },
      'Merge output failed validation, discarding'
    );
  });

  it('copies a single day input without invoking the transcoder', async () => {
    const transcoder = new FakeTranscoder();
    const output = path.join(tmpDir, 'out', 'day.mp4');

    const result = await createEngine(transcoder).mergeDay([inputA], output);

    expect(result).toEqual({ ok: true, strategy: 'direct-copy', attempts: 1 });
    expect(transcoder.calls).toHaveLength(0);
    expect(fs.readFileSync(output).equals(fs.readFileSync(inputA))).toBe(true);
  });

  it('retries a failed day stream copy with re-encoded audio at double the timeout', async () => {
    const transcoder = new FakeTranscoder(request =>
      request.audio === 'copy' ? EXIT_FAILURE : concatManifest(request)
    );
    const output = path.join(tmpDir, 'out', 'day.mp4');

    const result = await createEngine(transcoder).mergeDay([inputA, inputB], output);

    expect(result).toEqual({ ok: true, strategy: 'concat-aac', attempts: 1 });
    expect(transcoder.calls.map(call => [call.audio, call.timeoutMs])).toEqual([
      ['copy', 2000],
      ['aac', 2000]
    ]);
  });

  it('falls back to the first input when every day strategy fails', async () => {
    const transcoder = new FakeTranscoder(failWithPartialOutput(EXIT_FAILURE));
    const output = path.join(tmpDir, 'out', 'day.mp4');

    const result = await createEngine(transcoder, { maxRetries: 2 }).mergeDay([inputA, inputB], output);

    expect(result).toEqual({ ok: true, strategy: 'degraded-copy', attempts: 2 });
    expect(transcoder.calls.map(call => call.audio)).toEqual(['copy', 'aac', 'copy']);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(fs.readFileSync(output).equals(fs.readFileSync(inputA))).toBe(true);
    expect(fs.existsSync(`${output}.txt`)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      { output, substitute: inputA, inputs: 2 },
      'All day merge strategies failed, keeping first hour as the day video'
    );
  });

  it('splits a long budget into a capped run and a run for the remainder', async () => {
    const hourly = new FakeTranscoder((request, index) => (index === 0 ? TIMEOUT_FAILURE : concatManifest(request)));
    const hourResult = await createEngine(hourly, { timeoutMs: 1000, invocationCeilingMs: 600 }).mergeHour(
      [inputA],
      path.join(tmpDir, 'out', 'hour.mp4')
    );
    expect(hourResult).toEqual({ ok: true, strategy: 'concat-aac', attempts: 1 });
    expect(hourly.calls.map(call => call.timeoutMs)).toEqual([600, 400]);

    const daily = new FakeTranscoder((request, index) => (index === 0 ? TIMEOUT_FAILURE : concatManifest(request)));
    const dayResult = await createEngine(daily, { timeoutMs: 1000, invocationCeilingMs: 600 }).mergeDay(
      [inputA, inputB],
      path.join(tmpDir, 'out', 'day.mp4')
    );
    expect(dayResult).toEqual({ ok: true, strategy: 'concat-copy', attempts: 1 });
    expect(daily.calls.map(call => call.timeoutMs)).toEqual([600, 1400]);
  });

  it('does not run a second slice when the budget fits under the ceiling', async () => {
    const transcoder = new FakeTranscoder(() => TIMEOUT_FAILURE);

    const result = await createEngine(transcoder, { timeoutMs: 500, invocationCeilingMs: 600, maxRetries: 1 }).mergeHour(
      [inputA],
      path.join(tmpDir, 'out', 'hour.mp4')
    );

    expect(result).toEqual({ ok: false, attempts: 1 });
    expect(transcoder.calls.map(call => call.timeoutMs)).toEqual([500]);
  });

  it('never throws when the transcoder rejects', async () => {
    const transcoder = new FakeTranscoder(() => {
      throw new Error('spawn failed');
    });

    const result = await createEngine(transcoder, { maxRetries: 1 }).mergeHour(
      [inputA],
      path.join(tmpDir, 'out', 'hour.mp4')
    );

    expect(result).toEqual({ ok: false, attempts: 1 });
    expect(metrics.snapshot().transcoder.byOutcome).toEqual({ spawn: 1 });
  });

  it('refuses to merge an empty input list', async () => {
    const transcoder = new FakeTranscoder();
    const result = await createEngine(transcoder).mergeDay([], path.join(tmpDir, 'out', 'day.mp4'));

    expect(result).toEqual({ ok: false, attempts: 0 });
    expect(transcoder.calls).toHaveLength(0);
  });
});

describe('formatManifest', () => {
  it('quotes each path and escapes single quotes', () => {
    expect(formatManifest(['/tmp/a.mp4', "/tmp/it's.mp4"])).toBe(
      "file '/tmp/a.mp4'\nfile '/tmp/it'\\''s.mp4'\n"
    );
  });
});
