import fs from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import loggerModule, { type ArchiverLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { MergeScope, MergeStrategy } from '../types.js';
import type { AudioMode, TranscodeOutcome, Transcoder } from './transcoder.js';
import type { ValidityChecker } from './validity.js';

export type MergeEngineOptions = {
  transcoder: Transcoder;
  validity: ValidityChecker;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  invocationCeilingMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: ArchiverLogger;
  metrics?: MetricsRegistry;
};

export type MergeResult =
  | { ok: true; strategy: MergeStrategy; attempts: number }
  | { ok: false; attempts: number };

type ConcatPlan = {
  manifestPath: string;
  outputPath: string;
  audio: AudioMode;
  totalMs: number;
};

export function formatManifest(inputs: readonly string[]) {
  return inputs
    .map(input => `file '${path.resolve(input).replace(/'/g, "'\\''")}'`)
    .join('\n')
    .concat('\n');
}

/**
 * Bounded-retry concatenation of hour files into an hour output, and of hour
 * outputs into a day output. Never throws; the outcome is the return value
 * and everything else is logged.
 */
export class MergeEngine {
  private readonly transcoder: Transcoder;
  private readonly validity: ValidityChecker;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly invocationCeilingMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: ArchiverLogger;
  private readonly metrics: MetricsRegistry;

  constructor(options: MergeEngineOptions) {
    this.transcoder = options.transcoder;
    this.validity = options.validity;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = Math.max(1, Math.floor(options.maxRetries));
    this.retryDelayMs = Math.max(0, options.retryDelayMs);
    this.invocationCeilingMs = Math.max(1, options.invocationCeilingMs);
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  mergeHour(inputs: readonly string[], outputPath: string) {
    return this.merge(inputs, outputPath, 'hour');
  }

  mergeDay(inputs: readonly string[], outputPath: string) {
    return this.merge(inputs, outputPath, 'day');
  }

  async merge(inputs: readonly string[], outputPath: string, scope: MergeScope): Promise<MergeResult> {
    const startedAt = Date.now();
    let result: MergeResult;

    if (inputs.length === 0) {
      this.logger.warn({ output: outputPath, scope }, 'Merge skipped, no inputs');
      result = { ok: false, attempts: 0 };
    } else {
      try {
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        result =
          scope === 'hour'
            ? await this.runHourly(inputs, outputPath)
            : await this.runDaily(inputs, outputPath);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error({ err, output: outputPath, scope }, 'Merge aborted');
        await this.discard(outputPath);
        result = { ok: false, attempts: 0 };
      }
    }

    const durationMs = Date.now() - startedAt;
    this.metrics.recordMerge(scope, {
      output: outputPath,
      strategy: result.ok ? result.strategy : null,
      durationMs
    });

    if (result.ok) {
      this.logger.info(
        { output: outputPath, scope, strategy: result.strategy, attempts: result.attempts, durationMs },
        'Merge succeeded'
      );
    } else {
      this.logger.error({ output: outputPath, scope, attempts: result.attempts }, 'Merge failed');
    }

    return result;
  }

  private async runHourly(inputs: readonly string[], outputPath: string): Promise<MergeResult> {
    const manifestPath = `${outputPath}.txt`;
    try {
      await fs.writeFile(manifestPath, formatManifest(inputs), 'utf-8');

      for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
        const plan: ConcatPlan = { manifestPath, outputPath, audio: 'aac', totalMs: this.timeoutMs };
        if (await this.attemptConcat(plan, attempt)) {
          return { ok: true, strategy: 'concat-aac', attempts: attempt };
        }
        if (attempt < this.maxRetries) {
          await this.sleep(this.retryDelayMs);
        }
      }

      return { ok: false, attempts: this.maxRetries };
    } finally {
      await this.discard(manifestPath);
    }
  }

  private async runDaily(inputs: readonly string[], outputPath: string): Promise<MergeResult> {
    const [firstInput] = inputs;

    if (inputs.length === 1 && (await this.copyInput(firstInput, outputPath))) {
      return { ok: true, strategy: 'direct-copy', attempts: 1 };
    }

    const manifestPath = `${outputPath}.txt`;
    const totalMs = this.timeoutMs * 2;
    try {
      await fs.writeFile(manifestPath, formatManifest(inputs), 'utf-8');

      for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
        if (await this.attemptConcat({ manifestPath, outputPath, audio: 'copy', totalMs }, attempt)) {
          return { ok: true, strategy: 'concat-copy', attempts: attempt };
        }

        if (attempt === 1) {
          this.logger.info({ output: outputPath }, 'Stream copy failed, retrying with re-encoded audio');
          if (await this.attemptConcat({ manifestPath, outputPath, audio: 'aac', totalMs }, attempt)) {
            return { ok: true, strategy: 'concat-aac', attempts: attempt };
          }
        }

        if (attempt < this.maxRetries) {
          await this.sleep(this.retryDelayMs);
        }
      }
    } finally {
      await this.discard(manifestPath);
    }

    this.logger.warn(
      { output: outputPath, substitute: firstInput, inputs: inputs.length },
      'All day merge strategies failed, keeping first hour as the day video'
    );
    if (await this.copyInput(firstInput, outputPath)) {
      return { ok: true, strategy: 'degraded-copy', attempts: this.maxRetries };
    }
    return { ok: false, attempts: this.maxRetries };
  }

  private async attemptConcat(plan: ConcatPlan, attempt: number): Promise<boolean> {
    const outcome = await this.invoke(plan);

    if (!outcome.ok) {
      this.logger.warn(
        {
          output: plan.outputPath,
          audio: plan.audio,
          attempt,
          maxRetries: this.maxRetries,
          reason: outcome.reason,
          exitCode: outcome.exitCode ?? null,
          stderr: outcome.stderr
        },
        'Concat attempt failed'
      );
      await this.discard(plan.outputPath);
      return false;
    }

    return this.acceptOutput(plan.outputPath, attempt);
  }

  /**
   * A single invocation is capped at the ceiling; when the budget is larger,
   * a timed-out first run is followed by one more run for the remainder.
   */
  private async invoke(plan: ConcatPlan): Promise<TranscodeOutcome> {
    const firstSliceMs = Math.min(plan.totalMs, this.invocationCeilingMs);
    const remainderMs = plan.totalMs - firstSliceMs;

    const first = await this.runConcat(plan, firstSliceMs);
    if (first.ok || first.reason !== 'timeout' || remainderMs <= 0) {
      return first;
    }

    this.logger.info(
      { output: plan.outputPath, firstSliceMs, remainderMs },
      'Concat exceeded invocation ceiling, running again for the remaining budget'
    );
    await this.discard(plan.outputPath);
    return this.runConcat(plan, remainderMs);
  }

  private async runConcat(plan: ConcatPlan, timeoutMs: number): Promise<TranscodeOutcome> {
    let outcome: TranscodeOutcome;
    try {
      outcome = await this.transcoder.concat({
        manifestPath: plan.manifestPath,
        outputPath: plan.outputPath,
        audio: plan.audio,
        timeoutMs
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      outcome = { ok: false, reason: 'spawn', message: err.message };
    }
    this.metrics.recordTranscoderInvocation(outcome.ok ? 'ok' : outcome.reason);
    return outcome;
  }

  private async copyInput(input: string, outputPath: string): Promise<boolean> {
    try {
      await fs.copyFile(input, outputPath);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn({ err, input, output: outputPath }, 'Copy of input failed');
      await this.discard(outputPath);
      return false;
    }
    return this.acceptOutput(outputPath, 1);
  }

  private async acceptOutput(outputPath: string, attempt: number): Promise<boolean> {
    if (await this.validity.isValid(outputPath)) {
      return true;
    }
    this.logger.warn({ output: outputPath, attempt }, 'Merge output failed validation, discarding');
    await this.discard(outputPath);
    return false;
  }

  private async discard(filePath: string) {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn({ err, path: filePath }, 'Failed to remove file');
    }
  }
}
