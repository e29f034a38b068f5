import { setTimeout as delay } from 'node:timers/promises';
import loggerModule, { type ArchiverLogger } from './logger.js';
import metricsModule, { type MetricsRegistry, type PassOutcomeLabel } from './metrics/index.js';
import type { ArchiveSettings } from './config/index.js';
import { processCamera } from './archive/cameraPipeline.js';
import { reconcileLedger, withoutCompletions, type Ledger, type LedgerStore } from './archive/ledger.js';
import { MergeEngine } from './archive/merge.js';
import { formatDay, type ArchiveLayout } from './archive/naming.js';
import { findReadyLocations, resolveRequiredLocations, scanCameraFolders } from './archive/scanner.js';
import type { Transcoder } from './archive/transcoder.js';
import { ValidityChecker } from './archive/validity.js';
import { runRetentionOnce } from './tasks/retention.js';
import type { LivenessWatchdog } from './watchdog.js';

export type SchedulerState = 'idle' | 'scanning' | 'processing' | 'backoff' | 'stopped';

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export type ArchiveComponents = {
  layout: ArchiveLayout;
  validity: ValidityChecker;
  engine: MergeEngine;
};

const MAX_SLEEP_SLICE_MS = 30_000;

export function createArchiveComponents(
  settings: ArchiveSettings,
  transcoder: Transcoder,
  options: { logger?: ArchiverLogger; metrics?: MetricsRegistry; sleep?: (ms: number) => Promise<void> } = {}
): ArchiveComponents {
  const layout: ArchiveLayout = {
    videoRoot: settings.videoRoot,
    mergedDir: settings.mergedDir,
    sourceDir: settings.sourceDir
  };
  const validity = new ValidityChecker(
    {
      minValidSizeKb: settings.minValidSizeKb,
      deep: settings.deepCheck,
      probeTimeoutMs: settings.merge.probeTimeoutMs
    },
    transcoder
  );
  const engine = new MergeEngine({
    transcoder,
    validity,
    timeoutMs: settings.merge.timeoutMs,
    maxRetries: settings.merge.maxRetries,
    retryDelayMs: settings.merge.retryDelayMs,
    invocationCeilingMs: settings.merge.invocationCeilingMs,
    sleep: options.sleep,
    logger: options.logger,
    metrics: options.metrics
  });
  return { layout, validity, engine };
}

export interface ArchiveSchedulerOptions {
  settings: ArchiveSettings;
  transcoder: Transcoder;
  store: LedgerStore;
  singleRun?: boolean;
  ignoreLedger?: boolean;
  watchdog?: LivenessWatchdog | null;
  sleep?: SleepFn;
  mergeSleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: ArchiverLogger;
  metrics?: MetricsRegistry;
}

async function abortableSleep(ms: number, signal: AbortSignal) {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

/**
 * Serial scan → merge → retention loop. Every iteration starts by resetting
 * the watchdog and reconciling the ledger; long waits are sliced so an idle
 * loop never trips the watchdog.
 */
export class ArchiveScheduler {
  private readonly settings: ArchiveSettings;
  private readonly store: LedgerStore;
  private readonly components: ArchiveComponents;
  private readonly singleRun: boolean;
  private readonly ignoreLedger: boolean;
  private readonly watchdog: LivenessWatchdog | null;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly logger: ArchiverLogger;
  private readonly metrics: MetricsRegistry;
  private readonly abort = new AbortController();
  private ledger: Ledger | null = null;
  private startupRetentionDone = false;
  private currentState: SchedulerState = 'idle';
  private stopRequested = false;

  constructor(options: ArchiveSchedulerOptions) {
    this.settings = options.settings;
    this.store = options.store;
    this.singleRun = options.singleRun === true;
    this.ignoreLedger = options.ignoreLedger === true;
    this.watchdog = options.watchdog ?? null;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.components = createArchiveComponents(options.settings, options.transcoder, {
      logger: this.logger,
      metrics: this.metrics,
      sleep: options.mergeSleep
    });
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  stop() {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    this.abort.abort();
    this.logger.info('Scheduler stop requested');
  }

  async run(): Promise<void> {
    const loaded = await this.store.load();
    this.ledger = this.ignoreLedger ? withoutCompletions(loaded.ledger) : loaded.ledger;
    if (this.ignoreLedger) {
      this.logger.warn('Ignoring recorded merges, every bucket will be merged again');
    }

    this.watchdog?.start();
    try {
      while (!this.stopRequested) {
        let outcome: PassOutcomeLabel;
        try {
          outcome = await this.runIteration();
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          this.transition('backoff');
          this.metrics.recordSchedulerPass('error');
          this.logger.error({ err }, 'Scheduler iteration failed');
          if (this.singleRun) {
            break;
          }
          await this.sleepSliced(this.settings.schedule.errorCooldownMs);
          continue;
        }

        this.metrics.recordSchedulerPass(outcome);
        if (this.singleRun) {
          break;
        }
        this.transition('idle');
        await this.sleepSliced(this.settings.schedule.scanIntervalMs);
      }
    } finally {
      this.watchdog?.stop();
      this.transition('stopped');
    }
  }

  async runIteration(): Promise<PassOutcomeLabel> {
    const ledger = this.requireLedger();
    this.transition('idle');
    this.watchdog?.reset();

    await reconcileLedger(ledger, {
      layout: this.components.layout,
      validity: this.components.validity,
      deep: this.settings.deepCheck,
      store: this.store,
      clean: this.settings.autoCleanRecords,
      logger: this.logger,
      metrics: this.metrics
    });

    if (!this.startupRetentionDone) {
      await this.runRetention(ledger);
      this.startupRetentionDone = true;
    }

    this.transition('scanning');
    const cameras = await scanCameraFolders(this.components.layout, { logger: this.logger });
    if (cameras.length === 0) {
      this.logger.warn({ root: this.settings.videoRoot }, 'No camera folders found');
      return 'waiting';
    }

    this.logger.info(
      { cameras: cameras.map(camera => `${camera.location}(${camera.cameraId})`) },
      'Cameras found'
    );

    const today = formatDay(this.now());
    const required = resolveRequiredLocations(this.settings.requiredLocations, cameras);
    const ready = await findReadyLocations(cameras, today, this.settings.schedule.minCurrentDayFiles);
    const missing = required.filter(location => !ready.has(location));
    if (missing.length > 0) {
      this.logger.warn({ missing, today }, 'Locations without current-day recordings, waiting');
      return 'waiting';
    }

    this.transition('processing');
    const requiredSet = new Set(required);
    for (const camera of cameras) {
      if (this.stopRequested) {
        break;
      }
      if (!requiredSet.has(camera.location)) {
        continue;
      }
      this.watchdog?.reset();
      try {
        await processCamera(camera, {
          layout: this.components.layout,
          saveHourly: this.settings.saveHourly,
          videoExtensions: this.settings.videoExtensions,
          ledger,
          store: this.store,
          engine: this.components.engine,
          validity: this.components.validity,
          reprocessArchived: this.ignoreLedger,
          now: this.now,
          heartbeat: () => this.watchdog?.reset(),
          logger: this.logger
        });
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.metrics.recordCameraFailure();
        this.logger.error(
          { err, location: camera.location, cameraId: camera.cameraId },
          'Camera processing failed'
        );
      }
    }

    await this.runRetention(ledger);
    this.transition('idle');
    return 'processed';
  }

  private async runRetention(ledger: Ledger) {
    this.watchdog?.reset();
    await runRetentionOnce({
      layout: this.components.layout,
      ledger,
      store: this.store,
      deleteOriginalAfterDays: this.settings.retention.deleteOriginalAfterDays,
      deleteMergedAfterDays: this.settings.retention.deleteMergedAfterDays,
      now: this.now,
      logger: this.logger,
      metrics: this.metrics
    });
  }

  private async sleepSliced(totalMs: number) {
    let remaining = totalMs;
    while (remaining > 0 && !this.stopRequested) {
      const slice = Math.min(remaining, MAX_SLEEP_SLICE_MS);
      await this.sleep(slice, this.abort.signal);
      this.watchdog?.reset();
      remaining -= slice;
    }
  }

  private requireLedger(): Ledger {
    if (!this.ledger) {
      throw new Error('Ledger not loaded, call run() first');
    }
    return this.ledger;
  }

  private transition(next: SchedulerState) {
    if (this.currentState !== next) {
      this.logger.debug({ from: this.currentState, to: next }, 'Scheduler state changed');
      this.currentState = next;
    }
  }
}
