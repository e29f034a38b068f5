#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import { registerShutdownHook, runShutdownHooks } from './app.js';
import configManager, {
  loadConfigFromFile,
  resolveArchiveSettings,
  type ArchiveSettings,
  type ArchiverConfig
} from './config/index.js';
import { FileLedgerStore, listMergedOutputs, reconcileLedger, type LedgerStore } from './archive/ledger.js';
import { FfmpegTranscoder, type Transcoder } from './archive/transcoder.js';
import { ArchiveScheduler, createArchiveComponents, type SleepFn } from './run-archiver.js';
import { cleanupMergedOutputs, cleanupOriginalSources } from './tasks/retention.js';
import { LivenessWatchdog } from './watchdog.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  loadConfig?: (configPath?: string) => ArchiverConfig;
  createTranscoder?: (settings: ArchiveSettings) => Transcoder;
  createStore?: (settings: ArchiveSettings) => LedgerStore;
  createWatchdog?: (timeoutMs: number) => LivenessWatchdog | null;
  sleep?: SleepFn;
  mergeSleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type CliArgs = {
  singleRun: boolean;
  ignoreLedger: boolean;
  deepCheck: boolean;
  verifyOnly: boolean;
  cleanRecords: boolean;
  cleanupOriginal: boolean;
  cleanupMerged: boolean;
  watchdogTimeoutSeconds?: number;
  configPath?: string;
  logLevel?: string;
  help: boolean;
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const AVAILABILITY_TIMEOUT_MS = 10_000;

const USAGE_LINES = [
  'camera-archiver: merge hourly camera recordings into daily videos',
  '',
  'Usage: camera-archiver [options]',
  '',
  'Options:',
  '  --single-run              Run one pass and exit',
  '  --ignore-ledger           Merge every bucket again (alias: --ignore-processed)',
  '  --deep-check              Probe outputs with ffprobe in addition to the size check',
  '  --verify-only             Verify the ledger, list merged outputs and exit',
  '  --clean-records           Remove invalid ledger records after verification',
  '  --cleanup-original        Only run original source retention and exit',
  '  --cleanup-merged          Only run merged output retention and exit',
  '  --watchdog-timeout <s>    Terminate when a pass stalls for this many seconds',
  '  --config <path>           Configuration file (default: config/default.json)',
  '  --log-level <level>       Log level for this run',
  '  -h, --help                Show this help'
];

export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    singleRun: false,
    ignoreLedger: false,
    deepCheck: false,
    verifyOnly: false,
    cleanRecords: false,
    cleanupOriginal: false,
    cleanupMerged: false,
    help: false,
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    switch (token) {
      case '--help':
      case '-h':
        result.help = true;
        continue;
      case '--single-run':
        result.singleRun = true;
        continue;
      case '--ignore-ledger':
      case '--ignore-processed':
        result.ignoreLedger = true;
        continue;
      case '--deep-check':
        result.deepCheck = true;
        continue;
      case '--verify-only':
        result.verifyOnly = true;
        continue;
      case '--clean-records':
        result.cleanRecords = true;
        continue;
      case '--cleanup-original':
        result.cleanupOriginal = true;
        continue;
      case '--cleanup-merged':
        result.cleanupMerged = true;
        continue;
      default:
        break;
    }

    if (token === '--config' || token === '-c' || token === '--log-level' || token === '--watchdog-timeout') {
      const value = argv[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push(`Missing value for ${token}`);
        continue;
      }
      index += 1;

      if (token === '--watchdog-timeout') {
        const seconds = Number(value);
        if (!Number.isFinite(seconds) || seconds <= 0) {
          result.errors.push(`Invalid value for --watchdog-timeout: ${value}`);
        } else {
          result.watchdogTimeoutSeconds = seconds;
        }
      } else if (token === '--log-level') {
        result.logLevel = value;
      } else {
        result.configPath = value;
      }
      continue;
    }

    result.errors.push(`Unknown option: ${token}`);
  }

  return result;
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const args = parseCliArgs(argv);

  if (args.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }

  if (args.errors.length > 0) {
    for (const message of args.errors) {
      io.stderr.write(`${message}\n`);
    }
    io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
    return 1;
  }

  if (args.logLevel && !applyLogLevel(args.logLevel, io)) {
    return 1;
  }

  let config: ArchiverConfig;
  let settings: ArchiveSettings;
  try {
    const loadConfig =
      deps.loadConfig ??
      ((configPath?: string) => (configPath ? loadConfigFromFile(configPath) : configManager.getConfig()));
    config = loadConfig(args.configPath);
    settings = resolveArchiveSettings(config);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }

  // --log-level wins over the file
  if (!args.logLevel && !applyLogLevel(config.logging.level, io)) {
    return 1;
  }

  settings = {
    ...settings,
    deepCheck: settings.deepCheck || args.deepCheck,
    autoCleanRecords: settings.autoCleanRecords || args.cleanRecords
  };

  const store = deps.createStore ? deps.createStore(settings) : new FileLedgerStore(settings.ledgerPath);
  const transcoder = deps.createTranscoder
    ? deps.createTranscoder(settings)
    : new FfmpegTranscoder({
        ffmpegPath: settings.transcoder.ffmpegPath,
        ffprobePath: settings.transcoder.ffprobePath
      });

  if (args.cleanupOriginal || args.cleanupMerged) {
    return runCleanupOnly(args, settings, store, io, deps);
  }

  if (args.verifyOnly) {
    return runVerifyOnly(args, settings, store, transcoder, io);
  }

  const availability = await transcoder.checkAvailable(AVAILABILITY_TIMEOUT_MS);
  if (!availability.ok) {
    io.stderr.write(`ffmpeg is not available: ${availability.message}\n`);
    logger.error({ reason: availability.reason }, 'Transcoder unavailable');
    return 1;
  }

  const watchdogTimeoutMs =
    typeof args.watchdogTimeoutSeconds === 'number'
      ? args.watchdogTimeoutSeconds * 1000
      : settings.schedule.watchdogTimeoutMs;
  const watchdog = deps.createWatchdog
    ? deps.createWatchdog(watchdogTimeoutMs)
    : new LivenessWatchdog({ timeoutMs: watchdogTimeoutMs, checkIntervalMs: settings.schedule.heartbeatMs });

  const scheduler = new ArchiveScheduler({
    settings,
    transcoder,
    store,
    singleRun: args.singleRun,
    ignoreLedger: args.ignoreLedger,
    watchdog,
    sleep: deps.sleep,
    mergeSleep: deps.mergeSleep,
    now: deps.now
  });

  const unregisterWatchdog = registerShutdownHook('watchdog', () => {
    watchdog?.stop();
  });

  let receivedSignal: NodeJS.Signals | undefined;
  const handleSignal = (signal: NodeJS.Signals) => {
    receivedSignal = signal;
    logger.info({ signal }, 'Stopping after the current step');
    scheduler.stop();
  };
  process.once('SIGINT', handleSignal);
  process.once('SIGTERM', handleSignal);

  logger.info(
    { videoRoot: settings.videoRoot, singleRun: args.singleRun, watchdogTimeoutMs },
    'Archiver starting'
  );

  try {
    await scheduler.run();
  } finally {
    process.off('SIGINT', handleSignal);
    process.off('SIGTERM', handleSignal);
    const results = await runShutdownHooks({
      reason: receivedSignal ? 'signal' : 'completed',
      signal: receivedSignal
    });
    for (const result of results) {
      if (result.status === 'error') {
        logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
      }
    }
    unregisterWatchdog();
  }

  logger.info({ signal: receivedSignal }, 'Archiver stopped');
  return 0;
}

async function runCleanupOnly(
  args: CliArgs,
  settings: ArchiveSettings,
  store: LedgerStore,
  io: CliIo,
  deps: CliDependencies
): Promise<number> {
  const { ledger } = await store.load();
  const options = {
    layout: { videoRoot: settings.videoRoot, mergedDir: settings.mergedDir, sourceDir: settings.sourceDir },
    ledger,
    store,
    deleteOriginalAfterDays: settings.retention.deleteOriginalAfterDays,
    deleteMergedAfterDays: settings.retention.deleteMergedAfterDays,
    now: deps.now
  };

  if (args.cleanupOriginal) {
    const result = await cleanupOriginalSources(options);
    io.stdout.write(formatSweep('Original source cleanup', result.skipped, result.removed, result.warnings.length));
  }
  if (args.cleanupMerged) {
    const result = await cleanupMergedOutputs(options);
    io.stdout.write(formatSweep('Merged output cleanup', result.skipped, result.removed, result.warnings.length));
  }
  return 0;
}

function formatSweep(label: string, skipped: boolean, removed: number, warnings: number) {
  if (skipped) {
    return `${label}: disabled\n`;
  }
  return `${label}: removed ${removed}, warnings ${warnings}\n`;
}

async function runVerifyOnly(
  args: CliArgs,
  settings: ArchiveSettings,
  store: LedgerStore,
  transcoder: Transcoder,
  io: CliIo
): Promise<number> {
  const { ledger } = await store.load();
  const { layout, validity } = createArchiveComponents(settings, transcoder);
  const { report } = await reconcileLedger(ledger, {
    layout,
    validity,
    deep: settings.deepCheck,
    store,
    clean: settings.autoCleanRecords || args.cleanRecords
  });

  const listing = await listMergedOutputs(ledger, layout);
  const lines = [
    `Invalid hour records: ${report.invalidHours.length}`,
    `Invalid day records: ${report.invalidDays.length}`,
    'Merged hour outputs:',
    ...listing.hours,
    'Merged day outputs:',
    ...listing.days
  ];
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

function applyLogLevel(level: string, io: CliIo): boolean {
  try {
    setLogLevel(level);
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    io.stderr.write(`Available levels: ${getAvailableLogLevels().join(', ')}\n`);
    return false;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'camera-archiver failed');
      process.exit(1);
    }
  );
}
