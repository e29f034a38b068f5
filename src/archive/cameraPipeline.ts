import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule, { type ArchiverLogger } from '../logger.js';
import type { CameraFolder, DayKey } from '../types.js';
import {
  dayOutputPath,
  formatDay,
  hourKeyFor,
  hourOutputPath,
  originalKeyFor,
  serializeLedgerKey,
  type ArchiveLayout
} from './naming.js';
import {
  hasDay,
  hasHour,
  hasOriginalStamp,
  markDay,
  markHour,
  stampOriginal,
  type Ledger,
  type LedgerStore
} from './ledger.js';
import type { MergeEngine } from './merge.js';
import { groupHourFoldersByDay, listVideoFiles } from './scanner.js';
import type { ValidityChecker } from './validity.js';

export type CameraPipelineContext = {
  layout: ArchiveLayout;
  saveHourly: boolean;
  videoExtensions: readonly string[];
  ledger: Ledger;
  store: LedgerStore;
  engine: MergeEngine;
  validity: ValidityChecker;
  /** Merge days again even when their sources were already archived once. */
  reprocessArchived?: boolean;
  now?: () => Date;
  heartbeat?: () => void;
  logger?: ArchiverLogger;
};

export type CameraRunSummary = {
  hoursMerged: number;
  hoursReused: number;
  hoursFailed: number;
  daysMerged: number;
  daysSkipped: number;
  daysFailed: number;
};

function emptySummary(): CameraRunSummary {
  return { hoursMerged: 0, hoursReused: 0, hoursFailed: 0, daysMerged: 0, daysSkipped: 0, daysFailed: 0 };
}

export async function processCamera(
  camera: CameraFolder,
  context: CameraPipelineContext
): Promise<CameraRunSummary> {
  const logger = context.logger ?? loggerModule;
  const now = context.now ?? (() => new Date());
  const heartbeat = context.heartbeat ?? (() => undefined);
  const summary = emptySummary();
  const startedAt = now().getTime();

  const days = await groupHourFoldersByDay(camera, formatDay(now()));
  const totalHours = Array.from(days.values()).reduce((sum, folders) => sum + folders.length, 0);
  let visitedHours = 0;

  logger.info(
    { location: camera.location, cameraId: camera.cameraId, days: days.size, hours: totalHours },
    'Processing camera'
  );

  for (const [day, folders] of days) {
    const dayKey: DayKey = { kind: 'day', location: camera.location, day };
    const dayOutput = dayOutputPath(context.layout, dayKey);

    if (hasDay(context.ledger, dayKey)) {
      if (await context.validity.isValid(dayOutput)) {
        summary.daysSkipped += 1;
        visitedHours += folders.length;
        logger.debug({ day, location: camera.location }, 'Day already merged');
        continue;
      }
      context.ledger.days.delete(serializeLedgerKey(dayKey));
      await context.store.save(context.ledger);
      logger.warn({ day, location: camera.location, output: dayOutput }, 'Recorded day output is invalid, merging again');
    } else if (!context.reprocessArchived && isArchivedDay(camera, folders, context.ledger)) {
      summary.daysSkipped += 1;
      visitedHours += folders.length;
      logger.debug({ day, location: camera.location }, 'Day already archived, sources awaiting retention');
      continue;
    }

    const hourOutputs: string[] = [];
    const mergedFolders: string[] = [];
    for (const folder of folders) {
      heartbeat();
      visitedHours += 1;
      const hourKey = hourKeyFor(camera.location, camera.cameraId, folder);
      if (!hourKey) {
        continue;
      }
      const hourOutput = hourOutputPath(context.layout, hourKey);

      if (hasHour(context.ledger, hourKey)) {
        if (await context.validity.isValid(hourOutput)) {
          summary.hoursReused += 1;
          hourOutputs.push(hourOutput);
          mergedFolders.push(folder);
          continue;
        }
        context.ledger.hours.delete(serializeLedgerKey(hourKey));
        await context.store.save(context.ledger);
        logger.warn({ folder, output: hourOutput }, 'Recorded hour output is invalid, merging again');
      }

      const inputs = await listVideoFiles(path.join(camera.path, folder), context.videoExtensions);
      if (inputs.length === 0) {
        logger.debug({ folder, cameraId: camera.cameraId }, 'Hour folder has no video files');
        continue;
      }

      const result = await context.engine.mergeHour(inputs, hourOutput);
      if (result.ok) {
        markHour(context.ledger, hourKey, now().getTime());
        await context.store.save(context.ledger);
        summary.hoursMerged += 1;
        hourOutputs.push(hourOutput);
        mergedFolders.push(folder);
      } else {
        summary.hoursFailed += 1;
      }

      const elapsedMinutes = (now().getTime() - startedAt) / 60_000;
      logger.info(
        {
          cameraId: camera.cameraId,
          progress: `${visitedHours}/${totalHours}`,
          percent: totalHours > 0 ? Math.round((visitedHours / totalHours) * 1000) / 10 : 100,
          elapsedMinutes: Math.round(elapsedMinutes * 10) / 10
        },
        'Hour merge progress'
      );
    }

    if (hourOutputs.length === 0) {
      logger.warn({ day, location: camera.location }, 'No hour outputs for day, skipping day merge');
      continue;
    }

    heartbeat();
    await removeStaleTemp(`${dayOutput}.temp.mp4`, logger);

    const result = await context.engine.mergeDay(hourOutputs, dayOutput);
    if (!result.ok) {
      summary.daysFailed += 1;
      continue;
    }

    const mergedAt = now().getTime();
    markDay(context.ledger, dayKey, mergedAt);
    for (const folder of mergedFolders) {
      const hourKey = hourKeyFor(camera.location, camera.cameraId, folder);
      if (hourKey) {
        stampOriginal(context.ledger, originalKeyFor(hourKey), mergedAt);
      }
    }
    await context.store.save(context.ledger);
    summary.daysMerged += 1;

    if (!context.saveHourly) {
      await removeHourOutputs(hourOutputs, logger);
    }
  }

  logger.info(
    {
      location: camera.location,
      cameraId: camera.cameraId,
      ...summary,
      durationMinutes: Math.round(((now().getTime() - startedAt) / 60_000) * 10) / 10
    },
    'Camera processed'
  );

  return summary;
}

async function removeHourOutputs(outputs: readonly string[], logger: ArchiverLogger) {
  for (const output of outputs) {
    try {
      await fs.rm(output, { force: true });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ err, output }, 'Failed to remove hour output');
    }
  }
}

async function removeStaleTemp(tempPath: string, logger: ArchiverLogger) {
  try {
    await fs.rm(tempPath, { force: true });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn({ err, path: tempPath }, 'Failed to remove stale temp file');
  }
}

/**
 * A day whose key is gone while some of its hour folders still carry original
 * stamps was merged before and retired by merged-output retention.
 */
function isArchivedDay(camera: CameraFolder, folders: readonly string[], ledger: Ledger) {
  return folders.some((folder) => {
    const hourKey = hourKeyFor(camera.location, camera.cameraId, folder);
    return hourKey !== null && hasOriginalStamp(ledger, originalKeyFor(hourKey));
  });
}
