import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule, { type ArchiverLogger } from '../logger.js';
import type { CameraFolder } from '../types.js';
import { isHourFolderName, mergedRootPath, type ArchiveLayout } from './naming.js';

export type ScanOptions = {
  logger?: ArchiverLogger;
};

/**
 * Walks `<videoRoot>/<location>/<sourceDir>/<cameraId>`. The merged-output
 * directory is never treated as a location. Enumeration errors yield an
 * empty list.
 */
export async function scanCameraFolders(
  layout: ArchiveLayout,
  options: ScanOptions = {}
): Promise<CameraFolder[]> {
  const logger = options.logger ?? loggerModule;
  const mergedRoot = path.resolve(mergedRootPath(layout));

  let locations: string[];
  try {
    locations = await listDirectories(layout.videoRoot);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({ err, root: layout.videoRoot }, 'Failed to scan video root');
    return [];
  }

  const cameras: CameraFolder[] = [];
  for (const location of locations) {
    if (path.resolve(layout.videoRoot, location) === mergedRoot) {
      continue;
    }

    const sourceRoot = path.join(layout.videoRoot, location, layout.sourceDir);
    let cameraIds: string[];
    try {
      cameraIds = await listDirectories(sourceRoot);
    } catch (error) {
      if (!isNotFound(error)) {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.warn({ err, location }, 'Failed to list camera folders');
      }
      continue;
    }

    for (const cameraId of cameraIds) {
      cameras.push({ location, cameraId, path: path.join(sourceRoot, cameraId) });
    }
  }

  return cameras;
}

/** Hour folder names grouped by day prefix, today's still-recording day left out. */
export async function groupHourFoldersByDay(
  camera: CameraFolder,
  today: string
): Promise<Map<string, string[]>> {
  const folders = (await listDirectories(camera.path)).filter(isHourFolderName);
  const grouped = new Map<string, string[]>();

  for (const folder of folders) {
    const day = folder.slice(0, 8);
    if (day === today) {
      continue;
    }
    const bucket = grouped.get(day);
    if (bucket) {
      bucket.push(folder);
    } else {
      grouped.set(day, [folder]);
    }
  }

  return grouped;
}

export async function listVideoFiles(folder: string, extensions: readonly string[]): Promise<string[]> {
  const entries = await fs.readdir(folder, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && extensions.some(extension => entry.name.endsWith(extension)))
    .map(entry => entry.name)
    .sort()
    .map(name => path.join(folder, name));
}

/**
 * A location is ready once one of its cameras has an hour folder for today
 * holding at least `minFiles` entries.
 */
export async function findReadyLocations(
  cameras: readonly CameraFolder[],
  today: string,
  minFiles: number
): Promise<Set<string>> {
  const ready = new Set<string>();

  for (const camera of cameras) {
    if (ready.has(camera.location)) {
      continue;
    }
    let folders: string[];
    try {
      folders = (await listDirectories(camera.path)).filter(
        name => isHourFolderName(name) && name.startsWith(today)
      );
    } catch {
      continue;
    }
    for (const folder of folders) {
      const entries = await fs.readdir(path.join(camera.path, folder)).catch(() => []);
      if (entries.length >= minFiles) {
        ready.add(camera.location);
        break;
      }
    }
  }

  return ready;
}

export function resolveRequiredLocations(
  configured: readonly string[],
  cameras: readonly CameraFolder[]
): string[] {
  if (configured.length > 0) {
    return [...configured].sort();
  }
  return Array.from(new Set(cameras.map(camera => camera.location))).sort();
}

async function listDirectories(target: string): Promise<string[]> {
  const entries = await fs.readdir(target, { withFileTypes: true });
  return entries
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort();
}

function isNotFound(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
