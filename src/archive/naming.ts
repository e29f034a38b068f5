import path from 'node:path';
import type {
  DayKey,
  HourKey,
  LedgerKey,
  OriginalFolderKey
} from '../types.js';

export type FolderTimestamp = {
  year: number;
  month: number;
  date: number;
  hour: number | null;
  day: string;
};

const FOLDER_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})?$/;
const HOUR_FOLDER_PATTERN = /^\d{10}$/;
const KEY_SEPARATOR = '_';
const ORIGINAL_TAG = 'original';

export function parseFolderName(name: string): FolderTimestamp | null {
  const match = FOLDER_PATTERN.exec(name);
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dateText, hourText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const date = Number(dateText);
  const hour = typeof hourText === 'string' ? Number(hourText) : null;

  if (month < 1 || month > 12 || date < 1 || date > daysInMonth(year, month)) {
    return null;
  }
  if (hour !== null && hour > 23) {
    return null;
  }

  return { year, month, date, hour, day: `${yearText}${monthText}${dateText}` };
}

export function isHourFolderName(name: string): boolean {
  if (!HOUR_FOLDER_PATTERN.test(name)) {
    return false;
  }
  const stamp = parseFolderName(name);
  return stamp !== null && stamp.hour !== null;
}

export function formatDay(value: Date): string {
  const year = String(value.getFullYear()).padStart(4, '0');
  const month = String(value.getMonth() + 1).padStart(2, '0');
  const date = String(value.getDate()).padStart(2, '0');
  return `${year}${month}${date}`;
}

function daysInMonth(year: number, month: number) {
  return new Date(year, month, 0).getDate();
}

function escapeSegment(value: string) {
  return value.replace(/%/g, '%25').replace(/_/g, '%5F');
}

function unescapeSegment(value: string): string | null {
  if (/%(?!25|5F)/i.test(value)) {
    return null;
  }
  return value.replace(/%5F/gi, '_').replace(/%25/g, '%');
}

export function serializeLedgerKey(key: LedgerKey): string {
  switch (key.kind) {
    case 'day':
      return [escapeSegment(key.location), key.day].join(KEY_SEPARATOR);
    case 'hour':
      return [escapeSegment(key.location), escapeSegment(key.cameraId), `${key.day}${key.hour}`].join(
        KEY_SEPARATOR
      );
    case 'original':
      return [
        ORIGINAL_TAG,
        escapeSegment(key.location),
        escapeSegment(key.cameraId),
        `${key.day}${key.hour}`
      ].join(KEY_SEPARATOR);
  }
}

export function parseLedgerKey(raw: string): LedgerKey | null {
  const parts = raw.split(KEY_SEPARATOR);
  if (parts.length === 2) {
    return parseDayKey(raw);
  }
  if (parts.length === 3) {
    return parseHourKey(raw);
  }
  if (parts.length === 4) {
    return parseOriginalKey(raw);
  }
  return null;
}

export function parseDayKey(raw: string): DayKey | null {
  const parts = raw.split(KEY_SEPARATOR);
  if (parts.length !== 2) {
    return null;
  }
  const location = unescapeSegment(parts[0]);
  const stamp = parseFolderName(parts[1]);
  if (!location || !stamp || stamp.hour !== null) {
    return null;
  }
  return { kind: 'day', location, day: stamp.day };
}

export function parseHourKey(raw: string): HourKey | null {
  const parts = raw.split(KEY_SEPARATOR);
  if (parts.length !== 3) {
    return null;
  }
  const location = unescapeSegment(parts[0]);
  const cameraId = unescapeSegment(parts[1]);
  const stamp = parseFolderName(parts[2]);
  if (!location || !cameraId || !stamp || stamp.hour === null) {
    return null;
  }
  return { kind: 'hour', location, cameraId, day: stamp.day, hour: parts[2].slice(8) };
}

export function parseOriginalKey(raw: string): OriginalFolderKey | null {
  const parts = raw.split(KEY_SEPARATOR);
  if (parts.length !== 4 || parts[0] !== ORIGINAL_TAG) {
    return null;
  }
  const location = unescapeSegment(parts[1]);
  const cameraId = unescapeSegment(parts[2]);
  const stamp = parseFolderName(parts[3]);
  if (!location || !cameraId || !stamp || stamp.hour === null) {
    return null;
  }
  return { kind: 'original', location, cameraId, day: stamp.day, hour: parts[3].slice(8) };
}

export function hourKeyFor(location: string, cameraId: string, folderName: string): HourKey | null {
  const stamp = parseFolderName(folderName);
  if (!stamp || stamp.hour === null) {
    return null;
  }
  return { kind: 'hour', location, cameraId, day: stamp.day, hour: folderName.slice(8) };
}

export function originalKeyFor(hour: HourKey): OriginalFolderKey {
  return {
    kind: 'original',
    location: hour.location,
    cameraId: hour.cameraId,
    day: hour.day,
    hour: hour.hour
  };
}

export function hourFolderName(key: HourKey | OriginalFolderKey) {
  return `${key.day}${key.hour}`;
}

export type ArchiveLayout = {
  videoRoot: string;
  mergedDir: string;
  sourceDir: string;
};

export function mergedRootPath(layout: ArchiveLayout) {
  return path.join(layout.videoRoot, layout.mergedDir);
}

export function mergedDayDirPath(layout: ArchiveLayout, day: string) {
  return path.join(mergedRootPath(layout), day);
}

export function hourOutputPath(layout: ArchiveLayout, key: Pick<HourKey, 'location' | 'day' | 'hour'>) {
  return path.join(mergedDayDirPath(layout, key.day), `${key.day}_${key.location}_${key.hour}.mp4`);
}

export function dayOutputPath(layout: ArchiveLayout, key: Pick<DayKey, 'location' | 'day'>) {
  return path.join(mergedDayDirPath(layout, key.day), `${key.day}_${key.location}.mp4`);
}

export function cameraSourcePath(layout: ArchiveLayout, location: string, cameraId: string) {
  return path.join(layout.videoRoot, location, layout.sourceDir, cameraId);
}

export function originalFolderPath(layout: ArchiveLayout, key: HourKey | OriginalFolderKey) {
  return path.join(cameraSourcePath(layout, key.location, key.cameraId), hourFolderName(key));
}
