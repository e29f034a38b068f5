export type CameraFolder = {
  location: string;
  cameraId: string;
  path: string;
};

export type HourBucket = {
  kind: 'hour';
  location: string;
  cameraId: string;
  day: string;
  hour: string;
};

export type DayBucket = {
  kind: 'day';
  location: string;
  day: string;
};

export type HourKey = HourBucket;

export type DayKey = DayBucket;

export type OriginalFolderKey = {
  kind: 'original';
  location: string;
  cameraId: string;
  day: string;
  hour: string;
};

export type LedgerKey = HourKey | DayKey | OriginalFolderKey;

export type MergeScope = 'hour' | 'day';

export type MergeStrategy = 'concat-aac' | 'concat-copy' | 'direct-copy' | 'degraded-copy';

export type RetentionWarning = {
  path: string;
  reason: string;
  key?: string;
};
