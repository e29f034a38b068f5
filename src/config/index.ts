import fs from 'node:fs';
import path from 'node:path';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ArchiveConfig = {
  videoRoot: string;
  mergedDir?: string;
  sourceDir?: string;
  ledgerPath?: string;
  requiredLocations?: string[];
  minValidSizeKb?: number;
  saveHourly?: boolean;
  deepCheck?: boolean;
  autoCleanRecords?: boolean;
  videoExtensions?: string[];
};

export type MergeConfig = {
  timeoutSeconds?: number;
  maxRetries?: number;
  retryDelaySeconds?: number;
  invocationCeilingSeconds?: number;
  probeTimeoutSeconds?: number;
};

export type ScheduleConfig = {
  scanIntervalSeconds?: number;
  errorCooldownSeconds?: number;
  watchdogTimeoutSeconds?: number;
  heartbeatSeconds?: number;
  minCurrentDayFiles?: number;
};

export type RetentionConfig = {
  deleteOriginalAfterDays?: number;
  deleteMergedAfterDays?: number;
};

export type TranscoderConfig = {
  ffmpegPath?: string;
  ffprobePath?: string;
};

export type ArchiverConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  archive: ArchiveConfig;
  merge?: MergeConfig;
  schedule?: ScheduleConfig;
  retention?: RetentionConfig;
  transcoder?: TranscoderConfig;
};

export type ArchiveSettings = {
  videoRoot: string;
  mergedDir: string;
  sourceDir: string;
  ledgerPath: string;
  requiredLocations: string[];
  minValidSizeKb: number;
  saveHourly: boolean;
  deepCheck: boolean;
  autoCleanRecords: boolean;
  videoExtensions: string[];
  merge: {
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    invocationCeilingMs: number;
    probeTimeoutMs: number;
  };
  schedule: {
    scanIntervalMs: number;
    errorCooldownMs: number;
    watchdogTimeoutMs: number;
    heartbeatMs: number;
    minCurrentDayFiles: number;
  };
  retention: {
    deleteOriginalAfterDays: number;
    deleteMergedAfterDays: number;
  };
  transcoder: {
    ffmpegPath: string;
    ffprobePath: string;
  };
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const secondsSchema: JsonSchema = { type: 'number', minimum: 0 };
const intervalSchema: JsonSchema = { type: 'number', minimum: 1 };

const archiverConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'archive'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] }
      }
    },
    archive: {
      type: 'object',
      required: ['videoRoot'],
      additionalProperties: false,
      properties: {
        videoRoot: { type: 'string' },
        mergedDir: { type: 'string' },
        sourceDir: { type: 'string' },
        ledgerPath: { type: 'string' },
        requiredLocations: { type: 'array', items: { type: 'string' } },
        minValidSizeKb: { type: 'number', minimum: 0 },
        saveHourly: { type: 'boolean' },
        deepCheck: { type: 'boolean' },
        autoCleanRecords: { type: 'boolean' },
        videoExtensions: { type: 'array', items: { type: 'string' } }
      }
    },
    merge: {
      type: 'object',
      additionalProperties: false,
      properties: {
        timeoutSeconds: { type: 'number', minimum: 1 },
        maxRetries: { type: 'number', minimum: 1, maximum: 20 },
        retryDelaySeconds: secondsSchema,
        invocationCeilingSeconds: { type: 'number', minimum: 1 },
        probeTimeoutSeconds: { type: 'number', minimum: 1 }
      }
    },
    schedule: {
      type: 'object',
      additionalProperties: false,
      properties: {
        scanIntervalSeconds: intervalSchema,
        errorCooldownSeconds: intervalSchema,
        watchdogTimeoutSeconds: { type: 'number', minimum: 1 },
        heartbeatSeconds: { type: 'number', minimum: 1 },
        minCurrentDayFiles: { type: 'number', minimum: 0 }
      }
    },
    retention: {
      type: 'object',
      additionalProperties: false,
      properties: {
        deleteOriginalAfterDays: { type: 'number' },
        deleteMergedAfterDays: { type: 'number' }
      }
    },
    transcoder: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ffmpegPath: { type: 'string' },
        ffprobePath: { type: 'string' }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const obj = value as Record<string, unknown>;
    const required = schema.required ?? [];

    for (const key of required) {
      if (!(key in obj)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(obj)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(...validateAgainstSchema(schema.additionalProperties, obj[key], `${pathLabel}.${key}`));
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in obj)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, obj[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function validateLogicalConfig(config: ArchiverConfig) {
  const messages: string[] = [];
  const archive = config.archive;

  if (archive.videoRoot.trim().length === 0) {
    messages.push('config.archive.videoRoot must be a non-empty path');
  }

  const mergedDir = archive.mergedDir;
  if (typeof mergedDir === 'string' && !isPlainDirectoryName(mergedDir)) {
    messages.push('config.archive.mergedDir must be a single directory name');
  }

  const sourceDir = archive.sourceDir;
  if (typeof sourceDir === 'string' && !isPlainDirectoryName(sourceDir)) {
    messages.push('config.archive.sourceDir must be a single directory name');
  }

  const seen = new Set<string>();
  (archive.requiredLocations ?? []).forEach((location, index) => {
    const trimmed = location.trim();
    if (!trimmed) {
      messages.push(`config.archive.requiredLocations[${index}] must be a non-empty string`);
      return;
    }
    if (seen.has(trimmed)) {
      messages.push(`config.archive.requiredLocations[${index}] duplicates location "${trimmed}"`);
    }
    seen.add(trimmed);
  });

  (archive.videoExtensions ?? []).forEach((extension, index) => {
    if (!extension.startsWith('.') || extension.length < 2) {
      messages.push(`config.archive.videoExtensions[${index}] must start with "." (got "${extension}")`);
    }
  });

  const merge = config.merge;
  if (merge && typeof merge.maxRetries === 'number' && !Number.isInteger(merge.maxRetries)) {
    messages.push('config.merge.maxRetries must be an integer');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function isPlainDirectoryName(value: string) {
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed !== '.' && trimmed !== '..' && !/[\\/]/.test(trimmed);
}

export function validateConfig(config: unknown): asserts config is ArchiverConfig {
  const errors = validateAgainstSchema(archiverConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as ArchiverConfig);
}

export function parseConfig(contents: string): ArchiverConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): ArchiverConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

const SECOND_MS = 1000;

export function resolveArchiveSettings(
  config: ArchiverConfig,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): ArchiveSettings {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const archive = config.archive;
  const merge = config.merge ?? {};
  const schedule = config.schedule ?? {};
  const retention = config.retention ?? {};
  const transcoder = config.transcoder ?? {};

  return {
    videoRoot: path.resolve(cwd, archive.videoRoot),
    mergedDir: archive.mergedDir?.trim() || 'merged_videos',
    sourceDir: archive.sourceDir?.trim() || 'xiaomi_camera_videos',
    ledgerPath: path.resolve(cwd, archive.ledgerPath ?? 'processed.json'),
    requiredLocations: (archive.requiredLocations ?? []).map(location => location.trim()),
    minValidSizeKb: archive.minValidSizeKb ?? 1024,
    saveHourly: archive.saveHourly === true,
    deepCheck: archive.deepCheck === true,
    autoCleanRecords: archive.autoCleanRecords !== false,
    videoExtensions: archive.videoExtensions ?? ['.mp4', '.mp4.old'],
    merge: {
      timeoutMs: (merge.timeoutSeconds ?? 1800) * SECOND_MS,
      maxRetries: merge.maxRetries ?? 3,
      retryDelayMs: (merge.retryDelaySeconds ?? 5) * SECOND_MS,
      invocationCeilingMs: (merge.invocationCeilingSeconds ?? 600) * SECOND_MS,
      probeTimeoutMs: (merge.probeTimeoutSeconds ?? 30) * SECOND_MS
    },
    schedule: {
      scanIntervalMs: (schedule.scanIntervalSeconds ?? 600) * SECOND_MS,
      errorCooldownMs: (schedule.errorCooldownSeconds ?? 60) * SECOND_MS,
      watchdogTimeoutMs: (schedule.watchdogTimeoutSeconds ?? 3600) * SECOND_MS,
      heartbeatMs: (schedule.heartbeatSeconds ?? 30) * SECOND_MS,
      minCurrentDayFiles: schedule.minCurrentDayFiles ?? 5
    },
    retention: {
      deleteOriginalAfterDays: retention.deleteOriginalAfterDays ?? 1,
      deleteMergedAfterDays: retention.deleteMergedAfterDays ?? 1
    },
    transcoder: {
      ffmpegPath: env.FFMPEG_PATH || transcoder.ffmpegPath || 'ffmpeg',
      ffprobePath: env.FFPROBE_PATH || transcoder.ffprobePath || 'ffprobe'
    }
  };
}

export class ConfigManager {
  private currentConfig: ArchiverConfig | null = null;
  private readonly filePath: string;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    this.filePath = path.resolve(filePath);
  }

  getConfig(): ArchiverConfig {
    if (!this.currentConfig) {
      this.currentConfig = loadConfigFromFile(this.filePath);
    }
    return this.currentConfig;
  }
}

const defaultManager = new ConfigManager();

export default defaultManager;
