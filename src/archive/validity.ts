import fs from 'node:fs/promises';
import type { Transcoder } from './transcoder.js';

export type ValidityOptions = {
  minValidSizeKb: number;
  deep: boolean;
  probeTimeoutMs: number;
};

/**
 * Decides whether a merge output on disk is acceptable. The same predicate
 * answers "is this bucket already done" and "did this attempt succeed".
 */
export class ValidityChecker {
  constructor(
    private readonly options: ValidityOptions,
    private readonly prober: Pick<Transcoder, 'probe'>
  ) {}

  async isValid(filePath: string, deep = this.options.deep): Promise<boolean> {
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return false;
      }
      size = stats.size;
    } catch {
      return false;
    }

    if (size / 1024 < this.options.minValidSizeKb) {
      return false;
    }

    if (!deep) {
      return true;
    }

    return this.prober.probe(filePath, this.options.probeTimeoutMs);
  }
}
