import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SinkWriteError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import type { ListingSink } from './types';

const log = logger.child('json-sink');

export type JsonFileKind = 'raw-listings' | 'clean-listings';

export interface JsonFileSinkOptions {
  outputDir: string;
  /** File name prefix, usually the platform slug */
  key: string;
  kind: JsonFileKind;
  now?: () => number;
}

/**
 * Writes each batch to `<key>-<kind>-<YYYY-MM-DD>.json`, replacing any file
 * of the same day.
 */
export class JsonFileSink<T> implements ListingSink<T> {
  readonly name: string;
  private readonly options: JsonFileSinkOptions;

  constructor(options: JsonFileSinkOptions) {
    this.options = options;
    this.name = `json:${options.kind}`;
  }

  filePath(): string {
    const { outputDir, key, kind, now = Date.now } = this.options;
    const date = new Date(now()).toISOString().split('T')[0];
    return path.join(outputDir, `${key}-${kind}-${date}.json`);
  }

  async save(listings: readonly T[]): Promise<number> {
    if (listings.length === 0) {
      log.warn(`No ${this.options.kind} to write`);
      return 0;
    }

    const filepath = this.filePath();
    try {
      await mkdir(this.options.outputDir, { recursive: true });
      await writeFile(filepath, JSON.stringify(listings, null, 2));
    } catch (error) {
      throw new SinkWriteError(`Failed to write ${filepath}`, {
        cause: error,
      });
    }

    log.info(
      `Saved ${listings.length} ${this.options.kind} to ${path.basename(filepath)}`
    );
    return listings.length;
  }

  async close(): Promise<void> {
    // Nothing held open between writes
  }
}
