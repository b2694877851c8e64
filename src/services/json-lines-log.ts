/**
 * Append-only JSON-lines log
 *
 * Each write appends one complete line; replay keeps only lines that parse
 * and validate, so a line torn by a crash mid-write is dropped rather than
 * half-applied. `rewrite` compacts the log through a temp file + rename.
 * Stores rewrite their log on load once it holds more than
 * `DEFAULT_COMPACTION_RATIO` lines per live entry.
 *
 * @module services/json-lines-log
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { z } from 'zod';
import { logger } from '../utils/logger';

export const DEFAULT_COMPACTION_RATIO = 2;

export interface FileStoreOptions {
  /** Log lines per live entry above which the log is rewritten on load. */
  compactionRatio?: number;
}

export const needsCompaction = (
  logLines: number,
  liveEntries: number,
  ratio: number = DEFAULT_COMPACTION_RATIO
): boolean => logLines > Math.max(liveEntries, 1) * ratio;

export class JsonLinesLog<T> {
  constructor(
    private readonly filePath: string,
    private readonly schema: z.ZodType<T>
  ) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Read every valid entry in file order. A missing file is an empty log.
   */
  async readAll(): Promise<{ entries: T[]; invalidLines: number }> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { entries: [], invalidLines: 0 };
      }
      throw error;
    }

    const entries: T[] = [];
    let invalidLines = 0;
    for (const line of raw.split('\n')) {
      if (!line.trim()) {
        continue;
      }
      const entry = this.parseLine(line);
      if (entry === undefined) {
        invalidLines++;
      } else {
        entries.push(entry);
      }
    }

    if (invalidLines > 0) {
      logger.warn('Skipped unreadable log lines', { path: this.filePath, invalidLines });
    }
    return { entries, invalidLines };
  }

  async append(entry: T): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf8');
  }

  /**
   * Replace the whole log with `entries`.
   */
  async rewrite(entries: Iterable<T>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const lines: string[] = [];
    for (const entry of entries) {
      lines.push(JSON.stringify(entry));
    }
    await fs.writeFile(tempPath, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8');
    await fs.rename(tempPath, this.filePath);
  }

  private parseLine(line: string): T | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      return undefined;
    }
    const result = this.schema.safeParse(parsed);
    return result.success ? result.data : undefined;
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
