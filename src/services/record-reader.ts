/**
 * Record Reader
 *
 * Loads scraped listings from JSON lines, a JSON array or CSV. Column names
 * may be snake_case (`source_url`, `raw_name`, ...), camelCase (`sourceUrl`,
 * `rawName`, ...) or the scraper's own (`url`, `title`, `price`, `category`,
 * `description`, `image`, `scraped_at`). Rows that fail validation are
 * returned as rejections instead of aborting the read.
 *
 * @module services/record-reader
 */

import { promises as fs } from 'fs';
import { extname } from 'path';
import { parse as csvParse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawRecord, StageFailure } from '../types/catalog';
import { logger } from '../utils/logger';

export type InputFormat = 'jsonl' | 'json' | 'csv';

export interface ReadResult {
  records: RawRecord[];
  rejected: StageFailure[];
}

const textField = z.union([z.string(), z.number()]).nullish();

const firstText = (...values: Array<string | number | null | undefined>): string | undefined => {
  for (const value of values) {
    if (value !== null && value !== undefined && String(value).trim() !== '') {
      return String(value);
    }
  }
  return undefined;
};

/**
 * One input row in any accepted column naming, mapped to a RawRecord.
 */
export const rawRecordSchema = z
  .object({
    source_url: textField,
    sourceUrl: textField,
    url: textField,
    raw_name: textField,
    rawName: textField,
    title: textField,
    raw_price_text: textField,
    rawPriceText: textField,
    price: textField,
    raw_category_text: textField,
    rawCategoryText: textField,
    category: textField,
    raw_description: textField,
    rawDescription: textField,
    description: textField,
    image_url: textField,
    imageUrl: textField,
    image: textField,
    scrape_timestamp: textField,
    scrapeTimestamp: textField,
    scraped_at: textField
  })
  .transform((row): RawRecord => {
    const record: RawRecord = {};
    const sourceUrl = firstText(row.source_url, row.sourceUrl, row.url);
    if (sourceUrl !== undefined) record.sourceUrl = sourceUrl;
    const rawName = firstText(row.raw_name, row.rawName, row.title);
    if (rawName !== undefined) record.rawName = rawName;
    const rawPriceText = firstText(row.raw_price_text, row.rawPriceText, row.price);
    if (rawPriceText !== undefined) record.rawPriceText = rawPriceText;
    const rawCategoryText = firstText(row.raw_category_text, row.rawCategoryText, row.category);
    if (rawCategoryText !== undefined) record.rawCategoryText = rawCategoryText;
    const rawDescription = firstText(row.raw_description, row.rawDescription, row.description);
    if (rawDescription !== undefined) record.rawDescription = rawDescription;
    const imageUrl = firstText(row.image_url, row.imageUrl, row.image);
    if (imageUrl !== undefined) record.imageUrl = imageUrl;

    const timestamp = [row.scrape_timestamp, row.scrapeTimestamp, row.scraped_at].find(
      (value) => value !== null && value !== undefined && value !== ''
    );
    if (timestamp !== undefined && timestamp !== null) record.scrapeTimestamp = timestamp;

    return record;
  });

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

/**
 * Validate already-parsed rows. `label` names a rejected row in the summary.
 */
export const validateRows = (rows: unknown[], label: (index: number) => string): ReadResult => {
  const result: ReadResult = { records: [], rejected: [] };
  rows.forEach((row, index) => {
    const parsed = rawRecordSchema.safeParse(row);
    if (parsed.success) {
      result.records.push(parsed.data);
    } else {
      result.rejected.push({ stage: 'normalize', subject: label(index), error: describeIssues(parsed.error) });
    }
  });
  return result;
};

const parseJsonLines = (content: string): ReadResult => {
  const rows: unknown[] = [];
  const lineNumbers: number[] = [];
  const rejected: StageFailure[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) {
      return;
    }
    try {
      rows.push(JSON.parse(line));
      lineNumbers.push(index + 1);
    } catch {
      rejected.push({ stage: 'normalize', subject: `line ${index + 1}`, error: 'Invalid JSON' });
    }
  });

  const result = validateRows(rows, (index) => `line ${lineNumbers[index]}`);
  return { records: result.records, rejected: [...rejected, ...result.rejected] };
};

const parseJsonArray = (content: string): ReadResult => {
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new Error('Expected a JSON array of records');
  }
  return validateRows(data, (index) => `item ${index}`);
};

const parseCsv = (content: string): ReadResult => {
  const rows: unknown = csvParse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
    bom: true
  });
  if (!Array.isArray(rows)) {
    throw new Error('CSV parser returned no rows');
  }
  // Line 1 is the header
  return validateRows(rows, (index) => `line ${index + 2}`);
};

export const parseRecords = (content: string, format: InputFormat): ReadResult => {
  switch (format) {
    case 'csv':
      return parseCsv(content);
    case 'json':
      return parseJsonArray(content);
    case 'jsonl':
      return parseJsonLines(content);
  }
};

export const detectFormat = (filePath: string): InputFormat => {
  const extension = extname(filePath).toLowerCase();
  if (extension === '.csv') return 'csv';
  if (extension === '.json') return 'json';
  return 'jsonl';
};

export const readRecordsFile = async (filePath: string, format: InputFormat = detectFormat(filePath)): Promise<ReadResult> => {
  const content = await fs.readFile(filePath, 'utf8');
  const result = parseRecords(content, format);
  logger.info('Records read', {
    path: filePath,
    format,
    records: result.records.length,
    rejected: result.rejected.length
  });
  return result;
};
