import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { detectFormat, parseRecords, readRecordsFile, validateRows } from '../services/record-reader';

vi.mock('../utils/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

describe('parseRecords', () => {
  it('reads JSON lines and reports bad lines by number', () => {
    const content = [
      JSON.stringify({ source_url: 'https://shop.test/a', raw_name: 'Savon', raw_price_text: '12,50 DH' }),
      '{"source_url": ',
      '',
      JSON.stringify({ sourceUrl: 'https://shop.test/b', rawName: 'Huile', scrapeTimestamp: 1_700_000_000_000 }),
      JSON.stringify({ title: 'Sans url' })
    ].join('\n');

    const result = parseRecords(content, 'jsonl');

    expect(result.records).toEqual([
      { sourceUrl: 'https://shop.test/a', rawName: 'Savon', rawPriceText: '12,50 DH' },
      { sourceUrl: 'https://shop.test/b', rawName: 'Huile', scrapeTimestamp: 1_700_000_000_000 },
      { rawName: 'Sans url' }
    ]);
    expect(result.rejected).toEqual([{ stage: 'normalize', subject: 'line 2', error: 'Invalid JSON' }]);
  });

  it('accepts scraper rows that carry no url', () => {
    const content = '{"title":"Huile Olive 1L","price":"45,00 DH","image":""}\n';

    expect(parseRecords(content, 'jsonl')).toEqual({
      records: [{ rawName: 'Huile Olive 1L', rawPriceText: '45,00 DH' }],
      rejected: []
    });
  });

  it('accepts the scraper column names and numeric prices', () => {
    const content = JSON.stringify([
      {
        url: 'https://shop.test/c',
        title: "Jus d'orange 1L",
        price: 15,
        category: 'Boissons',
        description: 'Jus pressé',
        image: 'https://cdn.shop.test/c.png',
        scraped_at: '2024-02-01T00:00:00Z'
      }
    ]);

    expect(parseRecords(content, 'json').records).toEqual([
      {
        sourceUrl: 'https://shop.test/c',
        rawName: "Jus d'orange 1L",
        rawPriceText: '15',
        rawCategoryText: 'Boissons',
        rawDescription: 'Jus pressé',
        imageUrl: 'https://cdn.shop.test/c.png',
        scrapeTimestamp: '2024-02-01T00:00:00Z'
      }
    ]);
  });

  it('prefers snake_case over other spellings of a column', () => {
    const [record] = parseRecords(
      JSON.stringify([{ source_url: 'https://shop.test/a', url: 'https://shop.test/other', raw_name: '', title: 'Savon' }]),
      'json'
    ).records;

    expect(record).toEqual({ sourceUrl: 'https://shop.test/a', rawName: 'Savon' });
  });

  it('rejects a JSON document that is not an array', () => {
    expect(() => parseRecords('{"url": "https://shop.test/a"}', 'json')).toThrow('Expected a JSON array of records');
  });

  it('reads CSV with a header row', () => {
    const content = [
      'url,title,price,category',
      'https://shop.test/a,Savon,"12,50 DH",Hygiène',
      ',Orphelin,1,Divers'
    ].join('\n');

    const result = parseRecords(content, 'csv');

    expect(result.records).toEqual([
      { sourceUrl: 'https://shop.test/a', rawName: 'Savon', rawPriceText: '12,50 DH', rawCategoryText: 'Hygiène' },
      { rawName: 'Orphelin', rawPriceText: '1', rawCategoryText: 'Divers' }
    ]);
    expect(result.rejected).toEqual([]);
  });
});

describe('validateRows', () => {
  it('labels rejected rows with the given function', () => {
    const result = validateRows([{ url: 'https://shop.test/a' }, 'not an object'], (index) => `records[${index}]`);

    expect(result.records).toEqual([{ sourceUrl: 'https://shop.test/a' }]);
    expect(result.rejected).toEqual([
      { stage: 'normalize', subject: 'records[1]', error: 'Expected object, received string' }
    ]);
  });
});

describe('detectFormat', () => {
  it('chooses the format from the file extension', () => {
    expect(detectFormat('listings.CSV')).toBe('csv');
    expect(detectFormat('listings.json')).toBe('json');
    expect(detectFormat('listings.jsonl')).toBe('jsonl');
    expect(detectFormat('listings.ndjson')).toBe('jsonl');
  });
});

describe('readRecordsFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shelfwise-reader-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a file in the format its extension names', async () => {
    const file = path.join(dir, 'listings.csv');
    await fs.writeFile(file, '\uFEFFsource_url,raw_name\nhttps://shop.test/a,Savon\n', 'utf8');

    const result = await readRecordsFile(file);

    expect(result.records).toEqual([{ sourceUrl: 'https://shop.test/a', rawName: 'Savon' }]);
    expect(result.rejected).toEqual([]);
  });
});
