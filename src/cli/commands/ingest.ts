import { Command } from 'commander';
import { z } from 'zod';
import { readRecordsFile } from '../../services/record-reader';
import { printSummary, withServices } from './shared';

const optionsSchema = z.object({
  format: z.enum(['jsonl', 'json', 'csv']).optional(),
  json: z.boolean().default(false)
});

export const ingestCommand = new Command('ingest')
  .description('Normalize, deduplicate, store and index scraped records from a file')
  .argument('<file>', 'JSON lines, JSON array or CSV file')
  .option('-f, --format <format>', 'Input format (jsonl, json, csv); guessed from the extension by default')
  .option('--json', 'Output the run summary as JSON')
  .action(async (file: string, rawOptions: unknown) => {
    const options = optionsSchema.parse(rawOptions);
    await withServices(async ({ pipeline }) => {
      const { records, rejected } = await readRecordsFile(file, options.format);
      const summary = await pipeline.run(records, rejected);
      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        printSummary(summary);
      }
    });
  });
