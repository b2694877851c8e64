import { promises as fs } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { exportCatalog } from '../../services/catalog-export';
import { withServices } from './shared';

const optionsSchema = z.object({
  format: z.enum(['csv', 'jsonl']).default('csv'),
  output: z.string().optional()
});

export const exportCommand = new Command('export')
  .description('Export the canonical catalog')
  .option('-f, --format <format>', 'csv or jsonl', 'csv')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(async (rawOptions: unknown) => {
    const options = optionsSchema.parse(rawOptions);
    await withServices(async ({ catalog }) => {
      const body = await exportCatalog(catalog, options.format);
      if (options.output) {
        await fs.writeFile(options.output, body, 'utf8');
        console.log(`Catalog written to ${options.output}`);
      } else {
        process.stdout.write(body);
      }
    });
  });
