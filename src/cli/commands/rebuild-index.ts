import { Command } from 'commander';
import { z } from 'zod';
import { printSummary, withServices } from './shared';

const optionsSchema = z.object({
  json: z.boolean().default(false)
});

export const rebuildIndexCommand = new Command('rebuild-index')
  .description('Re-embed products whose text or model changed and rebuild the vector index')
  .option('--json', 'Output the run summary as JSON')
  .action(async (rawOptions: unknown) => {
    const options = optionsSchema.parse(rawOptions);
    await withServices(async ({ pipeline }) => {
      const summary = await pipeline.rebuildIndex();
      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        printSummary(summary);
      }
    });
  });
