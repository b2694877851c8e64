import { Command } from 'commander';
import { z } from 'zod';
import { positiveInt, printHits, withServices } from './shared';

const optionsSchema = z.object({
  k: positiveInt.optional(),
  json: z.boolean().default(false)
});

export const similarCommand = new Command('similar')
  .description('Products closest to a stored product')
  .argument('<productId>', 'Product id (prd_...)')
  .option('-k, --k <count>', 'Number of results')
  .option('--json', 'Output raw JSON')
  .action(async (productId: string, rawOptions: unknown) => {
    const options = optionsSchema.parse(rawOptions);
    await withServices(async ({ engine, config }) => {
      const hits = await engine.similarTo(productId, Math.min(options.k ?? config.search.defaultK, config.search.maxK));
      if (options.json) {
        console.log(JSON.stringify(hits, null, 2));
      } else {
        printHits(hits);
      }
    });
  });
