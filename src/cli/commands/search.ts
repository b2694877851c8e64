import { Command } from 'commander';
import { z } from 'zod';
import { optionalAmount, positiveInt, printHits, withServices } from './shared';

const optionsSchema = z.object({
  k: positiveInt.optional(),
  category: z.string().optional(),
  minPrice: optionalAmount,
  maxPrice: optionalAmount,
  minScore: z.coerce.number().optional(),
  json: z.boolean().default(false)
});

export const searchCommand = new Command('search')
  .description('Semantic search over the catalog')
  .argument('<query>', 'Free-text query')
  .option('-k, --k <count>', 'Number of results')
  .option('-c, --category <category>', 'Only products in this category')
  .option('--min-price <amount>', 'Minimum price')
  .option('--max-price <amount>', 'Maximum price')
  .option('--min-score <score>', 'Minimum cosine similarity')
  .option('--json', 'Output raw JSON')
  .action(async (query: string, rawOptions: unknown) => {
    const options = optionsSchema.parse(rawOptions);
    await withServices(async ({ engine, config }) => {
      const hits = await engine.query(
        query,
        Math.min(options.k ?? config.search.defaultK, config.search.maxK),
        { category: options.category, minPrice: options.minPrice, maxPrice: options.maxPrice },
        { minScore: options.minScore }
      );
      if (options.json) {
        console.log(JSON.stringify(hits, null, 2));
      } else {
        printHits(hits);
      }
    });
  });
