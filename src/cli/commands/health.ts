import { Command } from 'commander';
import http from 'http';
import { z } from 'zod';

const optionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(5280),
  json: z.boolean().default(false)
});

const healthSchema = z.object({
  status: z.string(),
  store: z.string().optional(),
  catalog: z.object({ products: z.number() }).optional(),
  index: z.object({ vectors: z.number() }).optional(),
  encoder: z.object({ modelVersion: z.string() }).optional()
});

export const healthCommand = new Command('health')
  .description('Check a running service')
  .option('-p, --port <port>', 'Server port', '5280')
  .option('--json', 'Output raw JSON')
  .action((rawOptions: unknown) => {
    const options = optionsSchema.parse(rawOptions);
    const url = `http://localhost:${options.port}/health`;

    http.get(url, (res) => {
      let data = '';
      res.on('data', (chunk: Buffer) => (data += chunk.toString('utf8')));
      res.on('end', () => {
        let health: z.infer<typeof healthSchema>;
        try {
          health = healthSchema.parse(JSON.parse(data));
        } catch {
          console.error('Failed to parse health response');
          process.exit(1);
        }
        if (options.json) {
          console.log(JSON.stringify(health, null, 2));
        } else {
          console.log(`Status: ${health.status.toUpperCase()}`);
          if (health.store) console.log(`Store: ${health.store}`);
          if (health.catalog) console.log(`Products: ${health.catalog.products}`);
          if (health.index) console.log(`Indexed vectors: ${health.index.vectors}`);
          if (health.encoder) console.log(`Model: ${health.encoder.modelVersion}`);
        }
        process.exit(health.status === 'healthy' ? 0 : 1);
      });
    }).on('error', (err) => {
      console.error(`Cannot connect to shelfwise on port ${options.port}: ${err.message}`);
      process.exit(1);
    });
  });
