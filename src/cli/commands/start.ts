import { Command } from 'commander';
import { z } from 'zod';

const optionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional()
});

export const startCommand = new Command('start')
  .description('Start the HTTP service')
  .option('-p, --port <port>', 'Port to listen on (defaults to PORT or 5280)')
  .action(async (rawOptions: unknown) => {
    const { port } = optionsSchema.parse(rawOptions);
    // Dynamic import to avoid loading server code for other commands
    const { startServer } = await import('../../server');
    await startServer(port);
  });
