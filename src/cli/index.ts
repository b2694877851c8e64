#!/usr/bin/env node
/**
 * shelfwise CLI - ingest scraped listings, search the catalog, run the service.
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { join } from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { startCommand } from './commands/start';
import { healthCommand } from './commands/health';
import { ingestCommand } from './commands/ingest';
import { searchCommand } from './commands/search';
import { similarCommand } from './commands/similar';
import { exportCommand } from './commands/export';
import { rebuildIndexCommand } from './commands/rebuild-index';

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf8')));

const program = new Command();

program
  .name('shelfwise')
  .description('Retail catalog canonicalization and semantic product search')
  .version(pkg.version);

program.addCommand(ingestCommand);
program.addCommand(searchCommand);
program.addCommand(similarCommand);
program.addCommand(exportCommand);
program.addCommand(rebuildIndexCommand);
program.addCommand(startCommand);
program.addCommand(healthCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
