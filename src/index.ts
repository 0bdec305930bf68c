#!/usr/bin/env node
import 'dotenv/config';
import { createLogger } from './logger.js';
import { getConfig } from './config.js';
import { run } from './app.js';

const logger = createLogger('cli');

/**
 * Usage: npc-replay [input.json] [output-file]
 */
async function main(): Promise<void> {
  const [inputFile, outputFile] = process.argv.slice(2);
  const config = getConfig();

  await run(config, { inputFile, outputFile });
}

main().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Run aborted');
  process.exitCode = 1;
});
