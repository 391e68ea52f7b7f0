#!/usr/bin/env node
import { createProgram, runScraper } from './cli';
import { logger } from './utils/logger';

const program = createProgram(async (outputFolder, options) => {
  await runScraper(outputFolder, options);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Scraping aborted', error);
  process.exitCode = 1;
});
