#!/usr/bin/env node
/**
 * @module Main
 * Command-line entry point. Reads URLs from a CSV file, submits each one
 * to the Yandex Webmaster recrawl queue and the Google Indexing API, and
 * writes a CSV report of the outcomes.
 *
 * Usage: reindex-urls [input.csv] [output.csv]
 */

import * as path from 'path';
import { runReindex } from './lib/app.js';
import { ConfigurationError } from './lib/errors.js';

const DEFAULT_INPUT = 'urls.csv';
const DEFAULT_OUTPUT = 'results.csv';

/**
 * Resolves the run's paths, executes it and maps the outcome to an exit code:
 * 0 once the results are written, 1 for configuration errors, aborted runs
 * and unwritable output.
 */
async function main(): Promise<number> {
  // Handle arguments passed via `npm start --`
  const args = process.argv.slice(2);
  if (args[0] === '--') {
    args.shift();
  }

  const inputPath = path.resolve(process.cwd(), args[0] ?? DEFAULT_INPUT);
  const outputPath = path.resolve(process.cwd(), args[1] ?? DEFAULT_OUTPUT);

  try {
    const summary = await runReindex({ inputPath, outputPath });
    return summary.state === 'Done' && summary.outputWritten ? 0 : 1;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

(async () => {
  // Load a .env file outside production
  if (process.env.NODE_ENV !== 'production') {
    await import('dotenv/config');
  }

  process.exitCode = await main();
})().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exitCode = 1;
});
