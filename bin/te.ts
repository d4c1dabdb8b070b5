#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ThousandEyesApiError, ThousandEyesCliError } from '../src/errors.js';

import { register as registerRun } from '../src/commands/run.js';
import { register as registerAgents } from '../src/commands/agents.js';
import { register as registerTests } from '../src/commands/tests.js';
import { register as registerResults } from '../src/commands/results.js';
import { register as registerConfig } from '../src/commands/config.js';

function loadCliVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' && packageJson !== null &&
      'version' in packageJson && typeof packageJson.version === 'string' && packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
  } catch {
    // Fall through to static default.
  }
  return '0.1.0';
}

// Global error handler
function handleError(err: unknown): never {
  const jsonMode = program.opts().json || !process.stdout.isTTY;

  if (err instanceof ThousandEyesCliError) {
    if (jsonMode) {
      const status = err instanceof ThousandEyesApiError ? { status: err.statusCode } : {};
      console.error(JSON.stringify({ error: true, ...status, type: err.name, message: err.message }));
    } else {
      console.error(err.display());
    }
    process.exit(err.exitCode);
  }
  if (err instanceof Error) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (process.env.TE_DEBUG || program.opts().debug) {
        console.error(err.stack);
      }
    }
  } else {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: 'An unexpected error occurred' }));
    } else {
      console.error(chalk.red('An unexpected error occurred'));
    }
  }
  process.exit(1);
}

program
  .name('te')
  .version(loadCliVersion())
  .description('CLI for ThousandEyes HTTP server tests: discover an agent, create a test, report its results.')
  .option('--token <token>', 'Override API bearer token')
  .option('--json', 'Force JSON output')
  .option('--table', 'Force table output')
  .option('--csv', 'Force CSV output')
  .option('-q, --quiet', 'Only output IDs')
  .option('--no-color', 'Disable colors')
  .option('--debug', 'Print request/response details to stderr');

if (process.argv.includes('--no-color')) {
  process.env.NO_COLOR = '1';
}

registerRun(program);
registerAgents(program);
registerTests(program);
registerResults(program);
registerConfig(program);

program.parseAsync(process.argv).catch(handleError);

process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => handleError(reason));
