import { Command } from 'commander';
import { ThousandEyesClient } from '../client.js';
import { ThousandEyesCliError, ThousandEyesConfigError } from '../errors.js';
import { MISSING, analyzeResults, fetchResults } from '../results.js';
import { saveReport } from '../report.js';
import { outputJson } from '../output.js';
import type { GlobalOptions, ResultsPayload } from '../types.js';
import { toInteger } from '../values.js';

interface ShowOptions extends GlobalOptions {
  name?: string;
  target?: string;
  save?: boolean;
  outDir?: string;
}

function parseTestId(raw: string): number {
  const testId = toInteger(raw);
  if (testId === null) {
    throw new ThousandEyesConfigError(`Invalid test ID: ${raw}`);
  }
  return testId;
}

async function loadResults(opts: GlobalOptions, rawId: string): Promise<ResultsPayload> {
  const testId = parseTestId(rawId);
  const client = new ThousandEyesClient(opts.token, { debug: opts.debug });
  const results = await fetchResults(client, testId);
  if (results === null) {
    throw new ThousandEyesCliError(`Unable to fetch results for test ID ${testId}.`);
  }
  return results;
}

export function register(program: Command): void {
  const cmd = program
    .command('results')
    .description('Fetch and summarize HTTP server test results');

  cmd
    .command('get <test-id>')
    .description('Print the raw results payload as JSON')
    .action(async (rawId: string, _options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      outputJson(await loadResults(opts, rawId));
    });

  cmd
    .command('show <test-id>')
    .description('Print a summary of the most recent result')
    .option('--name <name>', 'Test name shown in the summary (defaults to TEST_NAME)')
    .option('--target <url>', 'Target shown in the summary (defaults to TARGET)')
    .option('--save', 'Also write <name>_report.json')
    .option('--out-dir <dir>', 'Directory for the report', process.cwd())
    .action(async (rawId: string, _options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<ShowOptions>();
      const testName = opts.name ?? process.env.TEST_NAME ?? '';
      const target = opts.target ?? process.env.TARGET ?? '';
      if (opts.save && !testName) {
        throw new ThousandEyesConfigError('--save needs a test name. Pass --name or set TEST_NAME.');
      }

      const results = await loadResults(opts, rawId);
      analyzeResults(results, { testName: testName || MISSING, target: target || MISSING });
      if (opts.save) {
        saveReport(testName, results, opts.outDir);
      }
    });
}
