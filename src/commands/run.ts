import { Command } from 'commander';
import chalk from 'chalk';
import { ThousandEyesClient } from '../client.js';
import { buildRunConfig } from '../config.js';
import { runWorkflow } from '../workflow.js';
import type { GlobalOptions } from '../types.js';

interface RunOptions extends GlobalOptions {
  name?: string;
  target?: string;
  interval?: string;
  outDir?: string;
}

export function register(program: Command): void {
  program
    .command('run')
    .description('Resolve an agent, find or create the test, then summarize and save its results')
    .option('--name <name>', 'Test name (defaults to TEST_NAME)')
    .option('--target <url>', 'URL to monitor (defaults to TARGET)')
    .option('--interval <seconds>', 'Interval for a newly created test', '3600')
    .option('--out-dir <dir>', 'Directory for the report', process.cwd())
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<RunOptions>();
      const config = buildRunConfig({
        token: opts.token,
        testName: opts.name,
        target: opts.target,
        interval: opts.interval,
      });
      const client = new ThousandEyesClient(config.token, { baseUrl: config.baseUrl, debug: opts.debug });

      console.error(chalk.bold('Starting ThousandEyes test automation...'));
      const outcome = await runWorkflow(client, config, { outDir: opts.outDir });
      console.error(chalk.dim(`Agent ${outcome.agentId}, test ${outcome.testId}${outcome.created ? ' (created)' : ''}`));
    });
}
