import { Command } from 'commander';
import chalk from 'chalk';
import { ThousandEyesClient } from '../client.js';
import { parseInterval, parseTarget } from '../config.js';
import { ThousandEyesCliError, ThousandEyesConfigError, ThousandEyesNotFoundError } from '../errors.js';
import { resolveFirstAgent } from '../agents.js';
import { createTest, findTestByName, listTests } from '../tests.js';
import { detectFormat, outputId, outputList, type OutputFormat, type Row } from '../output.js';
import type { GlobalOptions, HttpServerTest } from '../types.js';
import { toInteger } from '../values.js';

interface CreateOptions extends GlobalOptions {
  name: string;
  target: string;
  agent?: string;
  interval?: string;
}

function flattenTest(test: HttpServerTest): Row {
  return {
    id: test.testId,
    name: test.testName,
    url: test.url,
    interval: test.interval,
    enabled: test.enabled,
    agents: test.agents.join(','),
  };
}

export function register(program: Command): void {
  const cmd = program
    .command('tests')
    .description('Find and create HTTP server tests');

  cmd
    .command('list')
    .description('List HTTP server tests')
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      const client = new ThousandEyesClient(opts.token, { debug: opts.debug });
      const format: OutputFormat = detectFormat(opts);

      const tests = await listTests(client);
      if (tests === null) {
        throw new ThousandEyesCliError('Unable to list tests.');
      }

      outputList(tests.map(flattenTest), {
        format,
        columns: ['id', 'name', 'url', 'interval', 'enabled', 'agents'],
        idField: 'id',
      });
    });

  cmd
    .command('find <name>')
    .description('Print the ID of the test with exactly this name')
    .action(async (name: string, _options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      const client = new ThousandEyesClient(opts.token, { debug: opts.debug });

      const testId = await findTestByName(client, name);
      if (testId === null) {
        throw new ThousandEyesNotFoundError(`No test named '${name}'.`);
      }
      outputId(testId, detectFormat(opts));
    });

  cmd
    .command('create')
    .description('Create an HTTP server test, reusing an existing one with the same name')
    .requiredOption('--name <name>', 'Test name')
    .requiredOption('--target <url>', 'URL to monitor')
    .option('--agent <id>', 'Agent ID (defaults to the first agent)')
    .option('--interval <seconds>', 'Test interval in seconds', '3600')
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<CreateOptions>();
      const client = new ThousandEyesClient(opts.token, { debug: opts.debug });
      const format: OutputFormat = detectFormat(opts);
      const interval = parseInterval(opts.interval);
      const target = parseTarget(opts.target);

      const existing = await findTestByName(client, opts.name);
      if (existing !== null) {
        console.error(chalk.yellow(`Test '${opts.name}' already exists (ID: ${existing})`));
        outputId(existing, format);
        return;
      }

      let agentId: number | null;
      if (opts.agent !== undefined) {
        agentId = toInteger(opts.agent);
        if (agentId === null) {
          throw new ThousandEyesConfigError(`Invalid agent ID: ${opts.agent}`);
        }
      } else {
        agentId = await resolveFirstAgent(client);
        if (agentId === null) {
          throw new ThousandEyesNotFoundError('No valid agent available.');
        }
      }

      const testId = await createTest(client, opts.name, target, agentId, interval);
      if (testId === null) {
        throw new ThousandEyesCliError(`Unable to create test '${opts.name}'.`);
      }
      outputId(testId, format);
    });
}
