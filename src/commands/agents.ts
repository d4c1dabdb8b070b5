import { Command } from 'commander';
import { ThousandEyesClient } from '../client.js';
import { ThousandEyesCliError, ThousandEyesNotFoundError } from '../errors.js';
import { listAgents, resolveFirstAgent } from '../agents.js';
import { detectFormat, outputId, outputList, type OutputFormat, type Row } from '../output.js';
import type { Agent, GlobalOptions } from '../types.js';

function flattenAgent(agent: Agent): Row {
  return {
    id: agent.agentId,
    name: agent.agentName,
    type: agent.agentType,
    location: agent.location,
    country: agent.countryId,
  };
}

export function register(program: Command): void {
  const cmd = program
    .command('agents')
    .description('Discover monitoring agents');

  cmd
    .command('list')
    .description('List the agents available to your account')
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      const client = new ThousandEyesClient(opts.token, { debug: opts.debug });
      const format: OutputFormat = detectFormat(opts);

      const agents = await listAgents(client);
      if (agents === null) {
        throw new ThousandEyesCliError('Unable to list agents.');
      }

      outputList(agents.map(flattenAgent), {
        format,
        columns: ['id', 'name', 'type', 'location', 'country'],
        idField: 'id',
      });
    });

  cmd
    .command('first')
    .description('Print the ID of the first agent in listing order')
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      const client = new ThousandEyesClient(opts.token, { debug: opts.debug });

      const agentId = await resolveFirstAgent(client);
      if (agentId === null) {
        throw new ThousandEyesNotFoundError('No valid agent available.');
      }
      outputId(agentId, detectFormat(opts));
    });
}
