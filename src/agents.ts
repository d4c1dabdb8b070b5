import chalk from 'chalk';
import type { ThousandEyesClient } from './client.js';
import { describeFailure } from './errors.js';
import type { Agent } from './types.js';
import { listField, parseAgent } from './values.js';

async function fetchAgentListing(client: ThousandEyesClient): Promise<unknown[] | null> {
  try {
    const res = await client.get('/agents');
    return listField(res.data, 'agents');
  } catch (err) {
    console.error(chalk.red(`Failed to fetch agents: ${describeFailure(err)}`));
    return null;
  }
}

/** Lists the account's agents in API order, skipping entries without a usable ID. */
export async function listAgents(client: ThousandEyesClient): Promise<Agent[] | null> {
  const listing = await fetchAgentListing(client);
  if (listing === null) return null;

  const agents: Agent[] = [];
  for (const raw of listing) {
    const agent = parseAgent(raw);
    if (agent) agents.push(agent);
  }
  return agents;
}

/**
 * Picks the entry at position 0 of the listing. No filtering by region, type
 * or health is applied, and a malformed first entry is not skipped.
 */
export async function resolveFirstAgent(client: ThousandEyesClient): Promise<number | null> {
  const listing = await fetchAgentListing(client);
  if (listing === null) return null;

  if (listing.length === 0) {
    console.error(chalk.yellow('No agents found in your account.'));
    return null;
  }

  const agent = parseAgent(listing[0]);
  if (!agent) {
    console.error(chalk.red(`First agent has no usable ID: ${JSON.stringify(listing[0])}`));
    return null;
  }

  console.error(chalk.cyan(`Using agent: ${agent.agentName} (ID: ${agent.agentId})`));
  return agent.agentId;
}
