import chalk from 'chalk';
import type { ThousandEyesClient } from './client.js';
import { DEFAULT_INTERVAL } from './config.js';
import { describeFailure } from './errors.js';
import type { HttpServerTest } from './types.js';
import { isObject, listField, parseTest, toInteger, toText } from './values.js';

const TESTS_PATH = '/tests/http-server';

export interface CreateTestPayload {
  testName: string;
  url: string;
  interval: number;
  enabled: boolean;
  agents: Array<{ agentId: number }>;
}

async function fetchTestListing(client: ThousandEyesClient): Promise<unknown[] | null> {
  try {
    const res = await client.get(TESTS_PATH);
    return listField(res.data, 'tests');
  } catch (err) {
    console.error(chalk.red(`Failed to retrieve tests: ${describeFailure(err)}`));
    return null;
  }
}

export async function listTests(client: ThousandEyesClient): Promise<HttpServerTest[] | null> {
  const listing = await fetchTestListing(client);
  if (listing === null) return null;

  const tests: HttpServerTest[] = [];
  for (const raw of listing) {
    const test = parseTest(raw);
    if (test) tests.push(test);
  }
  return tests;
}

/**
 * Case-sensitive exact match on the test name; the first match in listing
 * order wins, even when its ID turns out to be unusable. A failed listing and
 * a missing test both resolve to `null`; only the former is logged.
 */
export async function findTestByName(client: ThousandEyesClient, name: string): Promise<number | null> {
  const listing = await fetchTestListing(client);
  if (listing === null) return null;

  const match = listing.find((raw) => isObject(raw) && toText(raw.testName) === name);
  if (match === undefined) return null;

  const testId = isObject(match) ? toInteger(match.testId) : null;
  if (testId === null) {
    console.error(chalk.red(`Test '${name}' has no usable ID: ${JSON.stringify(match)}`));
  }
  return testId;
}

export function buildTestPayload(
  name: string,
  target: string,
  agentId: number,
  interval: number = DEFAULT_INTERVAL
): CreateTestPayload {
  return {
    testName: name,
    url: target,
    interval,
    enabled: true,
    agents: [{ agentId }],
  };
}

/** Creates an enabled HTTP-server test bound to one agent. Only a 201 counts as success. */
export async function createTest(
  client: ThousandEyesClient,
  name: string,
  target: string,
  agentId: number,
  interval: number = DEFAULT_INTERVAL
): Promise<number | null> {
  try {
    const res = await client.post(TESTS_PATH, buildTestPayload(name, target, agentId, interval));
    const testId = res.status === 201 && isObject(res.data) ? toInteger(res.data.testId) : null;
    if (testId === null) {
      console.error(chalk.red(`Error creating test: ${res.status} - ${res.text}`));
      return null;
    }
    console.error(chalk.green(`Created test '${name}' (ID: ${testId})`));
    return testId;
  } catch (err) {
    console.error(chalk.red(`Error creating test: ${describeFailure(err)}`));
    return null;
  }
}
