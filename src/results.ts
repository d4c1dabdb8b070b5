import chalk from 'chalk';
import type { ThousandEyesClient } from './client.js';
import type { RunConfig } from './config.js';
import { describeFailure } from './errors.js';
import type { ResultEntry, ResultsPayload } from './types.js';
import { isObject, listField, parseResultEntry } from './values.js';

export const MISSING = 'N/A';
export const NO_RESULTS_MESSAGE = 'No HTTP Server test results available.';

const RULE_WIDTH = 46;
const HEADER = '========== HTTP SERVER TEST RESULTS ==========';
const LABEL_WIDTH = 14;

export type SummaryContext = Pick<RunConfig, 'testName' | 'target'>;

export async function fetchResults(client: ThousandEyesClient, testId: number): Promise<ResultsPayload | null> {
  try {
    const res = await client.get(`/test-results/${encodeURIComponent(String(testId))}/http-server`);
    const data = res.data;
    if (!isObject(data) && !Array.isArray(data)) {
      console.error(chalk.red(`Failed to retrieve test results: ${res.status} - unexpected body ${res.text || '<empty>'}`));
      return null;
    }
    console.error(chalk.green(`Fetched test results for test ID ${testId}`));
    return data;
  } catch (err) {
    console.error(chalk.red(`Failed to retrieve test results: ${describeFailure(err)}`));
    return null;
  }
}

/** Most recent entry of a results payload, or `null` when it has none. */
export function latestEntry(results: ResultsPayload): ResultEntry | null {
  const entries = listField(results, 'results');
  return entries.length > 0 ? parseResultEntry(entries[0]) : null;
}

function field(label: string, value: string): string {
  return ` ${label.padEnd(LABEL_WIDTH)}: ${value}`;
}

function withUnit(value: number | null, unit: string): string {
  return value === null ? MISSING : `${value} ${unit}`;
}

function text(value: string | number | null): string {
  return value === null ? MISSING : String(value);
}

function agentLabel(entry: ResultEntry): string {
  if (entry.agentName === null && entry.agentId === null) return MISSING;
  return `${text(entry.agentName)} (ID: ${text(entry.agentId)})`;
}

export function formatSummary(entry: ResultEntry, context: SummaryContext): string[] {
  return [
    HEADER,
    field('Test Name', context.testName),
    field('Agent', agentLabel(entry)),
    field('Test Date', text(entry.date)),
    field('Target URL', context.target),
    '-'.repeat(RULE_WIDTH),
    field('Response Code', text(entry.responseCode)),
    field('Response Time', withUnit(entry.responseTime, 'ms')),
    field('Redirect Time', withUnit(entry.redirectTime, 'ms')),
    field('DNS Time', withUnit(entry.dnsTime, 'ms')),
    field('SSL Time', withUnit(entry.sslTime, 'ms')),
    field('Connect Time', withUnit(entry.connectTime, 'ms')),
    field('Wait Time', withUnit(entry.waitTime, 'ms')),
    field('Receive Time', withUnit(entry.receiveTime, 'ms')),
    field('Total Time', withUnit(entry.totalTime, 'ms')),
    field('Throughput', withUnit(entry.throughput, 'bytes/sec')),
    field('Wire Size', withUnit(entry.wireSize, 'bytes')),
    field('Server IP', text(entry.serverIp)),
    field('SSL Cipher', text(entry.sslCipher)),
    field('SSL Version', text(entry.sslVersion)),
    field('Health Score', entry.healthScore === null ? MISSING : entry.healthScore.toFixed(4)),
    '='.repeat(RULE_WIDTH),
  ];
}

/**
 * Prints the summary of the most recent result. Name and target are taken from
 * the run configuration, measurements from the entry.
 */
export function analyzeResults(results: ResultsPayload, context: SummaryContext): void {
  const entry = latestEntry(results);
  if (!entry) {
    console.log(NO_RESULTS_MESSAGE);
    return;
  }
  for (const line of formatSummary(entry, context)) {
    console.log(line);
  }
}
