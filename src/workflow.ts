import type { ThousandEyesClient } from './client.js';
import type { RunConfig } from './config.js';
import { ThousandEyesWorkflowError } from './errors.js';
import { resolveFirstAgent } from './agents.js';
import { createTest, findTestByName } from './tests.js';
import { analyzeResults, fetchResults } from './results.js';
import { saveReport } from './report.js';
import type { ResultsPayload } from './types.js';

export interface WorkflowOptions {
  outDir?: string;
}

export interface WorkflowOutcome {
  agentId: number;
  testId: number;
  created: boolean;
  results: ResultsPayload;
  reportPath: string;
}

export async function runWorkflow(
  client: ThousandEyesClient,
  config: RunConfig,
  options: WorkflowOptions = {}
): Promise<WorkflowOutcome> {
  const agentId = await resolveFirstAgent(client);
  if (agentId === null) {
    throw new ThousandEyesWorkflowError('No valid agent available. Exiting.');
  }

  let testId = await findTestByName(client, config.testName);
  const created = testId === null;
  if (testId === null) {
    testId = await createTest(client, config.testName, config.target, agentId, config.interval);
  }
  if (testId === null) {
    throw new ThousandEyesWorkflowError(`Unable to find or create test '${config.testName}'.`);
  }

  const results = await fetchResults(client, testId);
  if (results === null) {
    throw new ThousandEyesWorkflowError(`Unable to fetch results for test ID ${testId}.`);
  }

  analyzeResults(results, config);
  const reportPath = saveReport(config.testName, results, options.outDir);

  return { agentId, testId, created, results, reportPath };
}
