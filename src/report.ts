import { writeFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import type { ResultsPayload } from './types.js';

export function reportFileName(testName: string): string {
  return `${testName}_report.json`;
}

/**
 * Writes the full results payload into `dir`, replacing any previous report
 * for the same test. Write errors propagate.
 */
export function saveReport(testName: string, results: ResultsPayload, dir: string = process.cwd()): string {
  const path = join(dir, reportFileName(testName));
  writeFileSync(path, JSON.stringify(results, null, 2));
  console.error(chalk.green(`Report saved to: ${path}`));
  return path;
}
