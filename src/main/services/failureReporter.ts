/**
 * Failure Reporter Service
 *
 * Renders the failures of a batch run into a plain-text report that can be
 * read by a person and used to retry the failed URLs.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BatchResult, FailureRecord } from '../../shared/types';

/** Default report location, relative to the working directory */
const DEFAULT_REPORT_PATH = 'failed_downloads.txt';

const HEADER_RULE = '='.repeat(60);
const RECORD_RULE = '-'.repeat(60);

function renderRecord(record: FailureRecord, index: number): string[] {
  return [
    `${index}. URL: ${record.url}`,
    `   Destination: ${record.destination}`,
    `   Step: ${record.step}`,
    `   Error: ${record.error}`,
    `   Time: ${record.timestamp.toISOString()}`,
    RECORD_RULE,
  ];
}

/**
 * Renders the failure report text, records in processing order.
 */
export function renderFailureReport(result: BatchResult, generatedAt: Date): string {
  const lines = [
    `Failure report generated ${generatedAt.toISOString()} - ${result.failures.length} failed`,
    HEADER_RULE,
  ];
  result.failures.forEach((record, i) => {
    lines.push(...renderRecord(record, i + 1));
  });
  return lines.join('\n') + '\n';
}

/**
 * Writes the failure report when the batch had failures, replacing any
 * report from an earlier run.
 *
 * @returns The path written, or null when there was nothing to report
 */
export async function writeFailureReport(
  result: BatchResult,
  reportPath: string = DEFAULT_REPORT_PATH,
  now: Date = new Date(),
): Promise<string | null> {
  if (result.failed === 0 || result.failures.length === 0) {
    return null;
  }

  const dir = path.dirname(reportPath);
  if (dir !== '.') {
    await fs.promises.mkdir(dir, { recursive: true });
  }
  await fs.promises.writeFile(reportPath, renderFailureReport(result, now), 'utf-8');
  return reportPath;
}
