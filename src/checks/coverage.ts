import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { FILE_LEVEL_LINE, makeIssue, type Issue } from '../issue.js';
import { getLogger } from '../logger.js';
import { getErrorMessage } from '../types/errors.js';
import { registerCheck, type Check } from './registry.js';

const log = getLogger('checks.coverage');

export const COVERAGE_FILE = 'coverage.json';
export const COVERAGE_THRESHOLD = 80;
const MAX_REPORT_BYTES = 64 * 1024 * 1024;

// coverage.py `coverage json` report; only the fields read here
const CoverageReportSchema = z.object({
  meta: z.unknown().refine((v) => v !== undefined, 'meta is required'),
  totals: z.object({
    percent_covered: z.number().finite(),
  }),
});

export function readCoveragePercent(text: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = CoverageReportSchema.safeParse(data);
  return parsed.success ? parsed.data.totals.percent_covered : undefined;
}

export const coverageCheck: Check = {
  id: 'coverage',
  kind: 'coverage',
  description: `aggregate test coverage below ${COVERAGE_THRESHOLD}%`,
  async run(repoPath: string): Promise<Issue[]> {
    const file = path.join(repoPath, COVERAGE_FILE);
    let text: string;
    try {
      // committed symlinks are not followed
      const st = await fs.lstat(file);
      if (!st.isFile() || st.size > MAX_REPORT_BYTES) {
        log.warn(`${COVERAGE_FILE} is not a regular file under ${MAX_REPORT_BYTES} bytes, skipped`);
        return [];
      }
      text = await fs.readFile(file, 'utf8');
    } catch (err) {
      log.info(`no ${COVERAGE_FILE} found`, { error: getErrorMessage(err) });
      return [];
    }
    const percent = readCoveragePercent(text);
    if (percent === undefined) {
      log.warn(`could not read a coverage total from ${COVERAGE_FILE}`);
      return [];
    }
    if (percent >= COVERAGE_THRESHOLD) return [];
    return [
      makeIssue(
        'coverage',
        COVERAGE_FILE,
        FILE_LEVEL_LINE,
        'LOW_COVERAGE',
        `Test coverage is ${percent.toFixed(2)}%, which is below the ${COVERAGE_THRESHOLD}% threshold.`,
      ),
    ];
  },
};

registerCheck(coverageCheck);
