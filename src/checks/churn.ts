import fs from 'fs/promises';
import path from 'path';
import { gitLogNames } from '../git.js';
import { FILE_LEVEL_LINE, makeIssue, type Issue } from '../issue.js';
import { getLogger } from '../logger.js';
import { getErrorMessage } from '../types/errors.js';
import { registerCheck, type Check } from './registry.js';

const log = getLogger('checks.churn');

export const CHURN_TOP_N = 10;
export const CHURN_MIN_COMMITS = 5;

/** Returns `git log --name-only` output for the repository. */
export type HistoryReader = (repoPath: string) => Promise<string>;

/**
 * Counts how often each path appears in the log, keeps the most-touched
 * `CHURN_TOP_N` and reports those with more than `CHURN_MIN_COMMITS`.
 * Ties keep the order in which paths first appear in the log.
 */
export function rankChurn(logOutput: string): Array<{ file: string; commits: number }> {
  const counts = new Map<string, number>();
  for (const raw of logOutput.split('\n')) {
    const file = raw.trim();
    if (!file) continue;
    counts.set(file, (counts.get(file) ?? 0) + 1);
  }
  return Array.from(counts, ([file, commits]) => ({ file, commits }))
    .sort((a, b) => b.commits - a.commits)
    .slice(0, CHURN_TOP_N)
    .filter((e) => e.commits > CHURN_MIN_COMMITS);
}

export function createChurnCheck(readHistory: HistoryReader = gitLogNames): Check {
  return {
    id: 'churn',
    kind: 'churn',
    description: 'files changed in many commits',
    async run(repoPath: string): Promise<Issue[]> {
      // no version-control metadata, nothing to rank
      try {
        await fs.stat(path.join(repoPath, '.git'));
      } catch {
        log.info('no .git directory found, skipping history analysis');
        return [];
      }
      let output: string;
      try {
        output = await readHistory(repoPath);
      } catch (err) {
        log.warn('git log failed', { error: getErrorMessage(err) });
        return [];
      }
      const issues = rankChurn(output).map(({ file, commits }) =>
        makeIssue('churn', file, FILE_LEVEL_LINE, 'HIGH_CHURN', `File has a high churn rate with ${commits} commits.`),
      );
      log.info(`found ${issues.length} issues`);
      return issues;
    },
  };
}

export const churnCheck = registerCheck(createChurnCheck());
