import fs from 'fs/promises';
import path from 'path';
import type { Check } from './checks/registry.js';
import { normalizeIssue, type Issue } from './issue.js';
import { getLogger, type Logger } from './logger.js';
import { ScanError, getErrorMessage } from './types/errors.js';

export type CheckOutcome = {
  id: string;
  ok: boolean;
  issues: number;
  durationMs: number;
  error?: string;
};

export type EngineReport = {
  issues: Issue[];
  outcomes: CheckOutcome[];
};

export type EngineOptions = {
  checks: readonly Check[];
  logger?: Logger;
};

/**
 * Runs each check in order against `repoPath` and concatenates their issues.
 * A check that throws is logged and contributes nothing; the others still run.
 * Issues are not deduplicated.
 */
export async function runAllChecks(repoPath: string, opts: EngineOptions): Promise<EngineReport> {
  const log = opts.logger ?? getLogger('engine');
  const issues: Issue[] = [];
  const outcomes: CheckOutcome[] = [];

  for (const check of opts.checks) {
    const started = Date.now();
    log.info(`running check ${check.id}`);
    let raw: unknown[];
    try {
      raw = await check.run(repoPath);
    } catch (err) {
      const error = getErrorMessage(err);
      log.error(`check ${check.id} failed`, { check: check.id, error });
      outcomes.push({ id: check.id, ok: false, issues: 0, durationMs: Date.now() - started, error });
      continue;
    }

    let kept = 0;
    for (const r of Array.isArray(raw) ? raw : []) {
      const issue = normalizeIssue(r);
      if (!issue) {
        log.warn(`check ${check.id} produced an invalid issue, dropped`);
        continue;
      }
      issues.push(issue);
      kept++;
    }
    outcomes.push({ id: check.id, ok: true, issues: kept, durationMs: Date.now() - started });
  }

  log.info(`checks complete, ${issues.length} issues total`);
  return { issues, outcomes };
}

/** Writes the results artifact: a JSON array of issues with exactly their five fields. */
export async function writeArtifact(issues: readonly Issue[], outputPath: string): Promise<void> {
  const body = issues.map(({ type, file, line, code, message }) => ({ type, file, line, code, message }));
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(body, null, 2) + '\n', 'utf8');
  } catch (err) {
    throw new ScanError('ARTIFACT_WRITE_ERROR', `could not write results to ${outputPath}: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }
}

export type EngineRunOptions = EngineOptions & {
  repoPath: string;
  outputPath: string;
};

/**
 * Container entry logic: run every check, write the artifact. Returns the
 * process exit code; only an artifact write failure is non-zero.
 */
export async function runEngine(opts: EngineRunOptions): Promise<number> {
  const log = opts.logger ?? getLogger('engine');
  log.info(`running ${opts.checks.length} checks against ${opts.repoPath}`);
  const { issues } = await runAllChecks(opts.repoPath, opts);
  try {
    await writeArtifact(issues, opts.outputPath);
  } catch (err) {
    log.error(getErrorMessage(err));
    return 1;
  }
  log.info(`wrote ${issues.length} issues to ${opts.outputPath}`);
  return 0;
}
