import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  CONTAINER_OUTPUT_DIR,
  CONTAINER_REPO_PATH,
  DEFAULT_SCANNER_IMAGE,
  RESULTS_FILE,
  WORKSPACE_OUTPUT_DIR,
  WORKSPACE_REPO_DIR,
} from './constants.js';
import type { ContainerHandle, ContainerRuntime } from './container.js';
import { formatSeconds, maskSecrets, stage } from './errorHandling.js';
import type { RepositoryFetcher } from './git.js';
import { parseIssues, type Issue } from './issue.js';
import { getLogger, type Logger } from './logger.js';
import { ScanError, TimeoutError, getErrorMessage, isNodeError, isScanError, type ScanErrorCode } from './types/errors.js';

export type JobState = 'CREATED' | 'FETCHING' | 'RUNNING' | 'SUCCEEDED' | 'TIMED_OUT' | 'FAILED' | 'TORN_DOWN';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  CREATED: ['FETCHING', 'FAILED'],
  FETCHING: ['RUNNING', 'FAILED'],
  RUNNING: ['SUCCEEDED', 'TIMED_OUT', 'FAILED'],
  SUCCEEDED: ['TORN_DOWN'],
  TIMED_OUT: ['TORN_DOWN'],
  FAILED: ['TORN_DOWN'],
  TORN_DOWN: [],
};

/** One execution of one repository URL. Only the orchestrator mutates it. */
export class ScanJob {
  readonly jobId: string;
  readonly workspaceDir: string;
  readonly repoDir: string;
  readonly outputDir: string;
  exitCode?: number;
  logs?: string;
  private current: JobState = 'CREATED';

  constructor(
    workRoot: string,
    jobId: string,
    private readonly onStateChange?: (state: JobState, job: ScanJob) => void,
  ) {
    this.jobId = jobId;
    this.workspaceDir = path.join(workRoot, jobId);
    this.repoDir = path.join(this.workspaceDir, WORKSPACE_REPO_DIR);
    this.outputDir = path.join(this.workspaceDir, WORKSPACE_OUTPUT_DIR);
  }

  get state(): JobState {
    return this.current;
  }

  transition(next: JobState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`invalid job transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.onStateChange?.(next, this);
  }
}

export type ScanSuccess = {
  jobId: string;
  totalIssues: number;
  issues: Issue[];
  exitCode: number;
  /** Non-fatal signals, e.g. a non-zero scanner exit code alongside a valid artifact */
  warnings: string[];
};

export type ScanFailure = {
  jobId: string;
  error: string;
  code: ScanErrorCode;
  logs?: string;
};

export type ScanResult = ScanSuccess | ScanFailure;

export function isScanFailure(result: ScanResult): result is ScanFailure {
  return 'error' in result;
}

export type ScanOptions = {
  runtime: ContainerRuntime;
  fetcher: RepositoryFetcher;
  image?: string;
  /** Bound on the scanner container's run time */
  timeoutMs?: number;
  /** Bound on the repository fetch */
  fetchTimeoutMs?: number;
  workRoot?: string;
  jobId?: string;
  logger?: Logger;
  onStateChange?: (state: JobState, job: ScanJob) => void;
};

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_FETCH_TIMEOUT_MS = 300_000;

/**
 * Turns a repository URL into a ScanResult: fetch into a job-scoped
 * workspace, run the scanner container against it with a bounded wait, read
 * the results artifact. Whatever happens, the workspace and the container
 * are gone when this resolves; it never rejects.
 */
export async function runScan(repoUrl: string, opts: ScanOptions): Promise<ScanResult> {
  const log = opts.logger ?? getLogger('orchestrator');
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const job = new ScanJob(opts.workRoot ?? os.tmpdir(), opts.jobId ?? randomUUID(), opts.onStateChange);
  const meta = { jobId: job.jobId };
  let handle: ContainerHandle | undefined;

  log.info(`scan started for ${maskSecrets(repoUrl)}`, meta);
  try {
    await stage('INFRA_ERROR', 'could not create workspace', async () => {
      await fs.mkdir(job.repoDir, { recursive: true });
      await fs.mkdir(job.outputDir, { recursive: true });
    });

    job.transition('FETCHING');
    await stage('FETCH_ERROR', 'repository fetch failed', () =>
      opts.fetcher.clone(repoUrl, job.repoDir, {
        fullHistory: true,
        timeoutMs: opts.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      }),
    );

    job.transition('RUNNING');
    const started = await stage('INFRA_ERROR', 'could not start scanner container', () =>
      opts.runtime.run({
        image: opts.image ?? DEFAULT_SCANNER_IMAGE,
        mounts: [
          { source: job.repoDir, target: CONTAINER_REPO_PATH, readOnly: true },
          { source: job.outputDir, target: CONTAINER_OUTPUT_DIR, readOnly: false },
        ],
        labels: { 'debtscan.job': job.jobId },
      }),
    );
    handle = started;
    log.info(`container ${started.id} started`, meta);

    job.exitCode = await waitForExit(opts.runtime, started, timeoutMs, job, log);
    job.logs = await captureLogs(opts.runtime, started, log);

    const issues = await readArtifact(job);
    const warnings: string[] = [];
    if (job.exitCode !== 0) {
      const warning = `scanner exited with code ${job.exitCode}`;
      log.warn(warning, meta);
      warnings.push(warning);
    }
    job.transition('SUCCEEDED');
    log.info(`scan complete, ${issues.length} issues`, meta);
    return { jobId: job.jobId, totalIssues: issues.length, issues, exitCode: job.exitCode, warnings };
  } catch (err) {
    const failure = toFailure(job, err);
    job.transition(failure.code === 'TIMEOUT' ? 'TIMED_OUT' : 'FAILED');
    log.error(`scan failed: ${failure.error}`, { ...meta, code: failure.code });
    return failure;
  } finally {
    await teardown(job, opts.runtime, handle, log);
    job.transition('TORN_DOWN');
  }
}

async function waitForExit(
  runtime: ContainerRuntime,
  handle: ContainerHandle,
  timeoutMs: number,
  job: ScanJob,
  log: Logger,
): Promise<number> {
  const message = `scan timed out after ${formatSeconds(timeoutMs)}`;
  try {
    return await runtime.wait(handle, timeoutMs, message);
  } catch (err) {
    if (err instanceof TimeoutError) {
      // logs so far help explain what hung
      job.logs = await captureLogs(runtime, handle, log);
      throw new ScanError('TIMEOUT', message, { logs: job.logs || undefined, cause: err });
    }
    throw new ScanError('INFRA_ERROR', `waiting for scanner container failed: ${getErrorMessage(err)}`, { cause: err });
  }
}

async function captureLogs(runtime: ContainerRuntime, handle: ContainerHandle, log: Logger): Promise<string> {
  try {
    return await runtime.logs(handle);
  } catch (err) {
    log.warn('could not capture container logs', { error: getErrorMessage(err) });
    return '';
  }
}

async function readArtifact(job: ScanJob): Promise<Issue[]> {
  const artifact = path.join(job.outputDir, RESULTS_FILE);
  const logs = job.logs || undefined;
  let text: string;
  try {
    text = await fs.readFile(artifact, 'utf8');
  } catch (err) {
    const message = isNodeError(err) && err.code === 'ENOENT' ? 'results not found' : `results unreadable: ${getErrorMessage(err)}`;
    throw new ScanError('MISSING_OUTPUT', message, { logs, cause: err });
  }
  try {
    return parseIssues(text);
  } catch (err) {
    throw new ScanError('MALFORMED_OUTPUT', `results could not be parsed: ${getErrorMessage(err)}`, { logs, cause: err });
  }
}

function toFailure(job: ScanJob, err: unknown): ScanFailure {
  if (isScanError(err)) {
    const failure: ScanFailure = { jobId: job.jobId, error: err.message, code: err.code };
    if (err.logs) failure.logs = err.logs;
    return failure;
  }
  return { jobId: job.jobId, error: maskSecrets(getErrorMessage(err)), code: 'INFRA_ERROR' };
}

/**
 * Removes the workspace, stops the container if it still runs, removes the
 * container. Each step runs regardless of the others; failures are logged.
 */
async function teardown(
  job: ScanJob,
  runtime: ContainerRuntime,
  handle: ContainerHandle | undefined,
  log: Logger,
): Promise<void> {
  const meta = { jobId: job.jobId };
  try {
    await fs.rm(job.workspaceDir, { recursive: true, force: true });
  } catch (err) {
    log.error('teardown: could not remove workspace', { ...meta, error: getErrorMessage(err) });
  }
  if (!handle) return;
  try {
    if (await runtime.isRunning(handle)) {
      await runtime.stop(handle);
    }
  } catch (err) {
    log.error(`teardown: could not stop container ${handle.id}`, { ...meta, error: getErrorMessage(err) });
  }
  try {
    await runtime.remove(handle);
  } catch (err) {
    log.error(`teardown: could not remove container ${handle.id}`, { ...meta, error: getErrorMessage(err) });
  }
}
