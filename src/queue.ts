import { randomUUID } from 'crypto';
import { getLogger } from './logger.js';
import { recordScan, type Metrics } from './metrics.js';
import { isScanFailure, type ScanResult } from './orchestrator.js';
import type { Issue } from './issue.js';
import { NoopStore, type ScanStore } from './store.js';
import { getErrorMessage } from './types/errors.js';

export type TaskState = 'pending' | 'running' | 'success' | 'failure';

export type ScanPayload = {
  repoUrl: string;
  totalIssues: number;
  /** Set when the store kept a record of the scan */
  scanId?: string;
  issues: Issue[];
};

export type TaskStatus = {
  taskId: string;
  repoUrl: string;
  state: TaskState;
  result?: ScanPayload;
  error?: string;
  submittedAt: string;
  finishedAt?: string;
};

export type ScanQueueOptions = {
  scan: (repoUrl: string) => Promise<ScanResult>;
  store?: ScanStore;
  metrics?: Metrics;
  /** Finished tasks kept for status lookups before the oldest are dropped */
  maxRetained?: number;
};

/**
 * In-process job queue: scans run one at a time in submission order, callers
 * poll by task id.
 */
export class ScanQueue {
  private readonly log = getLogger('queue');
  private readonly tasks = new Map<string, TaskStatus>();
  private readonly store: ScanStore;
  private readonly maxRetained: number;
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly opts: ScanQueueOptions) {
    this.store = opts.store ?? new NoopStore();
    this.maxRetained = opts.maxRetained ?? 1000;
  }

  submit(repoUrl: string): string {
    const taskId = randomUUID();
    this.tasks.set(taskId, { taskId, repoUrl, state: 'pending', submittedAt: new Date().toISOString() });
    this.chain = this.chain.then(() => this.execute(taskId));
    this.log.info(`task ${taskId} queued`, { repoUrl });
    return taskId;
  }

  status(taskId: string): TaskStatus | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  /** Resolves once every task submitted so far has finished. */
  idle(): Promise<void> {
    return this.chain;
  }

  private async execute(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) return;
    task.state = 'running';
    const started = Date.now();
    let scanned: ScanResult;
    try {
      scanned = await this.opts.scan(task.repoUrl);
    } catch (err) {
      // runScan resolves with failures; this is a bug in the runner
      this.finish(task, 'failure', { error: `Scan failed: ${getErrorMessage(err)}` });
      return;
    }
    const result = scanned;
    if (this.opts.metrics) recordScan(this.opts.metrics, result, Date.now() - started);

    if (isScanFailure(result)) {
      await this.bestEffort('persist failed scan', () =>
        this.store.persist({ repoUrl: task.repoUrl, status: 'failed', totalIssues: 0, errorMessage: result.error }),
      );
      this.finish(task, 'failure', { error: `Scan failed: ${result.error}` });
      return;
    }

    const scanId = await this.bestEffort('persist scan', () =>
      this.store.persist({ repoUrl: task.repoUrl, status: 'completed', totalIssues: result.totalIssues }),
    );
    if (scanId) {
      await this.bestEffort('archive issues', () => this.store.archive(scanId, result.issues));
    }
    const payload: ScanPayload = { repoUrl: task.repoUrl, totalIssues: result.totalIssues, issues: result.issues };
    if (scanId) payload.scanId = scanId;
    this.finish(task, 'success', { result: payload });
  }

  private async bestEffort<T>(what: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (err) {
      this.log.error(`store: ${what} failed`, { error: getErrorMessage(err) });
      return undefined;
    }
  }

  private finish(task: TaskStatus, state: 'success' | 'failure', fields: Pick<TaskStatus, 'result' | 'error'>): void {
    Object.assign(task, fields, { state, finishedAt: new Date().toISOString() });
    this.log.info(`task ${task.taskId} ${state}`);
    this.evict();
  }

  private evict(): void {
    const finished = [...this.tasks.values()].filter((t) => t.state === 'success' || t.state === 'failure');
    for (const t of finished.slice(0, Math.max(0, finished.length - this.maxRetained))) {
      this.tasks.delete(t.taskId);
    }
  }
}
