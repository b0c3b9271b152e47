import fs from 'node:fs/promises';
import { formatSeconds, maskSecrets, withRetry } from './errorHandling.js';
import { defaultExec, type ExecFn } from './exec.js';
import { getLogger } from './logger.js';
import { ScanError, getErrorMessage, isExecError } from './types/errors.js';

/**
 * Git integration: repository fetch for the orchestrator and history reads for checks
 */

const HISTORY_MAX_BUFFER = 256 * 1024 * 1024;

/**
 * Paths touched by each commit, one per line, blank lines between commits.
 * The checkout may belong to another uid (read-only mount), hence safe.directory.
 */
export async function gitLogNames(repoPath: string, exec: ExecFn = defaultExec, gitBin = 'git'): Promise<string> {
  const { stdout } = await exec(
    gitBin,
    ['-c', 'safe.directory=*', '-C', repoPath, 'log', '--pretty=format:', '--name-only'],
    { maxBuffer: HISTORY_MAX_BUFFER },
  );
  return stdout;
}

export type CloneOptions = {
  /** Full history unless explicitly false; history-based checks depend on it. */
  fullHistory?: boolean;
  timeoutMs?: number;
};

export interface RepositoryFetcher {
  /** Clones `url` into the existing, empty directory `dest`. Throws ScanError on failure. */
  clone(url: string, dest: string, opts?: CloneOptions): Promise<void>;
}

export type GitCliFetcherOptions = {
  gitBin?: string;
  exec?: ExecFn;
  /** Extra attempts after a transient network failure */
  retries?: number;
  retryDelayMs?: number;
};

export class GitCliFetcher implements RepositoryFetcher {
  private readonly log = getLogger('git');
  private readonly gitBin: string;
  private readonly exec: ExecFn;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(opts: GitCliFetcherOptions = {}) {
    this.gitBin = opts.gitBin ?? 'git';
    this.exec = opts.exec ?? defaultExec;
    this.retries = opts.retries ?? 1;
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
  }

  async clone(url: string, dest: string, opts: CloneOptions = {}): Promise<void> {
    const args = ['clone', '--quiet'];
    if (opts.fullHistory === false) args.push('--depth', '1');
    args.push('--', url, dest);
    const env: NodeJS.ProcessEnv = { ...process.env, GIT_TERMINAL_PROMPT: '0' };

    try {
      await withRetry(
        () => this.exec(this.gitBin, args, { env, timeout: opts.timeoutMs, maxBuffer: 16 * 1024 * 1024 }),
        {
          maxRetries: this.retries,
          initialDelayMs: this.retryDelayMs,
          onRetry: (err, attempt) => {
            this.log.warn(`clone attempt ${attempt} failed, retrying`, { error: maskSecrets(err.message) });
          },
        },
      );
    } catch (err) {
      // git leaves a partial checkout behind; the next stage must not see it
      await fs.rm(dest, { recursive: true, force: true }).then(() => fs.mkdir(dest, { recursive: true }));
      if (isExecError(err) && err.killed) {
        throw new ScanError('FETCH_TIMEOUT', `repository fetch timed out after ${formatSeconds(opts.timeoutMs ?? 0)}`, {
          cause: err,
        });
      }
      const diagnostic = isExecError(err) && err.stderr ? err.stderr : getErrorMessage(err);
      throw new ScanError('FETCH_ERROR', `git clone failed for ${maskSecrets(url)}`, {
        logs: maskSecrets(diagnostic.trim()),
        cause: err,
      });
    }
  }
}
