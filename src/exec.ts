import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type ExecOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  maxBuffer?: number;
  signal?: AbortSignal;
};

export type ExecResult = { stdout: string; stderr: string };

/** execFile signature shared by the git and docker drivers; tests substitute their own. */
export type ExecFn = (file: string, args: string[], opts: ExecOptions) => Promise<ExecResult>;

export const defaultExec: ExecFn = async (file, args, opts) => {
  const { stdout, stderr } = await execFileAsync(file, args, { ...opts, encoding: 'utf8' });
  return { stdout, stderr };
};
