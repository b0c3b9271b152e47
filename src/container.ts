import { withTimeout } from './errorHandling.js';
import { defaultExec, type ExecFn } from './exec.js';

export type Mount = {
  source: string;
  target: string;
  readOnly: boolean;
};

export type ContainerSpec = {
  image: string;
  mounts: Mount[];
  /** Extra environment passed to the container */
  env?: Record<string, string>;
  labels?: Record<string, string>;
};

export type ContainerHandle = { id: string };

/**
 * Boundary to whatever starts isolated scanner containers. Every call may
 * throw; the orchestrator maps failures to job outcomes.
 */
export interface ContainerRuntime {
  /** Starts the container detached and returns immediately. */
  run(spec: ContainerSpec): Promise<ContainerHandle>;
  /** Resolves with the exit code; rejects with TimeoutError after `timeoutMs`. */
  wait(handle: ContainerHandle, timeoutMs: number, timeoutMessage?: string): Promise<number>;
  logs(handle: ContainerHandle): Promise<string>;
  isRunning(handle: ContainerHandle): Promise<boolean>;
  stop(handle: ContainerHandle): Promise<void>;
  remove(handle: ContainerHandle): Promise<void>;
}

export type DockerCliRuntimeOptions = {
  dockerBin?: string;
  exec?: ExecFn;
  /** Network mode for scanner containers; checks never need one. */
  network?: string;
};

const LOG_MAX_BUFFER = 32 * 1024 * 1024;

// --mount takes CSV fields; quote any field holding a comma or quote
function csvField(field: string): string {
  return /[",]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

function mountArg(m: Mount): string {
  const fields = ['type=bind', `source=${m.source}`, `target=${m.target}`];
  if (m.readOnly) fields.push('readonly');
  return fields.map(csvField).join(',');
}

/** ContainerRuntime backed by the `docker` command-line client. */
export class DockerCliRuntime implements ContainerRuntime {
  private readonly dockerBin: string;
  private readonly exec: ExecFn;
  private readonly network: string;

  constructor(opts: DockerCliRuntimeOptions = {}) {
    this.dockerBin = opts.dockerBin ?? 'docker';
    this.exec = opts.exec ?? defaultExec;
    this.network = opts.network ?? 'none';
  }

  static runArgs(spec: ContainerSpec, network = 'none'): string[] {
    // --init: the worker is not PID 1 and receives signals
    const args = ['run', '-d', '--init', '--network', network];
    for (const m of spec.mounts) {
      args.push('--mount', mountArg(m));
    }
    for (const [k, v] of Object.entries(spec.env ?? {})) {
      args.push('-e', `${k}=${v}`);
    }
    for (const [k, v] of Object.entries(spec.labels ?? {})) {
      args.push('--label', `${k}=${v}`);
    }
    args.push(spec.image);
    return args;
  }

  async run(spec: ContainerSpec): Promise<ContainerHandle> {
    const { stdout } = await this.exec(this.dockerBin, DockerCliRuntime.runArgs(spec, this.network), {});
    const id = stdout.trim().split('\n').pop() ?? '';
    if (!id) throw new Error('docker run printed no container id');
    return { id };
  }

  async wait(handle: ContainerHandle, timeoutMs: number, timeoutMessage?: string): Promise<number> {
    const { stdout } = await withTimeout(
      (signal) => this.exec(this.dockerBin, ['wait', handle.id], { signal }),
      timeoutMs,
      timeoutMessage,
    );
    const code = Number.parseInt(stdout.trim(), 10);
    if (Number.isNaN(code)) throw new Error(`unexpected docker wait output: ${stdout.trim()}`);
    return code;
  }

  async logs(handle: ContainerHandle): Promise<string> {
    const { stdout, stderr } = await this.exec(this.dockerBin, ['logs', handle.id], { maxBuffer: LOG_MAX_BUFFER });
    return [stdout, stderr].filter(Boolean).join('\n');
  }

  async isRunning(handle: ContainerHandle): Promise<boolean> {
    const { stdout } = await this.exec(this.dockerBin, ['inspect', '-f', '{{.State.Running}}', handle.id], {});
    return stdout.trim() === 'true';
  }

  async stop(handle: ContainerHandle): Promise<void> {
    await this.exec(this.dockerBin, ['stop', '-t', '0', handle.id], {});
  }

  async remove(handle: ContainerHandle): Promise<void> {
    await this.exec(this.dockerBin, ['rm', '-f', handle.id], {});
  }
}
