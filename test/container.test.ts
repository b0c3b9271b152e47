import { describe, it, expect } from 'vitest';
import { DockerCliRuntime } from '../src/container.js';
import type { ExecFn, ExecOptions } from '../src/exec.js';
import { TimeoutError } from '../src/types/errors.js';

type Call = { file: string; args: string[]; opts: ExecOptions };

function fakeExec(respond: (args: string[], opts: ExecOptions) => Promise<{ stdout: string; stderr: string }>) {
  const calls: Call[] = [];
  const exec: ExecFn = (file, args, opts) => {
    calls.push({ file, args, opts });
    return respond(args, opts);
  };
  return { calls, exec };
}

const ok = (stdout = '', stderr = '') => Promise.resolve({ stdout, stderr });

describe('docker CLI runtime', () => {
  it('starts a detached, network-less container with both mounts', async () => {
    const { calls, exec } = fakeExec(() => ok('abc123\n'));
    const rt = new DockerCliRuntime({ exec, dockerBin: '/usr/bin/docker' });
    const handle = await rt.run({
      image: 'scanner:1',
      mounts: [
        { source: '/tmp/j/repo', target: '/repo', readOnly: true },
        { source: '/tmp/j/output', target: '/output', readOnly: false },
      ],
      labels: { 'debtscan.job': 'j' },
    });
    expect(handle).toEqual({ id: 'abc123' });
    expect(calls[0].file).toBe('/usr/bin/docker');
    expect(calls[0].args).toEqual([
      'run',
      '-d',
      '--init',
      '--network',
      'none',
      '--mount',
      'type=bind,source=/tmp/j/repo,target=/repo,readonly',
      '--mount',
      'type=bind,source=/tmp/j/output,target=/output',
      '--label',
      'debtscan.job=j',
      'scanner:1',
    ]);
  });

  it('keeps colons and commas in mount sources intact', () => {
    const args = DockerCliRuntime.runArgs({
      image: 'scanner:1',
      mounts: [{ source: '/tmp/a:b,c/repo', target: '/repo', readOnly: true }],
    });
    expect(args[args.indexOf('--mount') + 1]).toBe('type=bind,"source=/tmp/a:b,c/repo",target=/repo,readonly');
  });

  it('fails when docker run prints no id', async () => {
    const { exec } = fakeExec(() => ok(''));
    await expect(new DockerCliRuntime({ exec }).run({ image: 'x', mounts: [] })).rejects.toThrow(
      'docker run printed no container id',
    );
  });

  it('returns the exit code from docker wait', async () => {
    const { calls, exec } = fakeExec(() => ok('137\n'));
    expect(await new DockerCliRuntime({ exec }).wait({ id: 'c' }, 1000)).toBe(137);
    expect(calls[0].args).toEqual(['wait', 'c']);
  });

  it('aborts docker wait and rejects with TimeoutError', async () => {
    let aborted = false;
    const { exec } = fakeExec(
      (_args, opts) =>
        new Promise((_resolve, reject) => {
          opts.signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('The operation was aborted'));
          });
        }),
    );
    const err = await new DockerCliRuntime({ exec }).wait({ id: 'c' }, 20, 'scan timed out after 0.02 seconds').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof Error && err.message).toBe('scan timed out after 0.02 seconds');
    expect(aborted).toBe(true);
  });

  it('combines stdout and stderr for logs', async () => {
    const { exec } = fakeExec(() => ok('out line', 'err line'));
    expect(await new DockerCliRuntime({ exec }).logs({ id: 'c' })).toBe('out line\nerr line');
  });

  it('reads the running state, kills without a grace period and force-removes', async () => {
    const { calls, exec } = fakeExec((args) => ok(args[0] === 'inspect' ? 'true\n' : ''));
    const rt = new DockerCliRuntime({ exec });
    expect(await rt.isRunning({ id: 'c' })).toBe(true);
    await rt.stop({ id: 'c' });
    await rt.remove({ id: 'c' });
    expect(calls.map((c) => c.args)).toEqual([
      ['inspect', '-f', '{{.State.Running}}', 'c'],
      ['stop', '-t', '0', 'c'],
      ['rm', '-f', 'c'],
    ]);
  });
});
