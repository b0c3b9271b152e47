import { describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Check } from '../src/checks/registry.js';
import { runAllChecks, runEngine, writeArtifact } from '../src/engine.js';
import { makeIssue } from '../src/issue.js';
import { createLogger } from '../src/logger.js';
import { isScanError } from '../src/types/errors.js';

function capture() {
  const lines: string[] = [];
  const logger = createLogger('engine', { level: 'debug', sink: (line) => lines.push(line) });
  return { lines, logger };
}

const fixed = (id: string, count: number): Check => ({
  id,
  kind: id,
  async run() {
    return Array.from({ length: count }, (_, i) => makeIssue(id, `${id}.txt`, i + 1, `${id.toUpperCase()}_${i}`, 'm'));
  },
});

const broken: Check = {
  id: 'broken',
  kind: 'broken',
  async run() {
    throw new Error('boom');
  },
};

describe('plugin execution engine', () => {
  it('concatenates issues in registration order', async () => {
    const { logger } = capture();
    const { issues } = await runAllChecks('/nowhere', { checks: [fixed('b', 1), fixed('a', 2)], logger });
    expect(issues.map((i) => i.code)).toEqual(['B_0', 'A_0', 'A_1']);
  });

  it('isolates a failing check and keeps the others', async () => {
    const { lines, logger } = capture();
    const report = await runAllChecks('/nowhere', { checks: [fixed('a', 1), broken, fixed('c', 1)], logger });
    expect(report.issues.map((i) => i.type)).toEqual(['a', 'c']);
    expect(report.outcomes.map((o) => [o.id, o.ok])).toEqual([
      ['a', true],
      ['broken', false],
      ['c', true],
    ]);
    expect(report.outcomes[1].error).toBe('boom');
    expect(lines.some((l) => l.startsWith('[ERROR] [engine] check broken failed'))).toBe(true);
  });

  it('returns nothing for zero checks', async () => {
    const { logger } = capture();
    expect(await runAllChecks('/nowhere', { checks: [], logger })).toEqual({ issues: [], outcomes: [] });
  });

  it('normalizes lines and drops invalid records', async () => {
    const { lines, logger } = capture();
    const sloppy: Check = {
      id: 'sloppy',
      kind: 'sloppy',
      async run() {
        return [
          { type: 'sloppy', file: 'a', line: 0, code: 'X', message: 'zero line' },
          JSON.parse('{"type":"sloppy","file":"b","line":2}'),
        ];
      },
    };
    const { issues, outcomes } = await runAllChecks('/nowhere', { checks: [sloppy], logger });
    expect(issues).toEqual([{ type: 'sloppy', file: 'a', line: 1, code: 'X', message: 'zero line' }]);
    expect(outcomes[0].issues).toBe(1);
    expect(lines).toContain('[WARN] [engine] check sloppy produced an invalid issue, dropped');
  });

  it('is idempotent for the same input and check set', async () => {
    const repo = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-idem-'));
    try {
      fs.writeFileSync(path.join(repo, 'a.txt'), 'x\n// TODO: one\n');
      fs.writeFileSync(path.join(repo, 'b.txt'), 'FIXME: two\n');
      const { staleCommentCheck } = await import('../src/checks/staleComment.js');
      const { logger } = capture();
      const first = await runAllChecks(repo, { checks: [staleCommentCheck], logger });
      const second = await runAllChecks(repo, { checks: [staleCommentCheck], logger });
      expect(second.issues).toEqual(first.issues);
      expect(first.issues).toHaveLength(2);
    } finally {
      fs.rmSync(repo, { recursive: true, force: true });
    }
  });

  describe('artifact', () => {
    it('writes exactly the five fields per issue', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-out-'));
      try {
        const out = path.join(dir, 'nested', 'results.json');
        const withExtra = { ...makeIssue('style', 'a.js', 3, 'no-undef', 'm'), severity: 'high' };
        await writeArtifact([withExtra], out);
        const data = JSON.parse(fs.readFileSync(out, 'utf8'));
        expect(data).toEqual([{ type: 'style', file: 'a.js', line: 3, code: 'no-undef', message: 'm' }]);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('raises ARTIFACT_WRITE_ERROR when the path is unwritable', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-bad-'));
      try {
        // a regular file where a directory is expected
        fs.writeFileSync(path.join(dir, 'blocker'), '');
        const err = await writeArtifact([], path.join(dir, 'blocker', 'results.json')).catch((e: unknown) => e);
        expect(isScanError(err) && err.code).toBe('ARTIFACT_WRITE_ERROR');
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('runEngine', () => {
    it('writes an artifact even when every check fails', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-run-'));
      try {
        const out = path.join(dir, 'results.json');
        const { logger } = capture();
        const code = await runEngine({ repoPath: dir, outputPath: out, checks: [broken], logger });
        expect(code).toBe(0);
        expect(JSON.parse(fs.readFileSync(out, 'utf8'))).toEqual([]);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('returns 1 when the artifact cannot be written', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-run-bad-'));
      try {
        fs.writeFileSync(path.join(dir, 'blocker'), '');
        const { lines, logger } = capture();
        const code = await runEngine({
          repoPath: dir,
          outputPath: path.join(dir, 'blocker', 'results.json'),
          checks: [fixed('a', 1)],
          logger,
        });
        expect(code).toBe(1);
        expect(lines.some((l) => l.startsWith('[ERROR] [engine] could not write results'))).toBe(true);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
