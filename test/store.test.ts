import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileStore, NoopStore, createStore, severityFor } from '../src/store.js';

const dirs: string[] = [];
function tmpStore(): { dir: string; store: FileStore } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'store-'));
  dirs.push(dir);
  return { dir, store: new FileStore(dir) };
}

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe('scan store', () => {
  it('maps issue kinds to severities', () => {
    expect(severityFor('churn')).toBe('medium');
    expect(severityFor('complexity')).toBe('high');
    expect(severityFor('stale-comment')).toBe('low');
    expect(severityFor('coverage')).toBe('high');
    expect(severityFor('style')).toBe('medium');
    expect(severityFor('custom')).toBe('medium');
    expect(severityFor('constructor')).toBe('medium');
  });

  it('persists records and lists them newest first', async () => {
    const { store } = tmpStore();
    const a = await store.persist({ repoUrl: 'https://example.com/a.git', status: 'completed', totalIssues: 2 });
    const b = await store.persist({ repoUrl: 'https://example.com/b.git', status: 'failed', totalIssues: 0, errorMessage: 'results not found' });
    const c = await store.persist({ repoUrl: 'https://example.com/a.git', status: 'completed', totalIssues: 0 });
    expect((await store.recent(10)).map((r) => r.scanId)).toEqual([c, b, a]);
    expect((await store.recent(1)).map((r) => r.scanId)).toEqual([c]);
    expect((await store.byRepo('https://example.com/a.git', 10)).map((r) => r.scanId)).toEqual([c, a]);
    const failed = await store.get(b ?? '');
    expect(failed?.record).toMatchObject({ status: 'failed', errorMessage: 'results not found' });
    expect(failed?.issues).toEqual([]);
  });

  it('archives issues with severity', async () => {
    const { store } = tmpStore();
    const id = (await store.persist({ repoUrl: 'r', status: 'completed', totalIssues: 1 })) ?? '';
    await store.archive(id, [{ type: 'complexity', file: 'a.js', line: 3, code: 'Complexity-14', message: 'm' }]);
    expect((await store.get(id))?.issues).toEqual([
      { type: 'complexity', file: 'a.js', line: 3, code: 'Complexity-14', message: 'm', severity: 'high' },
    ]);
  });

  it('treats a corrupt issue archive as empty', async () => {
    const { dir, store } = tmpStore();
    const id = (await store.persist({ repoUrl: 'r', status: 'completed', totalIssues: 1 })) ?? '';
    await store.archive(id, [{ type: 'style', file: 'a.js', line: 1, code: 'no-undef', message: 'm' }]);
    fs.writeFileSync(path.join(dir, 'issues', `${id}.json`), '[{"type": "lint",');
    const found = await store.get(id);
    expect(found?.record.scanId).toBe(id);
    expect(found?.issues).toEqual([]);
  });

  it('returns undefined for unknown scans and an empty list before any write', async () => {
    const { store } = tmpStore();
    expect(await store.get('missing')).toBeUndefined();
    expect(await store.recent(5)).toEqual([]);
  });

  it('skips corrupt and tampered lines', async () => {
    const { dir, store } = tmpStore();
    const keep = await store.persist({ repoUrl: 'r', status: 'completed', totalIssues: 1 });
    const file = path.join(dir, 'scans.ndjson');
    const [line] = fs.readFileSync(file, 'utf8').trim().split('\n');
    const tampered = { ...JSON.parse(line), totalIssues: 0, scanId: 'other' };
    fs.appendFileSync(file, 'not json\n' + JSON.stringify(tampered) + '\n');
    expect((await store.recent(10)).map((r) => r.scanId)).toEqual([keep]);
  });

  it('has a disabled no-op variant', async () => {
    const noop = new NoopStore();
    expect(noop.enabled).toBe(false);
    expect(await noop.persist()).toBeUndefined();
    expect(createStore(undefined).enabled).toBe(false);
    expect(createStore('/tmp/x').enabled).toBe(true);
  });
});
