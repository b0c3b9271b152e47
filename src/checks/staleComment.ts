import fsSync from 'fs';
import path from 'path';
import readline from 'readline';
import { makeIssue, type Issue } from '../issue.js';
import { getLogger } from '../logger.js';
import { getErrorMessage } from '../types/errors.js';
import { extensionOf, listRepoFiles } from '../walk.js';
import { registerCheck, type Check } from './registry.js';

const log = getLogger('checks.stale-comment');

export const BINARY_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.zip', '.tar', '.gz', '.ico', '.pdf', '.svg']);

// Greedy prefix: with several markers on one line the last one is reported.
const MARKER = /^.*(TODO|FIXME|XXX):(.*)$/i;

export function matchMarker(line: string): { keyword: string; text: string } | undefined {
  const m = MARKER.exec(line);
  if (!m) return undefined;
  return { keyword: m[1].toUpperCase(), text: m[2].trim() };
}

async function scanFile(repoPath: string, rel: string): Promise<Issue[]> {
  const issues: Issue[] = [];
  const rs = fsSync.createReadStream(path.join(repoPath, rel), { encoding: 'utf8' });
  const rl = readline.createInterface({ input: rs, crlfDelay: Infinity });
  let lineNo = 0;
  for await (const line of rl) {
    lineNo++;
    const hit = matchMarker(line);
    if (hit) {
      issues.push(makeIssue('stale-comment', rel, lineNo, `FOUND_${hit.keyword}`, hit.text));
    }
  }
  return issues;
}

export const staleCommentCheck: Check = {
  id: 'stale-comment',
  kind: 'stale-comment',
  description: 'TODO / FIXME / XXX markers left in the code',
  async run(repoPath: string): Promise<Issue[]> {
    const files = await listRepoFiles(repoPath, { filter: (rel) => !BINARY_EXTENSIONS.has(extensionOf(rel)) });
    const issues: Issue[] = [];
    for (const rel of files) {
      try {
        issues.push(...(await scanFile(repoPath, rel)));
      } catch (err) {
        log.warn(`could not read ${rel}`, { error: getErrorMessage(err) });
      }
    }
    log.info(`found ${issues.length} issues`);
    return issues;
  },
};

registerCheck(staleCommentCheck);
