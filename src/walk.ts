import fs from 'fs/promises';
import path from 'path';
import ignoreModule from 'ignore';

type IgnoreMatcher = {
  add(patterns: string | readonly string[]): IgnoreMatcher;
  ignores(pathname: string): boolean;
};

// ignore ships CJS typings with a default export; at runtime the module itself is the factory
const createIgnore = ignoreModule as unknown as () => IgnoreMatcher;

/** Directory names never descended into, wherever they appear. */
export const SKIP_DIRS = new Set(['.git']);

const IGNORE_FILES = ['.gitignore', '.scanignore'];

// load root .gitignore and .scanignore if present and accept extra patterns
export async function loadIgnorePatterns(root: string, extraPatterns?: string[]): Promise<IgnoreMatcher> {
  const ig = createIgnore();
  for (const f of IGNORE_FILES) {
    try {
      const content = await fs.readFile(path.join(root, f), 'utf8');
      ig.add(content.split(/\r?\n/));
    } catch {
      // missing file
    }
  }
  if (extraPatterns && extraPatterns.length) {
    ig.add(extraPatterns);
  }
  return ig;
}

export type WalkOptions = {
  /** Keep only files for which this returns true (receives the repo-relative path). */
  filter?: (relPath: string) => boolean;
  /** Extra gitignore-style patterns to exclude. */
  ignore?: string[];
  /**
   * Also honour the repository's own `.gitignore` / `.scanignore`. Off by
   * default: the scanned repository is untrusted and must not hide content.
   */
  useIgnoreFiles?: boolean;
};

/**
 * Lists regular files under `root` as POSIX repo-relative paths, in a stable
 * order. Only `.git` is skipped unless ignore patterns are requested. Symlinks
 * are not followed and unreadable directories are skipped.
 */
export async function listRepoFiles(root: string, opts: WalkOptions = {}): Promise<string[]> {
  let ig: IgnoreMatcher | undefined;
  if (opts.useIgnoreFiles) ig = await loadIgnorePatterns(root, opts.ignore);
  else if (opts.ignore?.length) ig = createIgnore().add(opts.ignore);
  const files: string[] = [];
  await walkDirCollect(path.resolve(root), '', files, ig && isIgnoredBy(ig), opts.filter);
  return files;
}

// ignore() throws on names it does not take as relative paths (e.g. "...");
// those are never matched by a pattern, so they are kept
function isIgnoredBy(ig: IgnoreMatcher): (relPath: string) => boolean {
  return (relPath) => {
    try {
      return ig.ignores(relPath);
    } catch {
      return false;
    }
  };
}

async function walkDirCollect(
  dir: string,
  rel: string,
  files: string[],
  isIgnored?: (relPath: string) => boolean,
  filter?: (relPath: string) => boolean,
) {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const e of entries) {
    const childRel = rel ? `${rel}/${e.name}` : e.name;
    if (e.isDirectory()) {
      if (SKIP_DIRS.has(e.name) || isIgnored?.(`${childRel}/`)) continue;
      await walkDirCollect(path.join(dir, e.name), childRel, files, isIgnored, filter);
    } else if (e.isFile()) {
      if (isIgnored?.(childRel)) continue;
      if (filter && !filter(childRel)) continue;
      files.push(childRel);
    }
  }
}

export function extensionOf(relPath: string): string {
  return path.posix.extname(relPath).toLowerCase();
}
