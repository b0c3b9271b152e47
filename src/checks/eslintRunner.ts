import { createRequire } from 'node:module';
import path from 'path';
import { ESLint, type Linter } from 'eslint';
import { extensionOf, listRepoFiles } from '../walk.js';

const require = createRequire(import.meta.url);

export const SOURCE_EXTENSIONS = new Set(['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts']);
const TYPESCRIPT_GLOBS = ['*.ts', '*.tsx', '*.mts', '*.cts'];

export type LintMessage = {
  file: string;
  line: number;
  ruleId: string;
  message: string;
};

/**
 * Lints every JavaScript/TypeScript source under `repoPath` with the given
 * rules. Messages without a rule id (parse failures, ignored-file notices)
 * are dropped, so a file that does not parse contributes nothing.
 */
export async function lintSources(
  repoPath: string,
  config: Pick<Linter.Config, 'extends' | 'rules'>,
): Promise<LintMessage[]> {
  const files = await listRepoFiles(repoPath, { filter: (rel) => SOURCE_EXTENSIONS.has(extensionOf(rel)) });
  if (!files.length) return [];

  const eslint = new ESLint({
    cwd: repoPath,
    useEslintrc: false,
    ignore: false,
    errorOnUnmatchedPattern: false,
    allowInlineConfig: false,
    baseConfig: {
      ...config,
      root: true,
      env: { es2022: true, node: true, browser: true },
      parserOptions: {
        ecmaVersion: 'latest',
        sourceType: 'module',
        ecmaFeatures: { jsx: true },
      },
      overrides: [{ files: TYPESCRIPT_GLOBS, parser: require.resolve('@typescript-eslint/parser') }],
    },
  });

  const results = await eslint.lintFiles(files.map((rel) => path.join(repoPath, rel)));
  const messages: LintMessage[] = [];
  for (const res of results) {
    const file = path.relative(repoPath, res.filePath).split(path.sep).join('/');
    for (const msg of res.messages) {
      if (!msg.ruleId || !msg.line) continue;
      messages.push({ file, line: msg.line, ruleId: msg.ruleId, message: msg.message });
    }
  }
  return messages;
}
