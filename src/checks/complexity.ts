import { makeIssue, type Issue } from '../issue.js';
import { getLogger } from '../logger.js';
import { lintSources } from './eslintRunner.js';
import { registerCheck, type Check } from './registry.js';

const log = getLogger('checks.complexity');

export const MAX_COMPLEXITY = 10;

// "Function 'parse' has a complexity of 15. Maximum allowed is 10."
const SCORE = /^(.*) has a complexity of (\d+)/;

export function parseComplexityMessage(message: string): { unit: string; score: number } | undefined {
  const m = SCORE.exec(message);
  if (!m) return undefined;
  return { unit: m[1], score: Number(m[2]) };
}

export const complexityCheck: Check = {
  id: 'complexity',
  kind: 'complexity',
  description: `functions with cyclomatic complexity above ${MAX_COMPLEXITY}`,
  async run(repoPath: string): Promise<Issue[]> {
    const messages = await lintSources(repoPath, { rules: { complexity: ['error', MAX_COMPLEXITY] } });
    const issues: Issue[] = [];
    for (const msg of messages) {
      if (msg.ruleId !== 'complexity') continue;
      const parsed = parseComplexityMessage(msg.message);
      if (!parsed || parsed.score <= MAX_COMPLEXITY) continue;
      issues.push(
        makeIssue(
          'complexity',
          msg.file,
          msg.line,
          `Complexity-${parsed.score}`,
          `${parsed.unit} has a cyclomatic complexity of ${parsed.score}`,
        ),
      );
    }
    log.info(`found ${issues.length} issues`);
    return issues;
  },
};

registerCheck(complexityCheck);
