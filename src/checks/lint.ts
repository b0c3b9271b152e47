import { makeIssue, type Issue } from '../issue.js';
import { getLogger } from '../logger.js';
import { lintSources } from './eslintRunner.js';
import { registerCheck, type Check } from './registry.js';

const log = getLogger('checks.lint');

export const lintCheck: Check = {
  id: 'lint',
  kind: 'style',
  description: 'eslint:recommended violations in JavaScript/TypeScript sources',
  async run(repoPath: string): Promise<Issue[]> {
    const messages = await lintSources(repoPath, { extends: ['eslint:recommended'] });
    const issues = messages.map((m) => makeIssue('style', m.file, m.line, m.ruleId, m.message));
    log.info(`found ${issues.length} issues`);
    return issues;
  },
};

registerCheck(lintCheck);
