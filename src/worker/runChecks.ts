/**
 * Scanner container entry point: checks /repo, writes /output/results.json.
 */
import path from 'path';
import { defaultRegistry } from '../checks/index.js';
import { loadConfig } from '../config.js';
import { CONTAINER_OUTPUT_DIR, CONTAINER_REPO_PATH, ENV_PREFIX, RESULTS_FILE } from '../constants.js';
import { runEngine } from '../engine.js';
import { getLogger, initLogging } from '../logger.js';
import { getErrorMessage } from '../types/errors.js';

const repoPath = process.env[`${ENV_PREFIX}REPO_PATH`] || CONTAINER_REPO_PATH;
const outputPath = process.env[`${ENV_PREFIX}OUTPUT_PATH`] || path.posix.join(CONTAINER_OUTPUT_DIR, RESULTS_FILE);

try {
  const config = await loadConfig();
  initLogging({ level: config.logLevel, json: config.logJson });
  process.exitCode = await runEngine({
    repoPath,
    outputPath,
    checks: defaultRegistry.list({ exclude: config.disabledChecks }),
    logger: getLogger('engine'),
  });
} catch (err) {
  initLogging({});
  getLogger('engine').error(`scanner failed: ${getErrorMessage(err)}`);
  process.exitCode = 1;
}
