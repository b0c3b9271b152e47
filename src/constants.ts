/**
 * Application-wide constants
 */

export const ENV_PREFIX = 'DEBTSCAN_';
export const CONFIG_FILE = '.debtscan.json';

// Container image and mount points
export const DEFAULT_SCANNER_IMAGE = 'debtscan-scanner:latest';
export const CONTAINER_REPO_PATH = '/repo';
export const CONTAINER_OUTPUT_DIR = '/output';
export const RESULTS_FILE = 'results.json';

// Workspace layout under <workRoot>/<jobId>
export const WORKSPACE_REPO_DIR = 'repo';
export const WORKSPACE_OUTPUT_DIR = 'output';

// Queue / store
export const DEFAULT_RECENT_LIMIT = 10;
export const MAX_RECENT_LIMIT = 100;

// Severity per issue kind, used when archiving results
export const SEVERITY_BY_KIND: Record<string, 'low' | 'medium' | 'high'> = {
  churn: 'medium',
  complexity: 'high',
  'stale-comment': 'low',
  coverage: 'high',
  style: 'medium',
};
export const DEFAULT_SEVERITY = 'medium' as const;
