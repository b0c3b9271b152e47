import fs from 'fs/promises';
import path from 'path';
import { isScanFailure, type ScanResult } from './orchestrator.js';

export type ScanOutcome = 'success' | 'failure';

export type Metrics = {
  scans_total: number;
  scans_by_outcome: Record<ScanOutcome, number>;
  scans_failed_by_code: Record<string, number>;
  issues_total: number;
  issues_by_type: Record<string, number>;
  scan_duration_ms_total: number;
  runtime_info?: {
    image?: string;
    timeoutMs?: number;
    version?: string;
  };
};

export function newMetrics(): Metrics {
  return {
    scans_total: 0,
    scans_by_outcome: { success: 0, failure: 0 },
    scans_failed_by_code: {},
    issues_total: 0,
    issues_by_type: {},
    scan_duration_ms_total: 0,
  };
}

export function recordScan(metrics: Metrics, result: ScanResult, durationMs: number): void {
  metrics.scans_total++;
  metrics.scan_duration_ms_total += durationMs;
  if (isScanFailure(result)) {
    metrics.scans_by_outcome.failure++;
    metrics.scans_failed_by_code[result.code] = (metrics.scans_failed_by_code[result.code] ?? 0) + 1;
    return;
  }
  metrics.scans_by_outcome.success++;
  metrics.issues_total += result.totalIssues;
  for (const issue of result.issues) {
    metrics.issues_by_type[issue.type] = (metrics.issues_by_type[issue.type] ?? 0) + 1;
  }
}

const esc = (v: unknown) => String(v ?? '').replace(/\\/g, '\\\\').replace(/"/g, '\\"');

export function renderProm(metrics: Metrics): string {
  const lines: string[] = [];
  if (metrics.runtime_info) {
    const ri = metrics.runtime_info;
    const labels = [`image="${esc(ri.image)}"`, `timeout_ms="${esc(ri.timeoutMs)}"`, `version="${esc(ri.version)}"`].join(',');
    lines.push('# HELP debtscan_runtime_info Scanner runtime configuration info');
    lines.push('# TYPE debtscan_runtime_info gauge');
    lines.push(`debtscan_runtime_info{${labels}} 1`);
  }
  lines.push('# HELP debtscan_scans_total Scans executed');
  lines.push('# TYPE debtscan_scans_total counter');
  lines.push(`debtscan_scans_total ${metrics.scans_total}`);
  lines.push('# HELP debtscan_scans_outcome_total Scans by outcome');
  lines.push('# TYPE debtscan_scans_outcome_total counter');
  for (const outcome of ['success', 'failure'] as const) {
    lines.push(`debtscan_scans_outcome_total{outcome="${outcome}"} ${metrics.scans_by_outcome[outcome]}`);
  }
  lines.push('# HELP debtscan_scans_failed_code_total Failed scans by error code');
  lines.push('# TYPE debtscan_scans_failed_code_total counter');
  for (const [code, n] of Object.entries(metrics.scans_failed_by_code)) {
    lines.push(`debtscan_scans_failed_code_total{code="${esc(code)}"} ${n}`);
  }
  lines.push('# HELP debtscan_issues_total Issues reported by successful scans');
  lines.push('# TYPE debtscan_issues_total counter');
  lines.push(`debtscan_issues_total ${metrics.issues_total}`);
  lines.push('# HELP debtscan_issues_type_total Issues by type');
  lines.push('# TYPE debtscan_issues_type_total counter');
  for (const [type, n] of Object.entries(metrics.issues_by_type)) {
    lines.push(`debtscan_issues_type_total{type="${esc(type)}"} ${n}`);
  }
  lines.push('# HELP debtscan_scan_duration_ms_total Total wall time spent in scans (ms)');
  lines.push('# TYPE debtscan_scan_duration_ms_total counter');
  lines.push(`debtscan_scan_duration_ms_total ${metrics.scan_duration_ms_total}`);
  return lines.join('\n') + '\n';
}

export async function writeProm(metrics: Metrics, filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, renderProm(metrics), 'utf8');
}
