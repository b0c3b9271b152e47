import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_SEVERITY, SEVERITY_BY_KIND } from './constants.js';
import { IssueSchema, type Issue } from './issue.js';
import { getLogger } from './logger.js';
import { isNodeError } from './types/errors.js';

export type Severity = 'low' | 'medium' | 'high';
export type ScanStatus = 'completed' | 'failed';

export const ScanRecordSchema = z.object({
  scanId: z.string(),
  repoUrl: z.string(),
  status: z.enum(['completed', 'failed']),
  totalIssues: z.number().int().min(0),
  errorMessage: z.string().optional(),
  createdAt: z.string(),
});

export type ScanRecord = z.infer<typeof ScanRecordSchema>;

export type NewScanRecord = Omit<ScanRecord, 'scanId' | 'createdAt'>;

const ArchivedIssueSchema = IssueSchema.extend({ severity: z.enum(['low', 'medium', 'high']) });
export type ArchivedIssue = z.infer<typeof ArchivedIssueSchema>;

export function severityFor(type: string): Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_BY_KIND, type) ? SEVERITY_BY_KIND[type] : DEFAULT_SEVERITY;
}

/**
 * Persistence for finished scans. Callers treat every method as best-effort:
 * a store failure must never change a scan's outcome.
 */
export interface ScanStore {
  readonly enabled: boolean;
  /** Returns the new scan id, or undefined when nothing was stored. */
  persist(record: NewScanRecord): Promise<string | undefined>;
  archive(scanId: string, issues: readonly Issue[]): Promise<void>;
  get(scanId: string): Promise<{ record: ScanRecord; issues: ArchivedIssue[] } | undefined>;
  recent(limit: number): Promise<ScanRecord[]>;
  byRepo(repoUrl: string, limit: number): Promise<ScanRecord[]>;
}

/** Store used when persistence is not configured. */
export class NoopStore implements ScanStore {
  readonly enabled = false;
  async persist(): Promise<string | undefined> {
    return undefined;
  }
  async archive(): Promise<void> {}
  async get(): Promise<undefined> {
    return undefined;
  }
  async recent(): Promise<ScanRecord[]> {
    return [];
  }
  async byRepo(): Promise<ScanRecord[]> {
    return [];
  }
}

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) return '[' + value.map((v) => stableStringify(v)).join(',') + ']';
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}';
}

function hashOf(record: ScanRecord): string {
  return 'sha256-' + crypto.createHash('sha256').update(stableStringify(record)).digest('hex');
}

const StoredLineSchema = ScanRecordSchema.extend({ hash: z.string() });

/**
 * Directory-backed store: scan records appended to `scans.ndjson`, each line
 * carrying a content hash; raw issue lists under `issues/<scanId>.json`.
 */
export class FileStore implements ScanStore {
  readonly enabled = true;
  private readonly log = getLogger('store');
  private readonly recordsFile: string;
  private readonly issuesDir: string;

  constructor(private readonly dir: string) {
    this.recordsFile = path.join(dir, 'scans.ndjson');
    this.issuesDir = path.join(dir, 'issues');
  }

  async persist(input: NewScanRecord): Promise<string | undefined> {
    const record: ScanRecord = { ...input, scanId: crypto.randomUUID(), createdAt: new Date().toISOString() };
    await fs.mkdir(this.dir, { recursive: true });
    await fs.appendFile(this.recordsFile, JSON.stringify({ ...record, hash: hashOf(record) }) + '\n', 'utf8');
    return record.scanId;
  }

  async archive(scanId: string, issues: readonly Issue[]): Promise<void> {
    const archived: ArchivedIssue[] = issues.map((i) => ({ ...i, severity: severityFor(i.type) }));
    await fs.mkdir(this.issuesDir, { recursive: true });
    await fs.writeFile(this.issueFile(scanId), JSON.stringify(archived, null, 2), 'utf8');
  }

  async get(scanId: string): Promise<{ record: ScanRecord; issues: ArchivedIssue[] } | undefined> {
    const record = (await this.readAll()).find((r) => r.scanId === scanId);
    if (!record) return undefined;
    return { record, issues: await this.readIssues(scanId) };
  }

  async recent(limit: number): Promise<ScanRecord[]> {
    return (await this.readAll()).reverse().slice(0, limit);
  }

  async byRepo(repoUrl: string, limit: number): Promise<ScanRecord[]> {
    return (await this.readAll())
      .filter((r) => r.repoUrl === repoUrl)
      .reverse()
      .slice(0, limit);
  }

  private issueFile(scanId: string): string {
    // ids come from URLs; keep them inside the issues directory
    return path.join(this.issuesDir, `${path.basename(scanId)}.json`);
  }

  private async readIssues(scanId: string): Promise<ArchivedIssue[]> {
    let content: string;
    try {
      content = await fs.readFile(this.issueFile(scanId), 'utf8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      this.log.warn(`archived issues for ${scanId} are malformed`);
      return [];
    }
    const parsed = z.array(ArchivedIssueSchema).safeParse(data);
    if (!parsed.success) {
      this.log.warn(`archived issues for ${scanId} are malformed`);
      return [];
    }
    return parsed.data;
  }

  /** Records in append order; unreadable or tampered lines are skipped. */
  private async readAll(): Promise<ScanRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.recordsFile, 'utf8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }
    const records: ScanRecord[] = [];
    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      if (!lines[i].trim()) continue;
      let data: unknown;
      try {
        data = JSON.parse(lines[i]);
      } catch {
        this.log.warn(`scans.ndjson line ${i + 1}: invalid JSON`);
        continue;
      }
      const parsed = StoredLineSchema.safeParse(data);
      if (!parsed.success) {
        this.log.warn(`scans.ndjson line ${i + 1}: not a scan record`);
        continue;
      }
      const { hash, ...record } = parsed.data;
      if (hashOf(record) !== hash) {
        this.log.warn(`scans.ndjson line ${i + 1}: hash mismatch`);
        continue;
      }
      records.push(record);
    }
    return records;
  }
}

export function createStore(storeDir: string | undefined): ScanStore {
  return storeDir ? new FileStore(storeDir) : new NoopStore();
}
