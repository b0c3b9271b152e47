import { z } from 'zod';

/**
 * Issue kinds produced by the built-in checks. Other checks may add their own.
 * The `lint` check reports under kind `style`.
 */
export const BUILTIN_KINDS = ['style', 'complexity', 'stale-comment', 'churn', 'coverage'] as const;
export type BuiltinKind = (typeof BUILTIN_KINDS)[number];
export type IssueKind = BuiltinKind | (string & {});

/** Line reported for findings that apply to a whole file or repository. */
export const FILE_LEVEL_LINE = 1;

export const IssueSchema = z
  .object({
    type: z.string().min(1),
    file: z.string().min(1),
    line: z.number().int().min(1),
    code: z.string(),
    message: z.string(),
  })
  .strict();

export const IssueListSchema = z.array(IssueSchema);

export type Issue = z.infer<typeof IssueSchema>;

const RawIssueSchema = z.object({
  type: z.string().min(1),
  file: z.string().min(1),
  line: z.unknown(),
  code: z.string(),
  message: z.string(),
});

/**
 * Parses the results artifact. Throws on invalid JSON or on any element that
 * is not exactly an Issue.
 */
export function parseIssues(text: string): Issue[] {
  const data: unknown = JSON.parse(text);
  const parsed = IssueListSchema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown';
    throw new Error(`Invalid results artifact (${where})`);
  }
  return parsed.data;
}

/**
 * Coerces a check's raw output into an Issue. `line` becomes an integer >= 1;
 * extra fields are dropped. Returns undefined when a required field is missing.
 */
export function normalizeIssue(raw: unknown): Issue | undefined {
  const parsed = RawIssueSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const { type, file, line, code, message } = parsed.data;
  return {
    type,
    file: file.replace(/\\/g, '/'),
    line: typeof line === 'number' && Number.isFinite(line) ? Math.max(FILE_LEVEL_LINE, Math.trunc(line)) : FILE_LEVEL_LINE,
    code,
    message,
  };
}

export function makeIssue(type: IssueKind, file: string, line: number, code: string, message: string): Issue {
  return { type, file, line, code, message };
}
