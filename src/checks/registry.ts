import type { Issue, IssueKind } from '../issue.js';

/**
 * One analysis routine run by the engine against a checked-out repository.
 *
 * `run` must treat `repoPath` as read-only, must not need the network, and
 * returns `[]` (rather than throwing) when its precondition is not met.
 */
export type Check = {
  /** Stable identifier, used for registration, logs and `disabledChecks`. */
  id: string;
  kind: IssueKind;
  description?: string;
  run(repoPath: string): Promise<Issue[]>;
};

export class CheckRegistry {
  private readonly checks: Check[] = [];
  private readonly byId = new Map<string, Check>();

  register(check: Check): void {
    if (this.byId.has(check.id)) {
      throw new Error(`Check "${check.id}" already registered`);
    }
    this.checks.push(check);
    this.byId.set(check.id, check);
  }

  /** Registered checks in registration order, minus any excluded ids. */
  list(opts?: { exclude?: readonly string[] }): Check[] {
    const exclude = new Set(opts?.exclude ?? []);
    return this.checks.filter((c) => !exclude.has(c.id));
  }

  get(id: string): Check | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.checks.length;
  }
}

/** Registry populated by the built-in check modules as they load. */
export const defaultRegistry = new CheckRegistry();

export function registerCheck(check: Check): Check {
  defaultRegistry.register(check);
  return check;
}
