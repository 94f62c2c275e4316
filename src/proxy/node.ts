export interface HealthRecord {
  latencyMs: number | null;
  checkedAt: number | null;
  reachable: boolean;
}

export interface ProxyNode {
  readonly name: string;
  readonly type: string;
  readonly server?: string;
  readonly port?: number;
  /** Raw subscription record, passed through untouched. */
  readonly params: Readonly<Record<string, unknown>>;
  readonly health: HealthRecord;
}

export interface NodePool {
  readonly nodes: readonly ProxyNode[];
  readonly fetchedAt: number;
  readonly source: string;
}

export interface FilterPolicy {
  include: readonly string[];
  exclude: readonly string[];
}

export interface ProbeOutcome {
  latencyMs: number | null;
  checkedAt: number;
}

export const EMPTY_FILTER: FilterPolicy = { include: [], exclude: [] };

export function emptyHealth(): HealthRecord {
  return { latencyMs: null, checkedAt: null, reachable: false };
}

export function matchesPolicy(name: string, policy: FilterPolicy): boolean {
  if (policy.include.length > 0 && !policy.include.some((keyword) => name.includes(keyword))) {
    return false;
  }
  return !policy.exclude.some((keyword) => name.includes(keyword));
}

export function applyFilter<T extends { name: string }>(nodes: readonly T[], policy: FilterPolicy): T[] {
  return nodes.filter((node) => matchesPolicy(node.name, policy));
}

// Returns false when the outcome is older than what the record already holds.
export function recordProbe(node: ProxyNode, outcome: ProbeOutcome): boolean {
  const health = node.health;
  if (health.checkedAt != null && outcome.checkedAt < health.checkedAt) {
    return false;
  }
  health.checkedAt = outcome.checkedAt;
  health.latencyMs = outcome.latencyMs;
  health.reachable = outcome.latencyMs != null;
  return true;
}

export function createPool(nodes: readonly ProxyNode[], source: string, fetchedAt = Date.now()): NodePool {
  return Object.freeze({ nodes: Object.freeze([...nodes]), fetchedAt, source });
}

export function findNode(pool: NodePool | null, name: string | null): ProxyNode | undefined {
  if (!pool || !name) return undefined;
  return pool.nodes.find((node) => node.name === name);
}

export function safeUrlForLog(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = "";
    parsed.password = "";
    parsed.search = "";
    return parsed.toString();
  } catch {
    return url;
  }
}
