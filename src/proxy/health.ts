import type { ProxyNode } from "./node.js";

export interface HealthPolicy {
  /** A probe older than this no longer counts. */
  stalenessMs: number;
  maxLatencyMs: number;
  /** Keep a healthy active node unless the best one is faster by more than this. */
  switchMarginMs: number;
}

export type Decision =
  | { kind: "keep"; node: ProxyNode }
  | { kind: "switch"; from: string | null; to: ProxyNode; reason: "active_missing" | "active_unhealthy" | "faster" }
  | { kind: "none"; candidates: number };

export const DEFAULT_HEALTH_POLICY: HealthPolicy = {
  stalenessMs: 120_000,
  maxLatencyMs: 3_000,
  switchMarginMs: 0,
};

export function isHealthy(node: ProxyNode, policy: HealthPolicy, now: number): boolean {
  const { reachable, latencyMs, checkedAt } = node.health;
  if (!reachable || latencyMs == null || checkedAt == null) return false;
  if (now - checkedAt > policy.stalenessMs) return false;
  return latencyMs < policy.maxLatencyMs;
}

function latencyOf(node: ProxyNode): number {
  return node.health.latencyMs ?? Number.POSITIVE_INFINITY;
}

// Array.prototype.sort is stable, so equal latencies keep pool order.
export function rankHealthy(nodes: readonly ProxyNode[], policy: HealthPolicy, now: number): ProxyNode[] {
  return nodes.filter((node) => isHealthy(node, policy, now)).sort((a, b) => latencyOf(a) - latencyOf(b));
}

export function evaluate(
  nodes: readonly ProxyNode[],
  activeName: string | null,
  policy: HealthPolicy,
  now: number,
): Decision {
  const ranked = rankHealthy(nodes, policy, now);
  const best = ranked[0];
  const active = activeName ? nodes.find((node) => node.name === activeName) : undefined;
  const activeHealthy = active ? isHealthy(active, policy, now) : false;

  if (active && activeHealthy) {
    if (!best || best.name === active.name || latencyOf(active) - latencyOf(best) <= policy.switchMarginMs) {
      return { kind: "keep", node: active };
    }
    return { kind: "switch", from: active.name, to: best, reason: "faster" };
  }

  if (!best) {
    return { kind: "none", candidates: nodes.length };
  }
  return {
    kind: "switch",
    from: activeName,
    to: best,
    reason: active ? "active_unhealthy" : "active_missing",
  };
}

export function pickBest(nodes: readonly ProxyNode[], policy: HealthPolicy, now: number): ProxyNode | null {
  return rankHealthy(nodes, policy, now)[0] ?? null;
}

/**
 * Next healthy node after `activeName` in pool order, wrapping around.
 * Falls back to the best-ranked node when the active one is not in the list.
 */
export function pickNext(
  nodes: readonly ProxyNode[],
  activeName: string | null,
  policy: HealthPolicy,
  now: number,
): ProxyNode | null {
  const start = activeName ? nodes.findIndex((node) => node.name === activeName) : -1;
  if (start < 0) return pickBest(nodes, policy, now);
  for (let step = 1; step < nodes.length; step += 1) {
    const candidate = nodes[(start + step) % nodes.length];
    if (candidate && isHealthy(candidate, policy, now)) return candidate;
  }
  return null;
}
