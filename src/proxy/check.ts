import pLimit from "p-limit";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import type { ProxyController } from "./adapter.js";
import { errorMessage, ProbeFailed, ProbeTimeout } from "./errors.js";
import { parseIpInfoPayload, type GeoInfo } from "./geo.js";
import { createDeadline } from "./http.js";
import { recordProbe, type ProxyNode } from "./node.js";

export interface NodeCheckResult {
  name: string;
  latencyMs: number | null;
  ok: boolean;
  code?: string;
  error?: string;
}

export interface NodeEgressResult extends NodeCheckResult {
  geo?: GeoInfo;
  geoError?: string;
}

export type EgressLookup = (
  proxyUrl: string,
  options: { timeoutMs: number; ipinfoToken?: string; signal?: AbortSignal },
) => Promise<GeoInfo>;

export interface ProbeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Probes one node through the daemon and writes the outcome into its health
 * record. Node-level failures become an unreachable record; daemon outages and
 * cancellation propagate, since they say nothing about the node.
 */
export async function probeNode(
  controller: ProxyController,
  node: ProxyNode,
  options: ProbeOptions,
): Promise<NodeCheckResult> {
  const now = options.now ?? Date.now;
  try {
    const latency = await controller.probeDelay(node.name, options.timeoutMs, { signal: options.signal });
    recordProbe(node, { latencyMs: latency, checkedAt: now() });
    return { name: node.name, latencyMs: latency, ok: true };
  } catch (error) {
    if (error instanceof ProbeTimeout || error instanceof ProbeFailed) {
      recordProbe(node, { latencyMs: null, checkedAt: now() });
      return { name: node.name, latencyMs: null, ok: false, code: error.code, error: error.message };
    }
    throw error;
  }
}

export async function probeNodes(
  controller: ProxyController,
  nodes: readonly ProxyNode[],
  options: ProbeOptions & { concurrency: number },
): Promise<NodeCheckResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency));
  try {
    return await Promise.all(nodes.map((node) => limit(() => probeNode(controller, node, options))));
  } finally {
    limit.clearQueue();
  }
}

/**
 * Probes a node and, when it answers, makes it the group's selection before
 * reading the exit IP through the daemon's proxy port, so the lookup goes out
 * through that node.
 */
export async function checkNode(
  controller: ProxyController,
  node: ProxyNode,
  options: ProbeOptions & { ipinfoToken?: string; lookup?: EgressLookup },
): Promise<NodeEgressResult> {
  const result = await probeNode(controller, node, options);
  const proxyServer = controller.proxyServer;
  if (!result.ok || !proxyServer) return result;

  await controller.setActive(node.name, { signal: options.signal });
  const lookup = options.lookup ?? checkEgress;
  try {
    const geo = await lookup(proxyServer, {
      timeoutMs: options.timeoutMs,
      ipinfoToken: options.ipinfoToken,
      signal: options.signal,
    });
    return { ...result, geo };
  } catch (error) {
    return { ...result, geoError: errorMessage(error) };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function checkEgress(
  proxyUrl: string,
  options: { timeoutMs: number; ipinfoToken?: string; signal?: AbortSignal },
): Promise<GeoInfo> {
  const url = new URL("https://ipinfo.io/json");
  if (options.ipinfoToken && options.ipinfoToken.trim()) {
    url.searchParams.set("token", options.ipinfoToken.trim());
  }
  const agent = new ProxyAgent(proxyUrl);
  const deadline = createDeadline(options.timeoutMs, options.signal);
  try {
    const resp = await undiciFetch(url, {
      dispatcher: agent,
      signal: deadline.signal,
      headers: { Accept: "application/json" },
    });
    if (!resp.ok) {
      throw new Error(`egress_check_failed:${resp.status}`);
    }
    const payload: unknown = await resp.json();
    if (!isRecord(payload)) {
      throw new Error("egress_check_bad_payload");
    }
    return parseIpInfoPayload(payload);
  } finally {
    deadline.dispose();
    await agent.close();
  }
}
