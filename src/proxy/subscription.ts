import { parse as yamlParse } from "yaml";
import { CancelledError, DecodeError, FetchError, NoNodesError, type DecodeAttempt } from "./errors.js";
import { createDeadline, type FetchLike } from "./http.js";
import {
  applyFilter,
  createPool,
  emptyHealth,
  safeUrlForLog,
  type FilterPolicy,
  type NodePool,
  type ProxyNode,
} from "./node.js";

export type RawNodeRecord = Record<string, unknown>;

export interface SubscriptionOptions {
  url: string;
  filter: FilterPolicy;
  timeoutMs: number;
  userAgent?: string;
  signal?: AbortSignal;
  fetch?: FetchLike;
  now?: () => number;
}

type DecodeOutcome = { ok: true; records: RawNodeRecord[] } | { ok: false; attempt: DecodeAttempt };

export const DEFAULT_USER_AGENT = "clash.meta proxy-pool-watcher";

function isRecord(value: unknown): value is RawNodeRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function looksLikeBase64(text: string): boolean {
  const compact = text.replace(/\s+/g, "");
  if (!compact || compact.length % 4 === 1) return false;
  return /^[A-Za-z0-9+/_-]+={0,2}$/.test(compact);
}

function parseStructured(text: string, stage: DecodeAttempt["stage"]): DecodeOutcome {
  let parsed: unknown;
  try {
    parsed = yamlParse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message.split("\n")[0] || "parse error" : "parse error";
    return { ok: false, attempt: { stage, reason } };
  }
  if (!isRecord(parsed)) {
    return { ok: false, attempt: { stage, reason: "document is not a mapping" } };
  }
  const proxies = parsed.proxies;
  if (!Array.isArray(proxies)) {
    return { ok: false, attempt: { stage, reason: "missing proxies list" } };
  }
  return { ok: true, records: proxies.filter(isRecord) };
}

function decodeBase64Stage(text: string): DecodeOutcome {
  if (!looksLikeBase64(text)) {
    return { ok: false, attempt: { stage: "base64", reason: "not base64" } };
  }
  const compact = text.replace(/\s+/g, "").replace(/-/g, "+").replace(/_/g, "/");
  const decoded = Buffer.from(compact, "base64").toString("utf8");
  if (!decoded.trim()) {
    return { ok: false, attempt: { stage: "base64", reason: "empty after decoding" } };
  }
  return parseStructured(decoded, "base64");
}

export function decodeSubscription(text: string): RawNodeRecord[] {
  const structured = parseStructured(text, "structured");
  if (structured.ok) return structured.records;

  const encoded = decodeBase64Stage(text.trim());
  if (encoded.ok) return encoded.records;

  throw new DecodeError([structured.attempt, encoded.attempt]);
}

export function toProxyNode(record: RawNodeRecord): ProxyNode | null {
  const name = typeof record.name === "string" ? record.name.trim() : "";
  const type = typeof record.type === "string" ? record.type.trim() : "";
  if (!name || !type) return null;
  const port = typeof record.port === "number" ? record.port : Number.parseInt(String(record.port ?? ""), 10);
  return {
    name,
    type,
    server: typeof record.server === "string" ? record.server : undefined,
    port: Number.isFinite(port) ? port : undefined,
    params: Object.freeze({ ...record }),
    health: emptyHealth(),
  };
}

export function toProxyNodes(records: readonly RawNodeRecord[]): ProxyNode[] {
  const seen = new Set<string>();
  const nodes: ProxyNode[] = [];
  for (const record of records) {
    const node = toProxyNode(record);
    if (!node || seen.has(node.name)) continue;
    seen.add(node.name);
    nodes.push(node);
  }
  return nodes;
}

export async function fetchSubscriptionText(
  url: string,
  options: { timeoutMs: number; userAgent?: string; signal?: AbortSignal; fetch?: FetchLike },
): Promise<string> {
  const fetchImpl = options.fetch ?? fetch;
  const deadline = createDeadline(options.timeoutMs, options.signal);
  try {
    const resp = await fetchImpl(url, {
      headers: {
        Accept: "text/plain, application/yaml, text/yaml, */*",
        "User-Agent": options.userAgent || DEFAULT_USER_AGENT,
      },
      signal: deadline.signal,
    });
    if (!resp.ok) {
      throw new FetchError(`subscription_http_failed:${resp.status}`, { status: resp.status });
    }
    return await resp.text();
  } catch (error) {
    if (error instanceof FetchError) throw error;
    if (deadline.cancelled()) throw new CancelledError(`subscription ${safeUrlForLog(url)}`);
    if (deadline.timedOut()) {
      throw new FetchError(`subscription_timeout:${options.timeoutMs}ms`, { cause: error });
    }
    throw new FetchError(`subscription_network_failed:${safeUrlForLog(url)}`, { cause: error });
  } finally {
    deadline.dispose();
  }
}

export async function loadSubscription(options: SubscriptionOptions): Promise<NodePool> {
  const text = await fetchSubscriptionText(options.url, options);
  const nodes = toProxyNodes(decodeSubscription(text));
  const filtered = applyFilter(nodes, options.filter);
  if (filtered.length === 0) {
    throw new NoNodesError(nodes.length);
  }
  return createPool(filtered, safeUrlForLog(options.url), options.now ? options.now() : Date.now());
}
