import { Mutex } from "async-mutex";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { CallOptions, ProxyController, ProxyGroup } from "./adapter.js";
import {
  BackendResponseError,
  BackendUnavailable,
  ProbeFailed,
  ProbeTimeout,
  UnknownNode,
  type WatcherError,
} from "./errors.js";
import { DEFAULT_RETRY, requestJson, trunc, withRetry, type FetchLike, type JsonResponse, type RetryPolicy } from "./http.js";

export interface MihomoConfig {
  apiBaseUrl: string;
  secret?: string;
  groupName: string;
  checkUrl: string;
  /** Mixed-port proxy URL of the daemon, used for egress checks. */
  proxyServer?: string;
  requestTimeoutMs: number;
  probeGraceMs?: number;
  retry?: RetryPolicy;
  fetch?: FetchLike;
  logger?: Logger;
}

const BUILTIN_PROXIES = new Set(["DIRECT", "REJECT", "REJECT-DROP", "PASS", "COMPATIBLE"]);

const GroupSchema = z.object({
  name: z.string().optional().catch(undefined),
  type: z.string().optional().catch(undefined),
  now: z.string().optional().catch(undefined),
  all: z.array(z.unknown()).optional().catch(undefined),
});

const DelaySchema = z.object({
  delay: z.number().optional().catch(undefined),
  message: z.string().optional().catch(undefined),
});

interface RequestSpec {
  body?: unknown;
  signal?: AbortSignal;
  timeoutMs?: number;
  onTimeout?: () => WatcherError;
  // Probe endpoints report node failures as 5xx; those are not daemon outages.
  serverErrorsAreAnswers?: boolean;
}

export class MihomoController implements ProxyController {
  readonly apiBaseUrl: string;

  readonly groupName: string;

  readonly proxyServer?: string;

  private readonly cfg: MihomoConfig;

  private readonly fetchImpl: FetchLike;

  private readonly logger: Logger;

  private readonly switchLock = new Mutex();

  constructor(cfg: MihomoConfig) {
    this.cfg = cfg;
    this.apiBaseUrl = cfg.apiBaseUrl.replace(/\/+$/, "");
    this.groupName = cfg.groupName;
    this.proxyServer = cfg.proxyServer;
    this.fetchImpl = cfg.fetch ?? fetch;
    this.logger = cfg.logger ?? silentLogger();
  }

  private headers(): Record<string, string> {
    return this.cfg.secret ? { Authorization: `Bearer ${this.cfg.secret}` } : {};
  }

  private async request(method: string, path: string, spec: RequestSpec = {}): Promise<JsonResponse> {
    const url = `${this.apiBaseUrl}${path}`;
    return await withRetry(
      async () => {
        const resp = await requestJson(this.fetchImpl, method, url, {
          headers: this.headers(),
          body: spec.body,
          timeoutMs: spec.timeoutMs ?? this.cfg.requestTimeoutMs,
          signal: spec.signal,
          onTimeout: spec.onTimeout,
        });
        if (resp.status >= 500 && !spec.serverErrorsAreAnswers) {
          throw new BackendUnavailable(`mihomo_http_failed:${resp.status}:${trunc(resp.body)}`);
        }
        return resp;
      },
      this.cfg.retry ?? DEFAULT_RETRY,
      {
        signal: spec.signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.debug({ method, path, attempt, delayMs, err: error.message }, "mihomo request retry");
        },
      },
    );
  }

  async getGroup(options?: CallOptions): Promise<ProxyGroup> {
    const path = `/proxies/${encodeURIComponent(this.groupName)}`;
    const resp = await this.request("GET", path, { signal: options?.signal });
    if (resp.status === 404) {
      throw new BackendResponseError(`mihomo_group_missing:${this.groupName}`, { status: 404 });
    }
    if (!resp.ok) {
      throw new BackendResponseError(`mihomo_http_failed:${resp.status}:${trunc(resp.body)}`, { status: resp.status });
    }
    const parsed = GroupSchema.safeParse(resp.body);
    if (!parsed.success) {
      throw new BackendResponseError(`mihomo_bad_payload:${path}:${trunc(resp.body)}`);
    }
    const all = (parsed.data.all || []).filter((item): item is string => typeof item === "string");
    return {
      name: parsed.data.name || this.groupName,
      type: parsed.data.type,
      now: parsed.data.now,
      all,
    };
  }

  async listProxies(options?: CallOptions): Promise<string[]> {
    const group = await this.getGroup(options);
    return group.all.filter((name) => !BUILTIN_PROXIES.has(name.trim().toUpperCase()));
  }

  async getActive(options?: CallOptions): Promise<string | null> {
    const group = await this.getGroup(options);
    return group.now && group.now.trim() ? group.now : null;
  }

  async setActive(name: string, options?: CallOptions): Promise<void> {
    await this.switchLock.runExclusive(async () => {
      const names = await this.listProxies(options);
      if (!names.includes(name)) {
        throw new UnknownNode(name, `not in group ${this.groupName}`);
      }
      const resp = await this.request("PUT", `/proxies/${encodeURIComponent(this.groupName)}`, {
        body: { name },
        signal: options?.signal,
      });
      if (resp.status === 400 || resp.status === 404) {
        throw new UnknownNode(name, trunc(resp.body));
      }
      if (!resp.ok) {
        throw new BackendResponseError(`mihomo_http_failed:${resp.status}:${trunc(resp.body)}`, {
          status: resp.status,
        });
      }
      this.logger.debug({ group: this.groupName, node: name }, "group selection updated");
    });
  }

  async probeDelay(name: string, timeoutMs: number, options?: CallOptions): Promise<number> {
    const query = `url=${encodeURIComponent(this.cfg.checkUrl)}&timeout=${timeoutMs}`;
    const resp = await this.request("GET", `/proxies/${encodeURIComponent(name)}/delay?${query}`, {
      signal: options?.signal,
      timeoutMs: timeoutMs + (this.cfg.probeGraceMs ?? 3_000),
      onTimeout: () => new ProbeTimeout(name, timeoutMs),
      serverErrorsAreAnswers: true,
    });
    const parsed = DelaySchema.safeParse(resp.body);
    const payload: { delay?: number; message?: string } = parsed.success ? parsed.data : {};
    if (resp.status === 408) {
      throw new ProbeTimeout(name, timeoutMs);
    }
    if (resp.status === 404) {
      throw new ProbeFailed(name, "not found");
    }
    if (!resp.ok) {
      throw new ProbeFailed(name, `status ${resp.status}${payload.message ? `: ${payload.message}` : ""}`);
    }
    const delay = payload.delay;
    if (typeof delay !== "number" || !Number.isFinite(delay) || delay <= 0) {
      throw new ProbeFailed(name, "missing delay");
    }
    return delay;
  }
}
