import { Mutex } from "async-mutex";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ProxyController } from "../proxy/adapter.js";
import { checkEgress, probeNodes } from "../proxy/check.js";
import { ConfigError, NoHealthyNode, WatcherError, errorMessage } from "../proxy/errors.js";
import { describeGeo } from "../proxy/geo.js";
import { evaluate, pickBest, pickNext, type HealthPolicy } from "../proxy/health.js";
import type { FetchLike } from "../proxy/http.js";
import { safeUrlForLog, type FilterPolicy, type ProxyNode } from "../proxy/node.js";
import { loadSubscription } from "../proxy/subscription.js";
import { PoolStore } from "./pool-store.js";
import { Scheduler, type JobContext, type JobHandle, type JobStatus, type StopReport } from "./scheduler.js";
import { parseTrigger, type Trigger } from "./trigger.js";

export type JobName = "updater" | "changer" | "checker";

export const JOB_NAMES: readonly JobName[] = ["updater", "changer", "checker"];

export interface WatcherJobConfig {
  enabled: boolean;
  trigger: string | Trigger;
  runOnStart?: boolean;
}

export interface WatcherOptions {
  subscription: {
    url: string;
    filter: FilterPolicy;
    timeoutMs: number;
    userAgent?: string;
    fetch?: FetchLike;
  };
  backend: ProxyController;
  health: HealthPolicy;
  probe: { timeoutMs: number; concurrency: number };
  jobs: Record<JobName, WatcherJobConfig>;
  /** Blocking: startup() resolves only after shutdown. Background: it resolves once jobs are armed. */
  blocking?: boolean;
  shutdownTimeoutMs?: number;
  workers?: number;
  /** Changer moves to the next healthy node on every firing instead of only repairing the selection. */
  rotate?: boolean;
  egress?: { enabled: boolean; timeoutMs?: number; ipinfoToken?: string };
  /** Install SIGINT/SIGTERM handlers; defaults to `blocking`. */
  handleSignals?: boolean;
  logger?: Logger;
  now?: () => number;
}

type SwitchReason = "active_missing" | "active_unhealthy" | "faster" | "outside_pool" | "rotation";

export class Watcher {
  readonly store = new PoolStore();

  private readonly options: WatcherOptions;

  private readonly scheduler: Scheduler;

  private readonly selectionLock = new Mutex();

  private readonly handles = new Map<JobName, JobHandle>();

  private readonly logger: Logger;

  private readonly now: () => number;

  private started = false;

  private stopping: Promise<StopReport> | null = null;

  private resolveStopped: ((report: StopReport) => void) | null = null;

  private readonly stopped: Promise<StopReport>;

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.logger.info({ signal }, "signal received, shutting down");
    void this.shutdown();
  };

  constructor(options: WatcherOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
    this.scheduler = new Scheduler({ concurrency: options.workers ?? 3, logger: this.logger, now: this.now });
    this.stopped = new Promise<StopReport>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  /** Checks the configuration without arming anything; returns the parsed triggers of enabled jobs. */
  validate(): Map<JobName, Trigger> {
    const issues: string[] = [];
    try {
      const url = new URL(this.options.subscription.url);
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        issues.push(`subscription url must be http(s), got ${url.protocol}`);
      }
    } catch {
      issues.push(`subscription url is not a valid URL: ${safeUrlForLog(this.options.subscription.url)}`);
    }

    const triggers = new Map<JobName, Trigger>();
    for (const name of JOB_NAMES) {
      const job = this.options.jobs[name];
      if (!job.enabled) continue;
      if (typeof job.trigger !== "string") {
        triggers.set(name, job.trigger);
        continue;
      }
      try {
        triggers.set(name, parseTrigger(job.trigger, `${name} trigger`));
      } catch (error) {
        issues.push(error instanceof ConfigError ? error.issues.join("; ") : errorMessage(error));
      }
    }
    if (triggers.size === 0 && issues.length === 0) {
      issues.push("no watcher job is enabled");
    }
    if (issues.length > 0) {
      throw new ConfigError(issues);
    }
    return triggers;
  }

  async startup(): Promise<void> {
    if (this.started) {
      throw new WatcherError("watcher_already_started", "watcher", "watcher already started");
    }
    const triggers = this.validate();
    this.started = true;

    for (const [name, trigger] of triggers) {
      const handle = this.scheduler.schedule(
        { name, run: (ctx) => this.runBody(name, ctx) },
        trigger,
        { runOnStart: this.options.jobs[name].runOnStart },
      );
      this.handles.set(name, handle);
    }

    const blocking = this.options.blocking ?? false;
    if (this.options.handleSignals ?? blocking) {
      process.once("SIGINT", this.onSignal);
      process.once("SIGTERM", this.onSignal);
    }
    this.logger.info(
      { jobs: [...triggers.keys()], blocking, subscription: safeUrlForLog(this.options.subscription.url) },
      "watcher started",
    );

    if (blocking) {
      await this.stopped;
    }
  }

  async shutdown(): Promise<StopReport> {
    if (!this.stopping) {
      this.stopping = this.drain();
    }
    return await this.stopping;
  }

  /** Resolves once shutdown has completed. */
  async waitStopped(): Promise<StopReport> {
    return await this.stopped;
  }

  async runJob(name: JobName): Promise<boolean> {
    const handle = this.handles.get(name);
    if (!handle) {
      throw new WatcherError("job_not_armed", "watcher", `job ${name} is not armed`);
    }
    return await this.scheduler.runNow(handle);
  }

  jobStatus(name: JobName): JobStatus | undefined {
    const handle = this.handles.get(name);
    return handle ? this.scheduler.status(handle) : undefined;
  }

  private async drain(): Promise<StopReport> {
    process.removeListener("SIGINT", this.onSignal);
    process.removeListener("SIGTERM", this.onSignal);
    const timeoutMs = this.options.shutdownTimeoutMs ?? 10_000;
    const report = await this.scheduler.stop(timeoutMs);
    this.logger.info(report, "watcher stopped");
    this.resolveStopped?.(report);
    return report;
  }

  private async runBody(name: JobName, ctx: JobContext): Promise<void> {
    const log = this.logger.child({ job: name });
    if (name === "updater") return await this.update(ctx, log);
    if (name === "changer") return await this.change(ctx, log);
    return await this.check(ctx, log);
  }

  private async update(ctx: JobContext, log: Logger): Promise<void> {
    const sub = this.options.subscription;
    const previous = this.store.current();
    try {
      const pool = await loadSubscription({
        url: sub.url,
        filter: sub.filter,
        timeoutMs: sub.timeoutMs,
        userAgent: sub.userAgent,
        fetch: sub.fetch,
        signal: ctx.signal,
        now: this.now,
      });
      if (ctx.cancelled()) {
        log.info("shutdown began during refresh, new pool discarded");
        return;
      }
      const result = this.store.install(pool);
      log.info(
        {
          nodes: pool.nodes.length,
          previous: result.previous?.nodes.length ?? 0,
          carried: result.carried,
          selectionDropped: result.selectionDropped,
        },
        "node pool installed",
      );
    } catch (error) {
      log.warn({ kept: previous?.nodes.length ?? 0, err: errorMessage(error) }, "refresh failed, previous pool kept");
      throw error;
    }
  }

  private async change(ctx: JobContext, log: Logger): Promise<void> {
    const pool = this.store.current();
    if (!pool) {
      log.info("no node pool installed yet, changer skipped");
      return;
    }
    const backend = this.options.backend;
    const candidates = await this.groupMembers(pool.nodes, ctx, log);
    if (ctx.cancelled()) return;

    await this.selectionLock.runExclusive(async () => {
      const active = await backend.getActive({ signal: ctx.signal });
      this.store.setActive(active);
      const activeInPool = active != null && candidates.some((node) => node.name === active);
      const rotate = this.options.rotate ?? false;
      if (activeInPool && !rotate) {
        log.debug({ active }, "active node is inside the filtered pool");
        return;
      }
      const now = this.now();
      const target =
        rotate && activeInPool
          ? pickNext(candidates, active, this.options.health, now)
          : pickBest(candidates, this.options.health, now);
      if (!target) {
        throw new NoHealthyNode(candidates.length);
      }
      if (target.name === active) return;
      await this.applySwitch(target, active, activeInPool ? "rotation" : "outside_pool", ctx, log);
    });
  }

  private async check(ctx: JobContext, log: Logger): Promise<void> {
    const pool = this.store.current();
    if (!pool) {
      log.info("no node pool installed yet, checker skipped");
      return;
    }
    const backend = this.options.backend;
    const candidates = await this.groupMembers(pool.nodes, ctx, log);
    const results = await probeNodes(backend, candidates, {
      timeoutMs: this.options.probe.timeoutMs,
      concurrency: this.options.probe.concurrency,
      signal: ctx.signal,
      now: this.now,
    });
    for (const result of results) {
      log.debug(result, "probe result");
    }
    log.info({ probed: results.length, reachable: results.filter((r) => r.ok).length }, "probe round finished");
    if (ctx.cancelled()) return;

    await this.selectionLock.runExclusive(async () => {
      const active = await backend.getActive({ signal: ctx.signal });
      this.store.setActive(active);
      const decision = evaluate(candidates, active, this.options.health, this.now());
      if (decision.kind === "keep") {
        log.debug({ active }, "active node healthy, no switch");
        return;
      }
      if (decision.kind === "none") {
        throw new NoHealthyNode(decision.candidates);
      }
      await this.applySwitch(decision.to, decision.from, decision.reason, ctx, log);
    });
  }

  // Pool nodes the selector group lists; only these can be made active.
  private async groupMembers(nodes: readonly ProxyNode[], ctx: JobContext, log: Logger): Promise<ProxyNode[]> {
    const known = new Set(await this.options.backend.listProxies({ signal: ctx.signal }));
    const members = nodes.filter((node) => known.has(node.name));
    if (members.length < nodes.length) {
      log.debug({ pool: nodes.length, known: members.length }, "pool nodes missing from backend group");
    }
    return members;
  }

  // Caller holds selectionLock.
  private async applySwitch(
    target: ProxyNode,
    from: string | null,
    reason: SwitchReason,
    ctx: JobContext,
    log: Logger,
  ): Promise<void> {
    if (ctx.cancelled()) return;
    if (!this.store.contains(target.name)) {
      log.warn({ target: target.name }, "target left the pool during evaluation, switch skipped");
      return;
    }
    await this.options.backend.setActive(target.name, { signal: ctx.signal });
    this.store.setActive(target.name);
    log.info({ from, to: target.name, latencyMs: target.health.latencyMs, reason }, "active node switched");
    await this.reportEgress(ctx, log);
  }

  private async reportEgress(ctx: JobContext, log: Logger): Promise<void> {
    const egress = this.options.egress;
    const proxyServer = this.options.backend.proxyServer;
    if (!egress?.enabled || !proxyServer) return;
    try {
      const geo = await checkEgress(proxyServer, {
        timeoutMs: egress.timeoutMs ?? this.options.probe.timeoutMs,
        ipinfoToken: egress.ipinfoToken,
        signal: ctx.signal,
      });
      log.info({ egress: describeGeo(geo) }, "egress after switch");
    } catch (error) {
      log.warn({ err: errorMessage(error) }, "egress check failed");
    }
  }
}
