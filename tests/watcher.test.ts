import { afterEach, describe, expect, it } from "vitest";
import { silentLogger } from "../src/logger.js";
import type { CallOptions, ProxyController } from "../src/proxy/adapter.js";
import { CancelledError, ConfigError, ProbeTimeout, UnknownNode } from "../src/proxy/errors.js";
import { DEFAULT_HEALTH_POLICY } from "../src/proxy/health.js";
import type { FetchLike } from "../src/proxy/http.js";
import { EMPTY_FILTER, recordProbe } from "../src/proxy/node.js";
import { Watcher, type WatcherOptions } from "../src/watcher/watcher.js";

function wait(ms: number): Promise<void> {
  return ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve();
}

function subscriptionBody(names: string[]): string {
  return ["proxies:", ...names.flatMap((name) => [`  - name: ${name}`, "    type: ss"]), ""].join("\n");
}

function subscriptionFetch(...bodies: Array<string | number>): FetchLike {
  let index = 0;
  return async () => {
    const body = bodies[Math.min(index, bodies.length - 1)];
    index += 1;
    return typeof body === "number" ? new Response("upstream error", { status: body }) : new Response(body ?? "");
  };
}

class FakeController implements ProxyController {
  readonly apiBaseUrl = "http://127.0.0.1:9090";

  readonly groupName = "PROXY";

  readonly delays = new Map<string, number | "timeout">();

  readonly events: string[] = [];

  probeCalls = 0;

  probeDelayMs = 0;

  switchDelayMs = 0;

  rejectSwitch = false;

  hangProbes = false;

  onProbe: (() => void) | undefined;

  constructor(
    public members: string[],
    public active: string | null,
  ) {}

  async listProxies(): Promise<string[]> {
    return [...this.members];
  }

  async getActive(): Promise<string | null> {
    return this.active;
  }

  async setActive(name: string): Promise<void> {
    this.events.push(`set:start:${name}`);
    await wait(this.switchDelayMs);
    if (this.rejectSwitch || !this.members.includes(name)) {
      this.events.push(`set:fail:${name}`);
      throw new UnknownNode(name, "not in group PROXY");
    }
    this.active = name;
    this.events.push(`set:end:${name}`);
  }

  async probeDelay(name: string, timeoutMs: number, options?: CallOptions): Promise<number> {
    this.probeCalls += 1;
    this.onProbe?.();
    if (this.hangProbes) {
      await new Promise<never>((_resolve, reject) => {
        options?.signal?.addEventListener("abort", () => reject(new CancelledError(`probe ${name}`)));
      });
    }
    await wait(this.probeDelayMs);
    const delay = this.delays.get(name);
    if (delay === undefined || delay === "timeout") {
      throw new ProbeTimeout(name, timeoutMs);
    }
    return delay;
  }
}

function options(backend: ProxyController, fetch: FetchLike, overrides: Partial<WatcherOptions> = {}): WatcherOptions {
  return {
    subscription: { url: "https://sub.example.test/clash", filter: EMPTY_FILTER, timeoutMs: 1_000, fetch },
    backend,
    health: DEFAULT_HEALTH_POLICY,
    probe: { timeoutMs: 500, concurrency: 8 },
    jobs: {
      updater: { enabled: true, trigger: "1h" },
      changer: { enabled: true, trigger: "1h" },
      checker: { enabled: true, trigger: "1h" },
    },
    blocking: false,
    handleSignals: false,
    shutdownTimeoutMs: 1_000,
    logger: silentLogger(),
    ...overrides,
  };
}

function seedHealth(watcher: Watcher, latencies: Record<string, number>): void {
  for (const node of watcher.store.current()?.nodes ?? []) {
    const latency = latencies[node.name];
    recordProbe(node, { latencyMs: latency ?? null, checkedAt: Date.now() });
  }
}

const running: Watcher[] = [];

async function start(opts: WatcherOptions): Promise<Watcher> {
  const watcher = new Watcher(opts);
  running.push(watcher);
  await watcher.startup();
  return watcher;
}

afterEach(async () => {
  await Promise.all(running.splice(0).map((watcher) => watcher.shutdown()));
});

describe("Watcher", () => {
  it("switches away from a timed-out active node to the fastest one", async () => {
    const backend = new FakeController(["fast", "mid", "dead"], "dead");
    backend.delays.set("fast", 50);
    backend.delays.set("mid", 200);
    backend.delays.set("dead", "timeout");
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["fast", "mid", "dead"]))));

    await watcher.runJob("updater");
    await watcher.runJob("checker");

    expect(backend.events).toEqual(["set:start:fast", "set:end:fast"]);
    expect(backend.active).toBe("fast");
    expect(watcher.store.active()).toBe("fast");
    expect(watcher.jobStatus("checker")).toMatchObject({ state: "idle", runs: 1, failures: 0 });
  });

  it("ranks only nodes the backend group lists", async () => {
    const backend = new FakeController(["mid", "dead"], "dead");
    backend.delays.set("fast", 50);
    backend.delays.set("mid", 200);
    backend.delays.set("dead", "timeout");
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["fast", "mid", "dead"]))));

    await watcher.runJob("updater");
    await watcher.runJob("checker");
    await watcher.runJob("checker");

    expect(backend.events).toEqual(["set:start:mid", "set:end:mid"]);
    expect(backend.active).toBe("mid");
    expect(backend.probeCalls).toBe(4);
    expect(watcher.jobStatus("checker")).toMatchObject({ state: "idle", runs: 2, failures: 0 });
  });

  it("keeps a healthy active node on the next round", async () => {
    const backend = new FakeController(["fast", "mid"], "fast");
    backend.delays.set("fast", 50);
    backend.delays.set("mid", 200);
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["fast", "mid"]))));

    await watcher.runJob("updater");
    await watcher.runJob("checker");
    await watcher.runJob("checker");

    expect(backend.events).toEqual([]);
    expect(watcher.store.active()).toBe("fast");
  });

  it("records a failed changer run and keeps the job armed", async () => {
    const backend = new FakeController(["HK-01", "HK-02", "US-01"], "US-01");
    backend.rejectSwitch = true;
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["HK-01", "HK-02"]))));
    await watcher.runJob("updater");
    seedHealth(watcher, { "HK-01": 50, "HK-02": 80 });

    await expect(watcher.runJob("changer")).resolves.toBe(true);
    const failed = watcher.jobStatus("changer");
    expect(failed).toMatchObject({ state: "failed", failures: 1, lastError: "unknown node: HK-01 (not in group PROXY)" });
    expect(failed?.nextFireAt).toBeInstanceOf(Date);

    backend.rejectSwitch = false;
    await watcher.runJob("changer");
    expect(watcher.jobStatus("changer")).toMatchObject({ state: "idle", runs: 2, failures: 1 });
    expect(backend.active).toBe("HK-01");
  });

  it("leaves an active node inside the pool alone", async () => {
    const backend = new FakeController(["HK-01", "HK-02"], "HK-02");
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["HK-01", "HK-02"]))));
    await watcher.runJob("updater");
    seedHealth(watcher, { "HK-01": 50, "HK-02": 80 });

    await watcher.runJob("changer");
    expect(backend.events).toEqual([]);
    expect(watcher.store.active()).toBe("HK-02");
  });

  it("skips the changer until a pool exists", async () => {
    const backend = new FakeController(["HK-01"], null);
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["HK-01"]))));
    await watcher.runJob("changer");
    expect(watcher.jobStatus("changer")).toMatchObject({ state: "idle", failures: 0 });
    expect(backend.events).toEqual([]);
  });

  it("never interleaves switches from the changer and the checker", async () => {
    const backend = new FakeController(["HK-01", "HK-02"], "HK-01");
    backend.delays.set("HK-01", 50);
    backend.delays.set("HK-02", 80);
    backend.probeDelayMs = 10;
    backend.switchDelayMs = 30;
    const watcher = await start(
      options(backend, subscriptionFetch(subscriptionBody(["HK-01", "HK-02"])), { rotate: true }),
    );
    await watcher.runJob("updater");
    seedHealth(watcher, { "HK-01": 50, "HK-02": 80 });

    await Promise.all([watcher.runJob("changer"), watcher.runJob("checker")]);

    expect(backend.events).toEqual(["set:start:HK-02", "set:end:HK-02", "set:start:HK-01", "set:end:HK-01"]);
    expect(backend.active).toBe("HK-01");
  });

  it("keeps the previous pool when a refresh fails", async () => {
    const backend = new FakeController(["HK-01"], "HK-01");
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["HK-01"]), 500)));

    await watcher.runJob("updater");
    const first = watcher.store.current();
    await watcher.runJob("updater");

    expect(watcher.store.current()).toBe(first);
    expect(watcher.jobStatus("updater")).toMatchObject({
      state: "failed",
      failures: 1,
      lastError: "subscription_http_failed:500",
    });
  });

  it("abandons a stuck probe round at the shutdown deadline", async () => {
    const backend = new FakeController(["a", "b", "c"], "a");
    backend.hangProbes = true;
    let probing: () => void = () => undefined;
    const probeStarted = new Promise<void>((resolve) => {
      probing = resolve;
    });
    backend.onProbe = () => probing();
    const watcher = await start(
      options(backend, subscriptionFetch(subscriptionBody(["a", "b", "c"])), { shutdownTimeoutMs: 50 }),
    );
    await watcher.runJob("updater");

    const round = watcher.runJob("checker");
    await probeStarted;
    const began = Date.now();
    const report = await watcher.shutdown();

    expect(report).toEqual({ drained: false, abandoned: ["checker"] });
    expect(Date.now() - began).toBeLessThan(1_000);
    await expect(round).resolves.toBe(true);
    expect(watcher.jobStatus("checker")?.state).toBe("failed");
    await expect(watcher.waitStopped()).resolves.toEqual(report);

    const calls = backend.probeCalls;
    await expect(watcher.runJob("checker")).resolves.toBe(false);
    expect(backend.probeCalls).toBe(calls);
    expect(backend.events).toEqual([]);
  });

  it("blocks in startup until shutdown when blocking", async () => {
    const backend = new FakeController(["HK-01"], "HK-01");
    const watcher = new Watcher(options(backend, subscriptionFetch(subscriptionBody(["HK-01"])), { blocking: true }));
    let returned = false;
    const startup = watcher.startup().then(() => {
      returned = true;
    });
    await wait(10);
    expect(returned).toBe(false);
    await watcher.shutdown();
    await startup;
    expect(returned).toBe(true);
  });

  it("refuses a second startup", async () => {
    const backend = new FakeController(["HK-01"], "HK-01");
    const watcher = await start(options(backend, subscriptionFetch(subscriptionBody(["HK-01"]))));
    await expect(watcher.startup()).rejects.toMatchObject({ code: "watcher_already_started" });
  });

  describe("validate", () => {
    const backend = new FakeController([], null);
    const fetch = subscriptionFetch(subscriptionBody(["HK-01"]));

    function issuesOf(opts: WatcherOptions): string[] {
      try {
        new Watcher(opts).validate();
      } catch (error) {
        if (error instanceof ConfigError) return error.issues;
        throw error;
      }
      return [];
    }

    it("requires at least one enabled job", () => {
      const jobs = {
        updater: { enabled: false, trigger: "1h" },
        changer: { enabled: false, trigger: "1h" },
        checker: { enabled: false, trigger: "1h" },
      };
      expect(issuesOf(options(backend, fetch, { jobs }))).toEqual(["no watcher job is enabled"]);
    });

    it("rejects a non-http subscription url", () => {
      const opts = options(backend, fetch);
      opts.subscription = { ...opts.subscription, url: "ftp://sub.example.test/clash" };
      expect(issuesOf(opts)).toEqual(["subscription url must be http(s), got ftp:"]);
    });

    it("rejects an unparseable trigger", () => {
      const opts = options(backend, fetch);
      opts.jobs = { ...opts.jobs, checker: { enabled: true, trigger: "whenever" } };
      expect(issuesOf(opts)).toEqual(['checker trigger: unrecognized trigger "whenever"']);
    });

    it("fails startup on invalid configuration", async () => {
      const opts = options(backend, fetch);
      opts.subscription = { ...opts.subscription, url: "not a url" };
      await expect(new Watcher(opts).startup()).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
