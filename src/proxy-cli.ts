#!/usr/bin/env node
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { loadConfig, type AppConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { checkNode, probeNodes, type NodeCheckResult } from "./proxy/check.js";
import { ConfigError, errorMessage } from "./proxy/errors.js";
import { describeGeo } from "./proxy/geo.js";
import { pickBest } from "./proxy/health.js";
import { MihomoController } from "./proxy/mihomo.js";
import { emptyHealth, type ProxyNode } from "./proxy/node.js";
import { loadSubscription } from "./proxy/subscription.js";
import { Watcher } from "./watcher/watcher.js";

const COMMANDS = ["watch", "nodes", "check-all", "check", "set", "status"] as const;

type Command = (typeof COMMANDS)[number];

const OUTPUT_DIR = path.resolve("output", "proxy");

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArgs(argv: string[]): { node?: string } {
  let node: string | undefined;
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) continue;
    const next = argv[i + 1];
    if (arg === "--node" && next) {
      node = next;
      i += 1;
      continue;
    }
    if (arg.startsWith("--node=")) {
      node = arg.slice("--node=".length);
    }
  }
  return { node: node?.trim() || undefined };
}

async function writeJson(filename: string, payload: unknown): Promise<void> {
  await mkdir(OUTPUT_DIR, { recursive: true });
  await writeFile(path.join(OUTPUT_DIR, filename), `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

function printResult(result: NodeCheckResult): void {
  const parts = [
    result.name,
    result.ok ? "OK" : "FAIL",
    typeof result.latencyMs === "number" ? `${result.latencyMs}ms` : "n/a",
    result.ok ? "" : result.error || "",
  ].filter(Boolean);
  console.log(parts.join(" | "));
}

function printUsage(): void {
  console.log("Usage: proxy-watcher watch");
  console.log("       proxy-watcher nodes");
  console.log("       proxy-watcher check-all");
  console.log("       proxy-watcher check --node <name>");
  console.log("       proxy-watcher set --node <name>");
  console.log("       proxy-watcher status");
}

function buildController(cfg: AppConfig, logger: Logger): MihomoController {
  return new MihomoController({ ...cfg.mihomo, logger: logger.child({ component: "mihomo" }) });
}

function requireNode(node: string | undefined): string {
  if (!node) throw new ConfigError(["--node is required"]);
  return node;
}

async function fetchPool(cfg: AppConfig) {
  return await loadSubscription({
    url: cfg.subscription.url,
    filter: cfg.subscription.filter,
    timeoutMs: cfg.subscription.timeoutMs,
    userAgent: cfg.subscription.userAgent,
  });
}

async function watch(cfg: AppConfig, logger: Logger): Promise<void> {
  const watcher = new Watcher({
    subscription: cfg.subscription,
    backend: buildController(cfg, logger),
    health: cfg.health,
    probe: cfg.probe,
    jobs: cfg.watcher.jobs,
    blocking: cfg.watcher.blocking,
    shutdownTimeoutMs: cfg.watcher.shutdownTimeoutMs,
    workers: cfg.watcher.workers,
    rotate: cfg.watcher.rotate,
    egress: { enabled: cfg.egress.enabled, ipinfoToken: cfg.egress.ipinfoToken },
    handleSignals: true,
    logger,
  });
  await watcher.startup();
  if (!cfg.watcher.blocking) {
    await watcher.waitStopped();
  }
}

async function run(): Promise<void> {
  const [command] = process.argv.slice(2);
  const args = parseArgs(process.argv.slice(3));

  if (!isCommand(command)) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const cfg = loadConfig();
  const logger = createLogger({ level: cfg.logLevel, name: "proxy-watcher" });

  if (command === "watch") {
    await watch(cfg, logger);
    return;
  }

  if (command === "nodes") {
    const pool = await fetchPool(cfg);
    for (const node of pool.nodes) {
      console.log([node.name, node.type, node.server ? `${node.server}:${node.port ?? "?"}` : ""].filter(Boolean).join(" | "));
    }
    console.log(`${pool.nodes.length} node(s) from ${pool.source}`);
    return;
  }

  const controller = buildController(cfg, logger);

  if (command === "status") {
    const [active, names] = await Promise.all([controller.getActive(), controller.listProxies()]);
    console.log(`Group: ${controller.groupName}`);
    console.log(`Active: ${active ?? "(none)"}`);
    console.log(`Members: ${names.length}`);
    return;
  }

  if (command === "set") {
    const node = requireNode(args.node);
    await controller.setActive(node);
    const now = await controller.getActive();
    console.log(`Selected: ${now || node}`);
    return;
  }

  if (command === "check") {
    const name = requireNode(args.node);
    const node: ProxyNode = { name, type: "unknown", params: {}, health: emptyHealth() };
    const result = await checkNode(controller, node, {
      timeoutMs: cfg.probe.timeoutMs,
      ipinfoToken: cfg.egress.ipinfoToken,
    });
    printResult(result);
    if (result.geo) {
      console.log(`Egress: ${describeGeo(result.geo)}`);
    } else if (result.geoError) {
      console.log(`Egress: lookup failed (${result.geoError})`);
    }
    await writeJson("check-single.json", result);
    return;
  }

  const pool = await fetchPool(cfg);
  const results = await probeNodes(controller, pool.nodes, {
    timeoutMs: cfg.probe.timeoutMs,
    concurrency: cfg.probe.concurrency,
  });
  for (const result of results) {
    printResult(result);
  }
  const best = pickBest(pool.nodes, cfg.health, Date.now());
  console.log(`Best: ${best ? `${best.name} (${best.health.latencyMs}ms)` : "(none healthy)"}`);
  await writeJson("check-all.json", results);
}

run().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    for (const issue of error.issues) console.error(`config: ${issue}`);
  } else {
    console.error(errorMessage(error));
  }
  process.exitCode = 1;
});
