import pLimit from "p-limit";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { errorMessage, isRecoverable, WatcherError } from "../proxy/errors.js";
import { describeTrigger, nextFireTime, type Trigger } from "./trigger.js";

export type JobState = "idle" | "running" | "failed";

export interface JobContext {
  name: string;
  firedAt: Date;
  /** Aborted when a shutdown runs past its deadline; pass it to network calls. */
  signal: AbortSignal;
  /** True once shutdown has begun; check it between steps. */
  cancelled(): boolean;
}

export interface ScheduledJob {
  name: string;
  run(ctx: JobContext): Promise<void>;
}

export interface JobHandle {
  readonly id: number;
  readonly name: string;
}

export interface JobStatus {
  name: string;
  trigger: string;
  state: JobState;
  runs: number;
  failures: number;
  skipped: number;
  lastFiredAt: Date | null;
  lastFinishedAt: Date | null;
  lastError: string | null;
  nextFireAt: Date | null;
}

export interface StopReport {
  drained: boolean;
  abandoned: string[];
}

export interface SchedulerOptions {
  /** Maximum job runs executing at once across all jobs. */
  concurrency?: number;
  logger?: Logger;
  now?: () => number;
}

interface Entry {
  handle: JobHandle;
  job: ScheduledJob;
  trigger: Trigger;
  timer: ReturnType<typeof setTimeout> | null;
  running: Promise<void> | null;
  cancelled: boolean;
  status: JobStatus;
}

// setTimeout clamps anything above 2^31-1 ms; longer waits are split.
const MAX_TIMER_MS = 2_147_483_647;

export class Scheduler {
  private readonly entries = new Map<number, Entry>();

  private readonly limit: ReturnType<typeof pLimit>;

  private readonly abort = new AbortController();

  private readonly logger: Logger;

  private readonly now: () => number;

  private stopping = false;

  private nextId = 1;

  constructor(options: SchedulerOptions = {}) {
    this.limit = pLimit(Math.max(1, options.concurrency ?? 3));
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
  }

  schedule(job: ScheduledJob, trigger: Trigger, options?: { runOnStart?: boolean }): JobHandle {
    if (this.stopping) {
      throw new WatcherError("scheduler_stopped", "watcher", `cannot schedule ${job.name}: scheduler stopped`);
    }
    const handle: JobHandle = Object.freeze({ id: this.nextId++, name: job.name });
    const entry: Entry = {
      handle,
      job,
      trigger,
      timer: null,
      running: null,
      cancelled: false,
      status: {
        name: job.name,
        trigger: describeTrigger(trigger),
        state: "idle",
        runs: 0,
        failures: 0,
        skipped: 0,
        lastFiredAt: null,
        lastFinishedAt: null,
        lastError: null,
        nextFireAt: null,
      },
    };
    this.entries.set(handle.id, entry);
    this.arm(entry);
    this.logger.info({ job: job.name, trigger: entry.status.trigger, nextFireAt: entry.status.nextFireAt }, "job armed");
    if (options?.runOnStart) {
      void this.fire(entry);
    }
    return handle;
  }

  cancel(handle: JobHandle): void {
    const entry = this.entries.get(handle.id);
    if (!entry) return;
    entry.cancelled = true;
    this.clearTimer(entry);
    entry.status.nextFireAt = null;
    this.entries.delete(handle.id);
  }

  /** Fires a job outside its trigger. Resolves false when the firing was skipped. */
  async runNow(handle: JobHandle): Promise<boolean> {
    const entry = this.entries.get(handle.id);
    if (!entry) return false;
    return await this.fire(entry);
  }

  status(handle: JobHandle): JobStatus | undefined {
    const entry = this.entries.get(handle.id);
    return entry ? { ...entry.status } : undefined;
  }

  statuses(): JobStatus[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.status }));
  }

  inFlight(): string[] {
    return [...this.entries.values()].filter((entry) => entry.running).map((entry) => entry.job.name);
  }

  isStopping(): boolean {
    return this.stopping;
  }

  /**
   * Cancels every future firing, then waits up to `timeoutMs` for runs in
   * flight. Runs still going at the deadline get their signal aborted and are
   * reported as abandoned.
   */
  async stop(timeoutMs: number): Promise<StopReport> {
    this.stopping = true;
    for (const entry of this.entries.values()) {
      this.clearTimer(entry);
      entry.status.nextFireAt = null;
    }

    const running = [...this.entries.values()].filter((entry) => entry.running);
    if (running.length === 0) {
      return { drained: true, abandoned: [] };
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });
    const drained = Promise.all(running.map((entry) => entry.running)).then(() => true as const);
    const finished = await Promise.race([drained, deadline]);
    clearTimeout(timer);

    if (finished) {
      return { drained: true, abandoned: [] };
    }
    const abandoned = running.filter((entry) => entry.running).map((entry) => entry.job.name);
    this.abort.abort();
    this.logger.warn({ abandoned, timeoutMs }, "shutdown deadline passed, in-flight runs abandoned");
    return { drained: false, abandoned };
  }

  private clearTimer(entry: Entry): void {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }

  private arm(entry: Entry): void {
    const next = nextFireTime(entry.trigger, this.now());
    if (next == null) {
      entry.status.nextFireAt = null;
      this.logger.warn({ job: entry.job.name, trigger: entry.status.trigger }, "trigger has no future fire time");
      return;
    }
    entry.status.nextFireAt = new Date(next);
    this.setTimer(entry, next);
  }

  private setTimer(entry: Entry, at: number): void {
    const delay = Math.min(Math.max(0, at - this.now()), MAX_TIMER_MS);
    entry.timer = setTimeout(() => {
      entry.timer = null;
      if (this.stopping || entry.cancelled) return;
      if (this.now() < at) {
        this.setTimer(entry, at);
        return;
      }
      this.arm(entry);
      void this.fire(entry);
    }, delay);
  }

  private async fire(entry: Entry): Promise<boolean> {
    if (this.stopping || entry.cancelled) return false;
    if (entry.running) {
      entry.status.skipped += 1;
      this.logger.warn({ job: entry.job.name }, "previous run still in flight, firing skipped");
      return false;
    }
    const firedAt = new Date(this.now());
    entry.status.lastFiredAt = firedAt;
    const run = this.limit(() => this.execute(entry, firedAt));
    entry.running = run;
    try {
      await run;
    } finally {
      entry.running = null;
    }
    return true;
  }

  private async execute(entry: Entry, firedAt: Date): Promise<void> {
    if (this.stopping || entry.cancelled) return;
    const log = this.logger.child({ job: entry.job.name });
    const status = entry.status;
    status.state = "running";
    status.runs += 1;
    const startedAt = this.now();
    try {
      await entry.job.run({
        name: entry.job.name,
        firedAt,
        signal: this.abort.signal,
        cancelled: () => this.stopping || entry.cancelled,
      });
      status.state = "idle";
      status.lastError = null;
      log.debug({ firedAt: firedAt.toISOString(), durationMs: this.now() - startedAt }, "job run finished");
    } catch (error) {
      status.state = "failed";
      status.failures += 1;
      status.lastError = errorMessage(error);
      const details = {
        firedAt: firedAt.toISOString(),
        durationMs: this.now() - startedAt,
        code: error instanceof WatcherError ? error.code : undefined,
        err: error,
      };
      if (isRecoverable(error)) {
        log.warn(details, "job run failed");
      } else {
        log.error(details, "job run failed");
      }
    } finally {
      status.lastFinishedAt = new Date(this.now());
    }
  }
}
