export type ErrorStage = "config" | "subscription" | "backend" | "evaluator" | "watcher";

export class WatcherError extends Error {
  readonly code: string;

  readonly stage: ErrorStage;

  readonly retryable: boolean;

  constructor(
    code: string,
    stage: ErrorStage,
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
    this.retryable = options?.retryable ?? false;
  }
}

// subscription stage

export class FetchError extends WatcherError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("subscription_fetch_failed", "subscription", message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export interface DecodeAttempt {
  stage: "structured" | "base64";
  reason: string;
}

export class DecodeError extends WatcherError {
  readonly attempts: DecodeAttempt[];

  constructor(attempts: DecodeAttempt[]) {
    super(
      "subscription_decode_failed",
      "subscription",
      `subscription payload could not be decoded (${attempts.map((a) => `${a.stage}: ${a.reason}`).join("; ")})`,
    );
    this.attempts = attempts;
  }
}

export class NoNodesError extends WatcherError {
  readonly decoded: number;

  constructor(decoded: number) {
    super("subscription_no_nodes", "subscription", `no nodes left after filtering (decoded=${decoded})`);
    this.decoded = decoded;
  }
}

// backend stage

export class BackendUnavailable extends WatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("backend_unavailable", "backend", message, { cause: options?.cause, retryable: true });
  }
}

export class BackendResponseError extends WatcherError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("backend_bad_response", "backend", message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class UnknownNode extends WatcherError {
  readonly node: string;

  constructor(node: string, detail?: string) {
    super("backend_unknown_node", "backend", `unknown node: ${node}${detail ? ` (${detail})` : ""}`);
    this.node = node;
  }
}

export class ProbeTimeout extends WatcherError {
  readonly node: string;

  readonly timeoutMs: number;

  constructor(node: string, timeoutMs: number) {
    super("probe_timeout", "backend", `delay probe timed out: ${node} (${timeoutMs}ms)`);
    this.node = node;
    this.timeoutMs = timeoutMs;
  }
}

export class ProbeFailed extends WatcherError {
  readonly node: string;

  constructor(node: string, detail: string) {
    super("probe_failed", "backend", `delay probe failed: ${node} (${detail})`);
    this.node = node;
  }
}

// evaluator stage

export class NoHealthyNode extends WatcherError {
  readonly candidates: number;

  constructor(candidates: number) {
    super("no_healthy_node", "evaluator", `no healthy node among ${candidates} candidates`);
    this.candidates = candidates;
  }
}

// lifecycle

export class ConfigError extends WatcherError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config_invalid", "config", `invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class CancelledError extends WatcherError {
  constructor(what: string) {
    super("cancelled", "watcher", `cancelled: ${what}`);
  }
}

const RECOVERABLE_CODES = new Set([
  "subscription_fetch_failed",
  "subscription_decode_failed",
  "subscription_no_nodes",
  "backend_unavailable",
  "backend_unknown_node",
  "probe_timeout",
  "probe_failed",
  "no_healthy_node",
  "cancelled",
]);

export function isRecoverable(error: unknown): boolean {
  return error instanceof WatcherError && RECOVERABLE_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
