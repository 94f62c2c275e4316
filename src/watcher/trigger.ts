import { ConfigError } from "../proxy/errors.js";

export type Trigger = { kind: "interval"; everyMs: number } | { kind: "cron"; expression: string; cron: CronSchedule };

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

export function parseDuration(raw: string): number | null {
  const text = raw.trim().toLowerCase();
  if (!text) return null;
  if (/^\d+$/.test(text)) {
    const seconds = Number.parseInt(text, 10);
    return seconds > 0 ? seconds * 1_000 : null;
  }
  const pattern = /(\d+)(ms|s|m|h|d)/gy;
  let total = 0;
  let consumed = 0;
  for (const match of text.matchAll(pattern)) {
    const [whole, amount, unit] = match;
    const factor = unit ? DURATION_UNITS[unit] : undefined;
    if (!amount || factor === undefined) return null;
    total += Number.parseInt(amount, 10) * factor;
    consumed += whole.length;
  }
  return consumed === text.length && total > 0 ? total : null;
}

interface CronField {
  values: Set<number>;
  wildcard: boolean;
}

const FIELD_BOUNDS: Array<[string, number, number]> = [
  ["minute", 0, 59],
  ["hour", 0, 23],
  ["day-of-month", 1, 31],
  ["month", 1, 12],
  ["day-of-week", 0, 7],
];

// Five years covers every satisfiable five-field expression (Feb 29 included).
const SEARCH_LIMIT_MS = 5 * 366 * 86_400_000;

function toInt(raw: string | undefined): number {
  return raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
}

function parseField(raw: string, label: string, min: number, max: number): CronField {
  const values = new Set<number>();
  for (const part of raw.split(",")) {
    const [rangePart, stepPart] = part.split("/");
    const step = stepPart === undefined ? 1 : toInt(stepPart);
    if (!rangePart || !Number.isInteger(step) || step < 1) {
      throw new Error(`bad ${label} field "${raw}"`);
    }
    let lo = min;
    let hi = max;
    if (rangePart !== "*") {
      const [startRaw, endRaw] = rangePart.split("-");
      lo = toInt(startRaw);
      hi = endRaw === undefined ? (stepPart === undefined ? lo : max) : toInt(endRaw);
      if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < min || hi > max || lo > hi) {
        throw new Error(`bad ${label} field "${raw}"`);
      }
    }
    for (let value = lo; value <= hi; value += step) values.add(value);
  }
  return { values, wildcard: raw.startsWith("*") };
}

export class CronSchedule {
  private readonly minute: CronField;

  private readonly hour: CronField;

  private readonly dayOfMonth: CronField;

  private readonly month: CronField;

  private readonly dayOfWeek: CronField;

  constructor(expression: string) {
    const parts = expression.trim().split(/\s+/);
    if (parts.length !== 5) {
      throw new Error(`cron expression needs 5 fields, got ${parts.length}`);
    }
    const fields = parts.map((part, index) => {
      const bounds = FIELD_BOUNDS[index];
      if (!bounds) throw new Error("cron field out of range");
      return parseField(part, bounds[0], bounds[1], bounds[2]);
    });
    const [minute, hour, dayOfMonth, month, dayOfWeek] = fields;
    if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
      throw new Error("cron expression needs 5 fields");
    }
    if (dayOfWeek.values.has(7)) dayOfWeek.values.add(0);
    this.minute = minute;
    this.hour = hour;
    this.dayOfMonth = dayOfMonth;
    this.month = month;
    this.dayOfWeek = dayOfWeek;
  }

  private dayMatches(date: Date): boolean {
    const domMatch = this.dayOfMonth.values.has(date.getDate());
    const dowMatch = this.dayOfWeek.values.has(date.getDay());
    if (!this.dayOfMonth.wildcard && !this.dayOfWeek.wildcard) return domMatch || dowMatch;
    return domMatch && dowMatch;
  }

  /** First matching minute strictly after `from`, in local time. */
  nextAfter(from: Date): Date | null {
    const t = new Date(from.getTime());
    t.setSeconds(0, 0);
    t.setMinutes(t.getMinutes() + 1);
    const limit = from.getTime() + SEARCH_LIMIT_MS;
    while (t.getTime() <= limit) {
      if (!this.month.values.has(t.getMonth() + 1)) {
        t.setMonth(t.getMonth() + 1, 1);
        t.setHours(0, 0, 0, 0);
        continue;
      }
      if (!this.dayMatches(t)) {
        t.setDate(t.getDate() + 1);
        t.setHours(0, 0, 0, 0);
        continue;
      }
      if (!this.hour.values.has(t.getHours())) {
        t.setHours(t.getHours() + 1, 0, 0, 0);
        continue;
      }
      if (!this.minute.values.has(t.getMinutes())) {
        t.setMinutes(t.getMinutes() + 1, 0, 0);
        continue;
      }
      return t;
    }
    return null;
  }
}

export function intervalTrigger(everyMs: number): Trigger {
  return { kind: "interval", everyMs };
}

export function cronTrigger(expression: string): Trigger {
  return { kind: "cron", expression, cron: new CronSchedule(expression) };
}

/**
 * "30s", "1h30m", "500ms" or a bare number of seconds give an interval;
 * anything with five whitespace-separated fields is read as cron.
 */
export function parseTrigger(spec: string, label = "trigger"): Trigger {
  const text = spec.trim();
  const everyMs = parseDuration(text);
  if (everyMs != null) return intervalTrigger(everyMs);
  if (text.split(/\s+/).length === 5) {
    try {
      return cronTrigger(text);
    } catch (error) {
      throw new ConfigError([`${label}: ${error instanceof Error ? error.message : String(error)}`]);
    }
  }
  throw new ConfigError([`${label}: unrecognized trigger "${spec}"`]);
}

export function nextFireTime(trigger: Trigger, from: number): number | null {
  if (trigger.kind === "interval") return from + trigger.everyMs;
  const next = trigger.cron.nextAfter(new Date(from));
  return next ? next.getTime() : null;
}

export function describeTrigger(trigger: Trigger): string {
  return trigger.kind === "interval" ? `every ${trigger.everyMs}ms` : `cron "${trigger.expression}"`;
}
