/**
 * Task trigger grammar.
 *
 *   @hourly | @daily | @weekly     recurring shortcuts
 *   *\/N                           every N minutes
 *   once:+Nm                       N minutes after creation
 *   once:<ISO-8601 datetime>       absolute time; a bare date is local midnight
 *
 * Expressions are parsed into a `Trigger` when a task is created; a malformed
 * expression never reaches the scheduler.
 */

import { ValidationError } from "./errors";

export type Trigger =
  | { kind: "interval"; minutes: number }
  | { kind: "once"; at: number };

const MINUTE_MS = 60_000;
/** Largest magnitude a Date can hold. */
const MAX_TIME_MS = 8.64e15;

const SHORTCUTS: Record<string, number> = {
  "@hourly": 60,
  "@daily": 1440,
  "@weekly": 10080,
};

const INTERVAL_RE = /^\*\/(\d+)$/;
const RELATIVE_RE = /^\+(\d+)m$/;
const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export const SCHEDULE_HELP = "Use @hourly, @daily, @weekly, */N, once:+Nm or once:<ISO datetime>";

export function parseTrigger(expression: string, now: number = Date.now()): Trigger {
  const trimmed = expression.trim();
  const lowered = trimmed.toLowerCase();

  if (Object.hasOwn(SHORTCUTS, lowered)) {
    return { kind: "interval", minutes: SHORTCUTS[lowered] };
  }

  const interval = INTERVAL_RE.exec(lowered);
  if (interval) {
    const minutes = Number.parseInt(interval[1], 10);
    if (minutes > 0 && isRepresentable(now + minutes * MINUTE_MS)) {
      return { kind: "interval", minutes };
    }
    throw invalidSchedule(expression);
  }

  if (lowered.startsWith("once:")) {
    const when = trimmed.slice("once:".length).trim();
    const relative = RELATIVE_RE.exec(when.toLowerCase());
    if (relative) {
      const at = now + Number.parseInt(relative[1], 10) * MINUTE_MS;
      if (isRepresentable(at)) {
        return { kind: "once", at };
      }
    } else if (ISO_DATE_RE.test(when)) {
      // Date.parse reads a bare date as UTC but a date-time without offset as local.
      const at = Date.parse(DATE_ONLY_RE.test(when) ? `${when}T00:00` : when);
      if (isRepresentable(at)) {
        return { kind: "once", at };
      }
    }
  }

  throw invalidSchedule(expression);
}

/** Time of the first firing for a freshly created task. */
export function firstRunAt(trigger: Trigger, now: number): number {
  return trigger.kind === "interval" ? now + trigger.minutes * MINUTE_MS : trigger.at;
}

/**
 * Next firing after one has happened at `firedAt`; `null` once a one-shot
 * trigger has been consumed.
 */
export function nextRunAfterFire(trigger: Trigger, firedAt: number): number | null {
  return trigger.kind === "interval" ? firedAt + trigger.minutes * MINUTE_MS : null;
}

export function isRecurring(trigger: Trigger): boolean {
  return trigger.kind === "interval";
}

export function describeTrigger(trigger: Trigger): string {
  if (trigger.kind === "once") {
    return `once at ${new Date(trigger.at).toISOString()}`;
  }
  return trigger.minutes === 1 ? "every minute" : `every ${trigger.minutes} minutes`;
}

function isRepresentable(time: number): boolean {
  return Number.isSafeInteger(time) && Math.abs(time) <= MAX_TIME_MS;
}

function invalidSchedule(expression: string): ValidationError {
  return new ValidationError("INVALID_SCHEDULE", `Invalid schedule "${expression}". ${SCHEDULE_HELP}`);
}
