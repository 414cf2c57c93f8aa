// Scheduler: one timer per source kind, warm-up on start, on-demand runs joined per kind, backoff retry on failure

import { logger } from "../logger/index.js";
import { errorMessage } from "../errors/index.js";
import { runSync } from "../sync/index.js";
import type { SyncDeps, SyncOutcome } from "../sync/index.js";
import { SOURCE_KINDS } from "../types/contentRecord.js";
import type { SourceKind } from "../types/contentRecord.js";


export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  factor?: number;
}


export const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 30_000, factor: 2 };


export interface SchedulerOptions {
  /** Milliseconds between scheduled syncs, per kind */
  intervals: Record<SourceKind, number>;
  retry?: RetryPolicy;
  /** Sync every kind once at start; default true */
  warmUp?: boolean;
}


export interface RunOptions {
  /** Apply the retry policy; default true */
  retry?: boolean;
}


export interface Scheduler {
  start(): void;
  /** Start a sync, or join the one already running for this kind; without retry a backoff wait is skipped */
  runNow(kind: SourceKind, opts?: RunOptions): Promise<SyncOutcome>;
  isRunning(kind: SourceKind): boolean;
  /** Clear timers, abort in-flight syncs and wait for them to settle */
  stop(): Promise<void>;
}


/** Delay before retry number `attempt` (1-based) */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * (policy.factor ?? 2) ** (attempt - 1);
}


/** Resolves true after `ms` or once woken, false as soon as `signal` aborts */
function sleep(ms: number, signal: AbortSignal, onWake: (wake: () => void) => void): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve(false);
    const settle = (value: boolean) => {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      onWake(() => undefined);
      resolve(value);
    };
    const onAbort = () => settle(false);
    const timer = setTimeout(() => settle(true), ms);
    signal.addEventListener("abort", onAbort, { once: true });
    onWake(() => settle(true));
  });
}


interface InFlight {
  /** Final outcome after all retries */
  promise: Promise<SyncOutcome>;
  controller: AbortController;
  /** Outcome of the attempt running now, or of the next one while backing off */
  attempt(): Promise<SyncOutcome>;
  /** Cut a backoff wait short; no-op while an attempt runs */
  wake(): void;
}


export function createScheduler(deps: SyncDeps, opts: SchedulerOptions): Scheduler {
  const retry = opts.retry ?? DEFAULT_RETRY;
  const timers = new Map<SourceKind, NodeJS.Timeout>();
  const inFlight = new Map<SourceKind, InFlight>();

  function startRun(kind: SourceKind, withRetry: boolean): InFlight {
    const controller = new AbortController();
    const { signal } = controller;
    const attempts = withRetry ? Math.max(1, retry.maxAttempts) : 1;
    let wake: () => void = () => undefined;
    // an aborted signal makes runSync return a cancelled outcome without fetching
    let current = runSync(kind, deps, { signal });

    async function loop(): Promise<SyncOutcome> {
      for (let attempt = 1; ; attempt++) {
        const outcome = await current;
        if (outcome.status === "success" || outcome.stage === "cancelled" || attempt >= attempts) return outcome;
        const delay = backoffDelay(retry, attempt);
        logger.info("scheduler", "retrying sync", { kind, attempt, delayMs: delay });
        current = sleep(delay, signal, (fn) => {
          wake = fn;
        }).then(() => runSync(kind, deps, { signal }));
      }
    }

    return {
      promise: loop(),
      controller,
      attempt: () => current,
      wake: () => wake(),
    };
  }

  /** Joins a running sync; without retry, the caller gets the current attempt and skips any backoff wait */
  function runNow(kind: SourceKind, runOpts: RunOptions = {}): Promise<SyncOutcome> {
    const withRetry = runOpts.retry ?? true;
    const existing = inFlight.get(kind);
    if (existing) {
      if (withRetry) return existing.promise;
      existing.wake();
      return existing.attempt();
    }
    const run = startRun(kind, withRetry);
    const entry: InFlight = {
      ...run,
      promise: run.promise.finally(() => {
        inFlight.delete(kind);
      }),
    };
    inFlight.set(kind, entry);
    return entry.promise;
  }

  function trigger(kind: SourceKind, reason: string): void {
    logger.debug("scheduler", "sync triggered", { kind, reason });
    runNow(kind).catch((err) => {
      logger.error("scheduler", "scheduled sync threw", { kind, err: errorMessage(err) });
    });
  }

  return {
    start() {
      for (const kind of SOURCE_KINDS) {
        if (timers.has(kind)) continue;
        const intervalMs = opts.intervals[kind];
        timers.set(kind, setInterval(() => trigger(kind, "interval"), intervalMs));
        logger.info("scheduler", "scheduled", { kind, intervalMs });
      }
      if (opts.warmUp !== false) {
        for (const kind of SOURCE_KINDS) trigger(kind, "warm-up");
      }
    },

    runNow,

    isRunning(kind) {
      return inFlight.has(kind);
    },

    async stop() {
      for (const timer of timers.values()) clearInterval(timer);
      timers.clear();
      const pending = [...inFlight.values()];
      for (const { controller } of pending) controller.abort();
      await Promise.allSettled(pending.map((p) => p.promise));
      logger.info("scheduler", "stopped", { aborted: pending.length });
    },
  };
}
