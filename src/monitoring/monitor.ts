/**
 * Monitor Loop - probes every configured URL, then sleeps a fixed delay
 *
 * One logical worker: a cycle probes the URLs in configured order, records
 * each result in the tracker and raises an availability event according to
 * the notify policy. Events are dispatched as they occur (inline) or after
 * the probe phase (batched). Nothing that goes wrong inside a cycle stops
 * the loop.
 */

import { errorMessage } from '../errors';
import type { DispatchReport, NotificationDispatcher } from '../notifications/dispatcher';
import type { AvailabilityEvent, AvailabilityStatus, DispatchMode, NotifyPolicy, Probe, ProbeResult } from '../types';
import { createLogger } from '../utils/logger';
import type { AvailabilityTracker } from './tracker';

const logger = createLogger('monitor');

// =============================================================================
// TYPES
// =============================================================================

export interface UrlCheck {
  url: string;
  available: boolean;
  previous: AvailabilityStatus;
  status?: number;
  error?: string;
  notified: boolean;
}

export interface CycleReport {
  startedAt: Date;
  durationMs: number;
  checks: UrlCheck[];
  dispatches: DispatchReport[];
  dispatchErrors: Array<{ url: string; error: string }>;
}

export interface MonitorLoop {
  readonly running: boolean;
  start(): void;
  /** Stop after the current cycle, if any. Resolves once the loop has exited. */
  stop(): Promise<void>;
  /** End the current sleep early. A wake during a cycle skips the next sleep. */
  wake(): void;
  /** Run one cycle now, or join the cycle already in flight. */
  runCycle(): Promise<CycleReport>;
}

export interface MonitorLoopOptions {
  tracker: AvailabilityTracker;
  probe: Probe;
  dispatcher: Pick<NotificationDispatcher, 'dispatch'>;
  /** Pause between the end of one cycle and the start of the next */
  delayMs: number;
  notifyOn?: NotifyPolicy;
  dispatchMode?: DispatchMode;
  now?: () => Date;
}

export function shouldNotify(policy: NotifyPolicy, available: boolean, previous: AvailabilityStatus): boolean {
  if (!available) return false;
  return policy === 'every-check' || previous !== 'available';
}

// =============================================================================
// MONITOR
// =============================================================================

export function createMonitorLoop(options: MonitorLoopOptions): MonitorLoop {
  const { tracker, probe, dispatcher, delayMs } = options;
  const notifyOn = options.notifyOn ?? 'every-check';
  const dispatchMode = options.dispatchMode ?? 'inline';
  const now = options.now ?? (() => new Date());

  let running = false;
  // Bumped by every start(); a loop from an earlier start exits at its next check
  let generation = 0;
  let loopPromise: Promise<void> | null = null;
  let inFlight: Promise<CycleReport> | null = null;
  let pendingWake = false;
  let sleepTimer: NodeJS.Timeout | null = null;
  let endSleep: (() => void) | null = null;

  function sleep(ms: number): Promise<void> {
    if (pendingWake) {
      pendingWake = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const finish = (): void => {
        if (sleepTimer) clearTimeout(sleepTimer);
        sleepTimer = null;
        endSleep = null;
        resolve();
      };
      endSleep = finish;
      sleepTimer = setTimeout(finish, ms);
    });
  }

  async function probeSafely(url: string): Promise<ProbeResult> {
    try {
      return await probe(url);
    } catch (err) {
      logger.error({ err, url }, 'Probe threw, counting URL as unavailable');
      return { url, available: false, error: errorMessage(err), durationMs: 0 };
    }
  }

  async function dispatchSafely(event: AvailabilityEvent, report: CycleReport): Promise<void> {
    try {
      report.dispatches.push(await dispatcher.dispatch(event));
    } catch (err) {
      logger.error({ err, url: event.url }, 'Dispatch failed');
      report.dispatchErrors.push({ url: event.url, error: errorMessage(err) });
    }
  }

  async function cycle(): Promise<CycleReport> {
    const startedAt = now();
    const report: CycleReport = { startedAt, durationMs: 0, checks: [], dispatches: [], dispatchErrors: [] };
    const deferred: AvailabilityEvent[] = [];

    for (const url of tracker.monitoredUrls) {
      const result = await probeSafely(url);
      const observedAt = now();
      const previous = tracker.record(url, result.available, observedAt);
      const notified = shouldNotify(notifyOn, result.available, previous);

      report.checks.push({
        url,
        available: result.available,
        previous,
        status: result.status,
        error: result.error,
        notified,
      });

      if (!result.available) {
        logger.debug({ url, status: result.status, error: result.error }, 'URL unavailable');
      }
      if (!notified) continue;

      const event: AvailabilityEvent = { url, observedAt, previous };
      if (dispatchMode === 'inline') {
        await dispatchSafely(event, report);
      } else {
        deferred.push(event);
      }
    }

    for (const event of deferred) {
      await dispatchSafely(event, report);
    }

    report.durationMs = now().getTime() - startedAt.getTime();
    logger.info(
      {
        urls: report.checks.length,
        available: report.checks.filter((c) => c.available).length,
        events: report.checks.filter((c) => c.notified).length,
        dispatchErrors: report.dispatchErrors.length,
        durationMs: report.durationMs,
      },
      'Monitor cycle complete',
    );
    return report;
  }

  function runCycle(): Promise<CycleReport> {
    if (!inFlight) {
      inFlight = cycle().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  async function loop(id: number): Promise<void> {
    const active = (): boolean => running && id === generation;
    while (active()) {
      try {
        await runCycle();
      } catch (err) {
        logger.error({ err }, 'Monitor cycle failed');
      }
      if (!active()) break;
      await sleep(delayMs);
    }
  }

  return {
    get running() {
      return running;
    },

    start() {
      if (running) return;
      running = true;
      pendingWake = false;
      const id = ++generation;
      logger.info({ urls: tracker.monitoredUrls.length, delayMs, notifyOn, dispatchMode }, 'Monitor started');
      // A stop() still in progress finishes its loop before this one begins
      const pending = loopPromise ?? Promise.resolve();
      const current: Promise<void> = pending.then(() => loop(id)).finally(() => {
        if (loopPromise === current) loopPromise = null;
      });
      loopPromise = current;
    },

    async stop() {
      if (!running && !loopPromise) return;
      running = false;
      endSleep?.();
      if (loopPromise) await loopPromise;
      logger.info('Monitor stopped');
    },

    wake() {
      if (endSleep) {
        endSleep();
      } else {
        pendingWake = true;
      }
    },

    runCycle,
  };
}
