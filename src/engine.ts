/**
 * Engine - the monitor core behind the chat front end
 *
 * Owns the tracker and the monitor loop, and exposes the small set of
 * operations the UI needs. Delivery and persistence are passed in, so the
 * engine never touches Discord or the filesystem itself.
 */

import { createMonitorLoop, type CycleReport, type MonitorLoop } from './monitoring/monitor';
import { createHttpProbe } from './monitoring/probe';
import { AvailabilityTracker, type UrlState } from './monitoring/tracker';
import { createNotificationDispatcher } from './notifications/dispatcher';
import type { SubscriberStore } from './subscribers/store';
import type {
  AvailabilityStatus,
  Config,
  DeliveryChannel,
  Probe,
  SubscriberId,
  SubscribeOutcome,
  UnsubscribeOutcome,
} from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('engine');

export interface MonitorEngine {
  readonly urls: readonly string[];
  readonly maxSubscribers: number;
  subscribe(id: SubscriberId): SubscribeOutcome;
  unsubscribe(id: SubscriberId): UnsubscribeOutcome;
  isSubscribed(id: SubscriberId): boolean;
  count(): number;
  listSubscribed(): Set<SubscriberId>;
  statusOf(url: string): AvailabilityStatus;
  snapshot(): UrlState[];
  /** Run the next cycle now instead of waiting out the delay. */
  checkNow(): void;
  runCycle(): Promise<CycleReport>;
  start(): void;
  stop(): Promise<void>;
  /** Stop the loop and close the store. */
  close(): Promise<void>;
}

export type EngineConfig = Pick<
  Config,
  'urlsToCheck' | 'urlCheckDelay' | 'probe' | 'notifyOn' | 'dispatchMode' | 'deliveryConcurrency'
>;

export interface EngineDeps {
  store: SubscriberStore;
  channel: DeliveryChannel;
  /** Defaults to an HTTP probe built from config.probe */
  probe?: Probe;
  now?: () => Date;
}

export function createEngine(config: EngineConfig, deps: EngineDeps): MonitorEngine {
  const { store } = deps;
  const tracker = new AvailabilityTracker(config.urlsToCheck);
  const probe =
    deps.probe ?? createHttpProbe({ timeoutMs: config.probe.timeout * 1000, method: config.probe.method });

  const dispatcher = createNotificationDispatcher({
    subscribers: store,
    channel: deps.channel,
    concurrency: config.deliveryConcurrency,
  });

  const loop: MonitorLoop = createMonitorLoop({
    tracker,
    probe,
    dispatcher,
    delayMs: config.urlCheckDelay * 1000,
    notifyOn: config.notifyOn,
    dispatchMode: config.dispatchMode,
    now: deps.now,
  });

  return {
    urls: tracker.monitoredUrls,
    maxSubscribers: store.maxSubscribers,

    subscribe: (id) => store.subscribe(id),
    unsubscribe: (id) => store.unsubscribe(id),
    isSubscribed: (id) => store.isSubscribed(id),
    count: () => store.count(),
    listSubscribed: () => store.listSubscribed(),

    statusOf: (url) => tracker.statusOf(url),
    snapshot: () => tracker.snapshot(),

    checkNow() {
      if (loop.running) {
        loop.wake();
      } else {
        loop.runCycle().catch((err: unknown) => logger.error({ err }, 'Manual check failed'));
      }
    },

    runCycle: () => loop.runCycle(),
    start: () => loop.start(),
    stop: () => loop.stop(),

    async close() {
      await loop.stop();
      store.close();
    },
  };
}
