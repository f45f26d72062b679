import { describe, it, expect, vi } from 'vitest';
import { createDatabase, createMemoryPersister } from './db';
import { createEngine, type EngineConfig } from './engine';
import { createSubscriberStore, openSubscriberStore } from './subscribers/store';
import type { DeliveryChannel, DeliveryResult, NotificationMessage, ProbeResult } from './types';

const A = 'https://a.example';
const B = 'https://b.example';

const CONFIG: EngineConfig = {
  urlsToCheck: [A, B],
  urlCheckDelay: 60,
  probe: { timeout: 10, method: 'HEAD' },
  notifyOn: 'every-check',
  dispatchMode: 'inline',
  deliveryConcurrency: 1,
};

function recordingChannel() {
  const inbox: Array<{ recipient: string; text: string }> = [];
  const channel: DeliveryChannel = {
    async send(recipient: string, message: NotificationMessage): Promise<DeliveryResult> {
      inbox.push({ recipient, text: message.embeds?.[0].description ?? '' });
      return { success: true };
    },
  };
  return { inbox, channel };
}

/** A answers 200 from the start; B times out in the first cycle only. */
function scenarioProbe() {
  let bChecks = 0;
  return vi.fn(async (url: string): Promise<ProbeResult> => {
    if (url === A) return { url, available: true, status: 200, durationMs: 5 };
    bChecks++;
    if (bChecks === 1) return { url, available: false, error: 'Timed out after 10000ms', durationMs: 10_000 };
    return { url, available: true, status: 200, durationMs: 5 };
  });
}

describe('Engine', () => {
  it('notifies subscribers about the URLs that are up in each cycle', async () => {
    const store = await openSubscriberStore(':memory:');
    const { inbox, channel } = recordingChannel();
    const engine = createEngine(CONFIG, { store, channel, probe: scenarioProbe() });
    engine.subscribe('1001');

    await engine.runCycle();
    expect(inbox).toEqual([{ recipient: '1001', text: `<@1001> The website at ${A} is now accessible.` }]);
    expect(engine.statusOf(B)).toBe('unavailable');

    inbox.length = 0;
    await engine.runCycle();
    expect(inbox).toEqual([
      { recipient: '1001', text: `<@1001> The website at ${A} is still accessible.` },
      { recipient: '1001', text: `<@1001> The website at ${B} is now accessible.` },
    ]);

    await engine.close();
  });

  it('notifies once per outage with the transition policy', async () => {
    const store = await openSubscriberStore(':memory:');
    const { inbox, channel } = recordingChannel();
    const engine = createEngine({ ...CONFIG, notifyOn: 'transition' }, { store, channel, probe: scenarioProbe() });
    engine.subscribe('1001');

    await engine.runCycle();
    await engine.runCycle();
    await engine.runCycle();

    expect(inbox.map((m) => m.text)).toEqual([
      `<@1001> The website at ${A} is now accessible.`,
      `<@1001> The website at ${B} is now accessible.`,
    ]);
    await engine.close();
  });

  it('skips unsubscribed users', async () => {
    const store = await openSubscriberStore(':memory:');
    const { inbox, channel } = recordingChannel();
    const engine = createEngine({ ...CONFIG, urlsToCheck: [A] }, { store, channel, probe: scenarioProbe() });
    engine.subscribe('1');
    engine.subscribe('2');
    engine.unsubscribe('1');

    await engine.runCycle();

    expect(inbox.map((m) => m.recipient)).toEqual(['2']);
    expect(engine.count()).toBe(2);
    expect(engine.listSubscribed()).toEqual(new Set(['2']));
    await engine.close();
  });

  it('forgets availability but keeps subscribers across a restart', async () => {
    const persister = createMemoryPersister();
    const firstStore = createSubscriberStore(await createDatabase(persister));
    firstStore.ensureInitialized();
    const first = createEngine(CONFIG, { store: firstStore, channel: recordingChannel().channel, probe: scenarioProbe() });
    first.subscribe('1001');
    await first.runCycle();
    expect(first.statusOf(A)).toBe('available');
    await first.close();

    const secondStore = createSubscriberStore(await createDatabase(createMemoryPersister(persister.image)));
    secondStore.ensureInitialized();
    const second = createEngine(CONFIG, { store: secondStore, channel: recordingChannel().channel, probe: scenarioProbe() });

    expect(second.statusOf(A)).toBe('unknown');
    expect(second.statusOf(B)).toBe('unknown');
    expect(second.snapshot().map((s) => s.status)).toEqual(['unknown', 'unknown']);
    expect(second.isSubscribed('1001')).toBe(true);
    await second.close();
  });

  it('runs a cycle on checkNow while the loop is stopped', async () => {
    const store = await openSubscriberStore(':memory:');
    const probe = scenarioProbe();
    const engine = createEngine(CONFIG, { store, channel: recordingChannel().channel, probe });

    engine.checkNow();

    await vi.waitFor(() => expect(engine.statusOf(B)).toBe('unavailable'));
    expect(probe).toHaveBeenCalledTimes(2);
    await engine.close();
  });

  it('exposes the configured URLs and cap', async () => {
    const store = await openSubscriberStore(':memory:', { maxSubscribers: 3 });
    const engine = createEngine(CONFIG, { store, channel: recordingChannel().channel });

    expect(engine.urls).toEqual([A, B]);
    expect(engine.maxSubscribers).toBe(3);
    await engine.close();
  });
});
