import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { EventEmitter } from 'events';
import { DiscordGateway, GatewayOpcode } from './gateway';

// =============================================================================
// In-process socket standing in for ws
// =============================================================================

class FakeSocket extends EventEmitter {
  readyState = 1;
  readonly sent: Array<{ op: number; d: unknown }> = [];

  constructor(readonly url: string) {
    super();
  }

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(code = 1000, reason = ''): void {
    this.readyState = 3;
    this.emit('close', code, Buffer.from(reason));
  }

  receive(payload: { op: number; d?: unknown; s?: number | null; t?: string | null }): void {
    this.emit('message', Buffer.from(JSON.stringify(payload)));
  }
}

const READY = {
  op: GatewayOpcode.Dispatch,
  t: 'READY',
  s: 1,
  d: {
    session_id: 'session-1',
    resume_gateway_url: 'wss://resume.discord.test',
    user: { id: '1', username: 'sitewatch' },
    application: { id: 'app-1' },
  },
};

describe('DiscordGateway', () => {
  let sockets: FakeSocket[];
  let onDispatch: Mock<(event: string, data: unknown) => void>;
  let gateway: DiscordGateway;

  beforeEach(() => {
    vi.useFakeTimers();
    sockets = [];
    onDispatch = vi.fn<(event: string, data: unknown) => void>();
    gateway = new DiscordGateway({
      token: 'test-secret',
      getGatewayUrl: async () => 'wss://gateway.discord.test',
      onDispatch,
      createSocket: (url) => {
        const socket = new FakeSocket(url);
        sockets.push(socket);
        return socket;
      },
    });
  });

  afterEach(() => {
    gateway.close();
    vi.useRealTimers();
  });

  async function connect(): Promise<FakeSocket> {
    const connecting = gateway.connect();
    await vi.waitFor(() => expect(sockets).toHaveLength(1));
    const socket = sockets[0];
    socket.receive({ op: GatewayOpcode.Hello, d: { heartbeat_interval: 45_000 } });
    socket.receive(READY);
    await connecting;
    return socket;
  }

  it('identifies after Hello and resolves on READY', async () => {
    const socket = await connect();

    expect(socket.url).toBe('wss://gateway.discord.test?v=10&encoding=json');
    expect(socket.sent).toContainEqual({
      op: GatewayOpcode.Identify,
      d: {
        token: 'test-secret',
        intents: 1,
        properties: { os: process.platform, browser: 'sitewatch', device: 'sitewatch' },
      },
    });
    expect(onDispatch).toHaveBeenCalledWith('READY', READY.d);
  });

  it('forwards dispatch events and tracks the sequence number', async () => {
    const socket = await connect();

    socket.receive({ op: GatewayOpcode.Dispatch, t: 'INTERACTION_CREATE', s: 7, d: { id: 'i-1' } });
    socket.receive({ op: GatewayOpcode.Heartbeat });

    expect(onDispatch).toHaveBeenLastCalledWith('INTERACTION_CREATE', { id: 'i-1' });
    expect(socket.sent.at(-1)).toEqual({ op: GatewayOpcode.Heartbeat, d: 7 });
  });

  it('heartbeats on the interval and reconnects when a beat goes unacknowledged', async () => {
    const socket = await connect();
    socket.sent.length = 0;

    vi.advanceTimersByTime(45_000);
    expect(socket.sent.filter((p) => p.op === GatewayOpcode.Heartbeat).length).toBeGreaterThanOrEqual(1);

    vi.advanceTimersByTime(45_000);
    expect(socket.readyState).toBe(3);
  });

  it('ignores payloads that are not gateway frames', async () => {
    const socket = await connect();

    socket.emit('message', Buffer.from('not json'));
    socket.emit('message', Buffer.from('{"hello":"world"}'));

    expect(onDispatch).toHaveBeenCalledTimes(1);
  });

  it('resumes on the resume URL after the connection drops', async () => {
    const socket = await connect();

    socket.close(4000, 'network');
    await vi.advanceTimersByTimeAsync(5000);

    expect(sockets).toHaveLength(2);
    const resumed = sockets[1];
    expect(resumed.url).toBe('wss://resume.discord.test?v=10&encoding=json');

    resumed.receive({ op: GatewayOpcode.Hello, d: { heartbeat_interval: 45_000 } });
    expect(resumed.sent).toContainEqual({
      op: GatewayOpcode.Resume,
      d: { token: 'test-secret', session_id: 'session-1', seq: 1 },
    });
  });

  it('opens one socket per attempt when a reconnect errors and then closes', async () => {
    const socket = await connect();

    socket.close(1006, 'network');
    await vi.advanceTimersByTimeAsync(5000);
    expect(sockets).toHaveLength(2);

    sockets[1].emit('error', new Error('ECONNRESET'));
    sockets[1].close(1006, 'network');
    await vi.advanceTimersByTimeAsync(0);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(sockets).toHaveLength(3);
    expect(sockets[2].url).toBe('wss://resume.discord.test?v=10&encoding=json');

    await vi.advanceTimersByTimeAsync(60_000);
    expect(sockets).toHaveLength(3);
    expect(sockets.map((s) => s.readyState)).toEqual([3, 3, 1]);
  });

  it('keeps retrying at a capped delay after many failed reconnects', async () => {
    const socket = await connect();
    socket.close(1006, 'network');

    for (let attempt = 1; attempt <= 12; attempt++) {
      await vi.advanceTimersByTimeAsync(5 * 60_000);
      expect(sockets).toHaveLength(attempt + 1);
      sockets[attempt].close(1006, 'unreachable');
      await vi.advanceTimersByTimeAsync(0);
    }

    await vi.advanceTimersByTimeAsync(5 * 60_000);
    expect(sockets).toHaveLength(14);
  });

  it('rejects connect when the socket closes before READY', async () => {
    const connecting = gateway.connect();
    await vi.waitFor(() => expect(sockets).toHaveLength(1));
    sockets[0].close(4004, 'Authentication failed');

    await expect(connecting).rejects.toThrow('Gateway closed during connect: 4004');
  });

  it('does not reconnect after close()', async () => {
    await connect();

    gateway.close();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(sockets).toHaveLength(1);
  });
});
