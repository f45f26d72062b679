/**
 * Discord Gateway WebSocket
 *
 * Hello / heartbeat / identify / resume, with reconnect on close using
 * exponential backoff. Dispatch events are handed to onDispatch; everything
 * else is connection housekeeping.
 */

import { WebSocket, type RawData } from 'ws';
import { z } from 'zod';
import { createLogger } from '../../utils/logger';

const logger = createLogger('discord-gateway');

// =============================================================================
// TYPES
// =============================================================================

// Gateway opcodes
export const GatewayOpcode = {
  Dispatch: 0,
  Heartbeat: 1,
  Identify: 2,
  Resume: 6,
  Reconnect: 7,
  InvalidSession: 9,
  Hello: 10,
  HeartbeatAck: 11,
} as const;

// Slash commands and buttons arrive without any privileged intent
export const INTENTS = {
  GUILDS: 1 << 0,
} as const;

const payloadSchema = z.object({
  op: z.number(),
  d: z.unknown(),
  s: z.number().nullish(),
  t: z.string().nullish(),
});

type GatewayPayload = z.infer<typeof payloadSchema>;

const helloSchema = z.object({ heartbeat_interval: z.number().positive() });

const readySchema = z.object({
  session_id: z.string(),
  resume_gateway_url: z.string(),
  user: z.object({ id: z.string(), username: z.string() }),
});

/** The parts of a ws WebSocket the gateway uses. */
export interface GatewaySocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface GatewayOptions {
  token: string;
  /** Resolves the URL for a fresh session (GET /gateway/bot) */
  getGatewayUrl: () => Promise<string>;
  onDispatch: (event: string, data: unknown) => void;
  intents?: number;
  createSocket?: (url: string) => GatewaySocket;
}

// =============================================================================
// CONSTANTS
// =============================================================================

const RECONNECT_DELAY_MS = 5000;
const MAX_RECONNECT_DELAY_MS = 5 * 60_000;
// Past this many failed attempts each retry is logged as an error
const RECONNECT_ALERT_ATTEMPTS = 10;

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

// =============================================================================
// GATEWAY
// =============================================================================

export class DiscordGateway {
  private readonly token: string;
  private readonly intents: number;
  private readonly getGatewayUrl: () => Promise<string>;
  private readonly onDispatch: (event: string, data: unknown) => void;
  private readonly createSocket: (url: string) => GatewaySocket;

  private ws: GatewaySocket | null = null;
  private started = false;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private heartbeatAcked = true;
  private sequenceNumber: number | null = null;
  private sessionId: string | null = null;
  private resumeGatewayUrl: string | null = null;
  private reconnectAttempts = 0;

  constructor(options: GatewayOptions) {
    this.token = options.token;
    this.intents = options.intents ?? INTENTS.GUILDS;
    this.getGatewayUrl = options.getGatewayUrl;
    this.onDispatch = options.onDispatch;
    this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
  }

  get connected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /** Connect and resolve once the session is READY. */
  async connect(): Promise<void> {
    this.started = true;
    const url = await this.getGatewayUrl();
    await this.connectGateway(url);
  }

  close(): void {
    this.started = false;
    this.clearHeartbeat();
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();

    if (this.ws) {
      try {
        this.ws.close(1000, 'Bot shutting down');
      } catch (err) {
        logger.debug({ err }, 'Gateway socket already closed');
      }
      this.ws = null;
    }

    this.sessionId = null;
    this.sequenceNumber = null;
  }

  // ---- Connection ----

  private connectGateway(url: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = this.createSocket(`${url}?v=10&encoding=json`);
      this.ws = ws;

      let settled = false;
      // Set once this socket reached READY/RESUMED. Only such a socket
      // schedules its own reconnect; a failed connect is left to the caller.
      let established = false;

      ws.on('open', () => {
        logger.info('Discord gateway WebSocket connected');
      });

      ws.on('message', (data) => {
        const payload = this.parsePayload(data);
        if (!payload) return;

        this.handleGatewayPayload(payload);

        if (!settled && payload.op === GatewayOpcode.Dispatch && (payload.t === 'READY' || payload.t === 'RESUMED')) {
          settled = true;
          established = true;
          resolve();
        }
      });

      ws.on('close', (code, reason) => {
        logger.warn({ code, reason: reason.toString('utf-8') }, 'Discord gateway closed');
        this.clearHeartbeat();
        if (this.ws === ws) this.ws = null;

        if (!settled) {
          settled = true;
          reject(new Error(`Gateway closed during connect: ${code}`));
          return;
        }

        if (established && this.started) {
          this.scheduleReconnect();
        }
      });

      ws.on('error', (err) => {
        logger.error({ err }, 'Discord gateway error');
        if (!settled) {
          settled = true;
          reject(err);
        }
      });
    });
  }

  private parsePayload(data: RawData): GatewayPayload | null {
    try {
      const parsed = payloadSchema.safeParse(JSON.parse(rawDataToString(data)));
      if (parsed.success) return parsed.data;
      logger.warn({ issues: parsed.error.issues }, 'Unexpected gateway payload');
    } catch (err) {
      logger.warn({ err }, 'Failed to parse gateway payload');
    }
    return null;
  }

  private handleGatewayPayload(payload: GatewayPayload): void {
    if (payload.s !== null && payload.s !== undefined) {
      this.sequenceNumber = payload.s;
    }

    switch (payload.op) {
      case GatewayOpcode.Hello: {
        const hello = helloSchema.safeParse(payload.d);
        if (!hello.success) {
          logger.warn('Malformed Hello payload');
          return;
        }
        this.handleHello(hello.data.heartbeat_interval);
        break;
      }

      case GatewayOpcode.HeartbeatAck:
        this.heartbeatAcked = true;
        break;

      case GatewayOpcode.Heartbeat:
        // Server is requesting an immediate heartbeat
        this.sendHeartbeat();
        break;

      case GatewayOpcode.Reconnect:
        logger.info('Gateway requested reconnect');
        this.ws?.close(4000, 'Reconnect requested');
        break;

      case GatewayOpcode.InvalidSession: {
        // d tells whether the session can be resumed
        const canResume = payload.d === true;
        logger.warn({ canResume }, 'Invalid session, re-identifying');
        if (!canResume) {
          this.sessionId = null;
          this.sequenceNumber = null;
        }
        this.later(() => {
          if (canResume) this.resume();
          else this.identify();
        }, 1000 + Math.random() * 4000);
        break;
      }

      case GatewayOpcode.Dispatch:
        if (payload.t) this.handleDispatch(payload.t, payload.d);
        break;
    }
  }

  private handleHello(interval: number): void {
    logger.debug({ interval }, 'Starting heartbeat');
    this.clearHeartbeat();

    this.heartbeatAcked = true;
    this.heartbeatTimer = setInterval(() => {
      if (!this.heartbeatAcked) {
        logger.warn('Heartbeat not acknowledged, reconnecting');
        this.ws?.close(4000, 'Heartbeat timeout');
        return;
      }
      this.heartbeatAcked = false;
      this.sendHeartbeat();
    }, interval);

    // First heartbeat with jitter
    this.later(() => this.sendHeartbeat(), Math.floor(interval * Math.random()));

    if (this.sessionId && this.sequenceNumber !== null) {
      this.resume();
    } else {
      this.identify();
    }
  }

  private handleDispatch(eventName: string, data: unknown): void {
    if (eventName === 'READY') {
      const ready = readySchema.safeParse(data);
      if (ready.success) {
        this.sessionId = ready.data.session_id;
        this.resumeGatewayUrl = ready.data.resume_gateway_url;
        this.reconnectAttempts = 0;
        logger.info({ sessionId: this.sessionId, username: ready.data.user.username }, 'Discord bot ready');
      } else {
        logger.warn('Malformed READY payload');
      }
    } else if (eventName === 'RESUMED') {
      this.reconnectAttempts = 0;
      logger.info('Discord gateway resumed');
    }

    try {
      this.onDispatch(eventName, data);
    } catch (err) {
      logger.error({ err, event: eventName }, 'Dispatch handler failed');
    }
  }

  // ---- Outbound ----

  private sendHeartbeat(): void {
    this.sendGateway({ op: GatewayOpcode.Heartbeat, d: this.sequenceNumber });
  }

  private identify(): void {
    this.sendGateway({
      op: GatewayOpcode.Identify,
      d: {
        token: this.token,
        intents: this.intents,
        properties: {
          os: process.platform,
          browser: 'sitewatch',
          device: 'sitewatch',
        },
      },
    });
  }

  private resume(): void {
    logger.info('Resuming gateway session');
    this.sendGateway({
      op: GatewayOpcode.Resume,
      d: {
        token: this.token,
        session_id: this.sessionId,
        seq: this.sequenceNumber,
      },
    });
  }

  private sendGateway(payload: { op: number; d: unknown }): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;
    try {
      this.ws.send(JSON.stringify(payload));
    } catch (err) {
      logger.error({ err }, 'Failed to send gateway payload');
    }
  }

  // ---- Timers / reconnection ----

  private later(fn: () => void, ms: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, ms);
    this.timers.add(timer);
  }

  private clearHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /** Retries forever; the delay doubles per attempt up to MAX_RECONNECT_DELAY_MS. */
  private scheduleReconnect(): void {
    this.reconnectAttempts++;
    const delay = Math.min(RECONNECT_DELAY_MS * Math.pow(2, this.reconnectAttempts - 1), MAX_RECONNECT_DELAY_MS);
    if (this.reconnectAttempts > RECONNECT_ALERT_ATTEMPTS) {
      logger.error({ attempt: this.reconnectAttempts, delay }, 'Discord gateway still disconnected, retrying');
    } else {
      logger.info({ attempt: this.reconnectAttempts, delay }, 'Scheduling Discord reconnect');
    }

    this.later(() => {
      if (!this.started) return;
      this.reconnect().catch((err: unknown) => {
        logger.error({ err }, 'Discord reconnect failed');
        if (this.started) this.scheduleReconnect();
      });
    }, delay);
  }

  private async reconnect(): Promise<void> {
    const url = this.resumeGatewayUrl ?? (await this.getGatewayUrl());
    await this.connectGateway(url);
    logger.info('Discord reconnected');
  }
}
