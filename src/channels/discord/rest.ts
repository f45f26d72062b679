/**
 * Discord REST client
 *
 * Raw Discord HTTP API (no discord.js). Handles rate limits by waiting out
 * retry-after, and reports every other non-2xx response as DiscordApiError.
 */

import { z } from 'zod';
import { DiscordApiError, errorMessage } from '../../errors';
import type { DeliveryChannel, DeliveryResult, NotificationMessage, SubscriberId } from '../../types';
import { sleep as defaultSleep } from '../../utils/concurrency';
import { createLogger } from '../../utils/logger';

const logger = createLogger('discord');

// =============================================================================
// CONSTANTS
// =============================================================================

export const DISCORD_API_BASE = 'https://discord.com/api/v10';
const DEFAULT_RATE_LIMIT_RETRIES = 3;

export const InteractionResponseType = {
  Pong: 1,
  ChannelMessageWithSource: 4,
  UpdateMessage: 7,
} as const;

export const MessageFlags = {
  Ephemeral: 1 << 6,
} as const;

const gatewayBotSchema = z.object({
  url: z.string(),
  session_start_limit: z
    .object({ total: z.number(), remaining: z.number(), reset_after: z.number() })
    .optional(),
});

const idSchema = z.object({ id: z.string() });

// =============================================================================
// TYPES
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface DiscordRestOptions {
  token: string;
  baseUrl?: string;
  /** Rate-limited attempts to retry before giving up. Default: 3 */
  maxRateLimitRetries?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface ButtonComponent {
  type: 2;
  style: 1 | 2 | 3 | 4;
  label: string;
  custom_id: string;
  disabled?: boolean;
}

export interface ActionRow {
  type: 1;
  components: ButtonComponent[];
}

export interface InteractionMessage extends NotificationMessage {
  components?: ActionRow[];
  flags?: number;
}

export interface InteractionResponse {
  type: (typeof InteractionResponseType)[keyof typeof InteractionResponseType];
  data?: InteractionMessage;
}

export interface SlashCommand {
  name: string;
  description: string;
  options?: Array<{ name: string; description: string; type: number; required?: boolean }>;
}

// =============================================================================
// CLIENT
// =============================================================================

export class DiscordRestClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly maxRateLimitRetries: number;
  private readonly doFetch: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  /** Recipient id -> DM channel id */
  private readonly dmChannels = new Map<string, string>();

  constructor(options: DiscordRestOptions) {
    this.token = options.token;
    this.baseUrl = options.baseUrl ?? DISCORD_API_BASE;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? DEFAULT_RATE_LIMIT_RETRIES;
    this.doFetch = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Send one API request. Resolves to the parsed JSON body, or null for 204.
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bot ${this.token}`,
    };
    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    for (let attempt = 0; ; attempt++) {
      const res = await this.doFetch(`${this.baseUrl}${path}`, init);

      if (res.status === 429 && attempt < this.maxRateLimitRetries) {
        const retryAfter = parseFloat(res.headers.get('retry-after') ?? '1');
        const waitMs = (Number.isFinite(retryAfter) ? retryAfter : 1) * 1000;
        logger.warn({ retryAfter, path, attempt: attempt + 1 }, 'Discord rate limited');
        await this.sleep(waitMs);
        continue;
      }

      if (res.status === 204) return null;

      if (!res.ok) {
        const text = await res.text();
        logger.error({ status: res.status, method, path }, 'Discord API error');
        throw new DiscordApiError(method, path, res.status, text);
      }

      return res.json();
    }
  }

  async getGatewayUrl(): Promise<string> {
    const info = gatewayBotSchema.parse(await this.request('GET', '/gateway/bot'));
    logger.info({ url: info.url, remaining: info.session_start_limit?.remaining }, 'Discord gateway info');
    return info.url;
  }

  /** Open (or reuse) the DM channel with a user. */
  async openDmChannel(userId: string): Promise<string> {
    const cached = this.dmChannels.get(userId);
    if (cached) return cached;
    const channel = idSchema.parse(await this.request('POST', '/users/@me/channels', { recipient_id: userId }));
    this.dmChannels.set(userId, channel.id);
    return channel.id;
  }

  async createMessage(channelId: string, message: NotificationMessage): Promise<string> {
    const created = idSchema.parse(await this.request('POST', `/channels/${channelId}/messages`, message));
    return created.id;
  }

  async sendDirectMessage(userId: string, message: NotificationMessage): Promise<string> {
    const channelId = await this.openDmChannel(userId);
    return this.createMessage(channelId, message);
  }

  async registerCommands(applicationId: string, commands: SlashCommand[]): Promise<void> {
    await this.request('PUT', `/applications/${applicationId}/commands`, commands);
    logger.info({ commands: commands.map((c) => c.name) }, 'Slash commands registered');
  }

  async respondToInteraction(interactionId: string, token: string, response: InteractionResponse): Promise<void> {
    await this.request('POST', `/interactions/${interactionId}/${token}/callback`, response);
  }

  /** Post a follow-up message to an interaction that was already answered. */
  async createFollowup(applicationId: string, token: string, message: InteractionMessage): Promise<void> {
    await this.request('POST', `/webhooks/${applicationId}/${token}`, message);
  }
}

export function createDiscordRestClient(options: DiscordRestOptions): DiscordRestClient {
  return new DiscordRestClient(options);
}

// =============================================================================
// DELIVERY CHANNEL
// =============================================================================

/**
 * Deliver notifications as direct messages. Errors become
 * `{ success: false }` so one unreachable user never affects another.
 */
export function createDirectMessageChannel(rest: Pick<DiscordRestClient, 'sendDirectMessage'>): DeliveryChannel {
  return {
    async send(recipient: SubscriberId, message: NotificationMessage): Promise<DeliveryResult> {
      try {
        await rest.sendDirectMessage(recipient, message);
        return { success: true };
      } catch (err) {
        return { success: false, error: errorMessage(err) };
      }
    },
  };
}
