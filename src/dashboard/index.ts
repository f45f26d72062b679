/**
 * Dashboard - interaction replies built from engine state
 *
 * Pure functions: every handler takes the engine and the acting user and
 * returns what to send back. Nothing here talks to Discord.
 */

import {
  InteractionResponseType,
  MessageFlags,
  type ActionRow,
  type ButtonComponent,
  type InteractionMessage,
  type InteractionResponse,
  type SlashCommand,
} from '../channels/discord/rest';
import type { MonitorEngine } from '../engine';
import { CapacityExceededError, InvalidSubscriberIdError } from '../errors';
import type { UrlState } from '../monitoring/tracker';
import { EMBED_COLORS } from '../notifications/message';
import type { AvailabilityStatus, NotificationEmbed, SubscribeOutcome, UnsubscribeOutcome } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('dashboard');

// =============================================================================
// CONSTANTS
// =============================================================================

export const BUTTON_IDS = {
  subscribe: 'subscribe_button',
  unsubscribe: 'unsubscribe_button',
  status: 'view_status',
} as const;

export const SLASH_COMMANDS: SlashCommand[] = [
  { name: 'monitor', description: 'Open the Website Monitor dashboard' },
  { name: 'status', description: 'View current website status' },
  { name: 'check', description: 'Check every website now (admin only)' },
];

// Discord rejects embeds with more fields than this
const MAX_EMBED_FIELDS = 25;

const STATUS_LABELS: Record<AvailabilityStatus, string> = {
  available: '🟢 Online',
  unavailable: '🔴 Offline',
  unknown: '⏳ Pending first check',
};

const SUBSCRIBE_REPLIES: Record<SubscribeOutcome, string> = {
  subscribed: 'Successfully subscribed to website monitoring!',
  resubscribed: 'Successfully subscribed to website monitoring!',
  'already-subscribed': 'You are already subscribed!',
};

const UNSUBSCRIBE_REPLIES: Record<UnsubscribeOutcome, string> = {
  unsubscribed: 'Successfully unsubscribed from website monitoring!',
  'not-subscribed': 'You are not subscribed!',
};

export const CAPACITY_REPLY = 'Sorry, the subscriber limit has been reached. Please try again later.';
export const FAILURE_REPLY = 'Something went wrong, please try again later.';
export const CHECK_STARTED_REPLY = 'Checking every website now.';
export const ADMIN_ONLY_REPLY = 'Only the bot admin can run this command.';

// =============================================================================
// TYPES
// =============================================================================

export type DashboardEngine = Pick<
  MonitorEngine,
  'urls' | 'subscribe' | 'unsubscribe' | 'isSubscribed' | 'count' | 'snapshot' | 'checkNow'
>;

export interface DashboardContext {
  engine: DashboardEngine;
  adminId: string;
}

export interface InteractionReply {
  response: InteractionResponse;
  /** Sent as a follow-up message after the response */
  followup?: InteractionMessage;
}

// =============================================================================
// RENDERING
// =============================================================================

function button(label: string, style: ButtonComponent['style'], customId: string): ButtonComponent {
  return { type: 2, style, label, custom_id: customId };
}

export function dashboardComponents(subscribed: boolean): ActionRow[] {
  return [
    {
      type: 1,
      components: [
        subscribed
          ? button('Unsubscribe', 4, BUTTON_IDS.unsubscribe)
          : button('Subscribe', 3, BUTTON_IDS.subscribe),
        button('View Status', 1, BUTTON_IDS.status),
      ],
    },
  ];
}

export function renderDashboard(engine: DashboardEngine, userId: string): InteractionMessage {
  const embed: NotificationEmbed = {
    title: 'Website Monitor Dashboard',
    description: 'Subscribe for notifications, when any websites are available!',
    color: EMBED_COLORS.success,
    fields: [
      { name: 'Active Monitors', value: `${engine.urls.length} websites`, inline: true },
      { name: 'Subscribers', value: `${engine.count()} users`, inline: true },
    ],
  };

  return {
    embeds: [embed],
    components: dashboardComponents(engine.isSubscribed(userId)),
    flags: MessageFlags.Ephemeral,
  };
}

export function statusLabel(status: AvailabilityStatus): string {
  return STATUS_LABELS[status];
}

export function renderStatus(snapshot: UrlState[]): InteractionMessage {
  const shown = snapshot.length > MAX_EMBED_FIELDS ? snapshot.slice(0, MAX_EMBED_FIELDS - 1) : snapshot;
  const fields = shown.map((state) => ({ name: state.url, value: statusLabel(state.status), inline: false }));
  if (shown.length < snapshot.length) {
    fields.push({ name: 'More', value: `…and ${snapshot.length - shown.length} more websites`, inline: false });
  }

  return {
    embeds: [{ title: 'Website Status', color: EMBED_COLORS.info, fields }],
    flags: MessageFlags.Ephemeral,
  };
}

function ephemeral(content: string): InteractionMessage {
  return { content, flags: MessageFlags.Ephemeral };
}

function reply(data: InteractionMessage): InteractionReply {
  return { response: { type: InteractionResponseType.ChannelMessageWithSource, data } };
}

function errorReply(err: unknown, action: string, userId: string): string {
  if (err instanceof CapacityExceededError) return CAPACITY_REPLY;
  if (err instanceof InvalidSubscriberIdError) {
    logger.warn({ userId, action }, 'Rejected invalid user id');
  } else {
    logger.error({ err, userId, action }, 'Subscription change failed');
  }
  return FAILURE_REPLY;
}

// =============================================================================
// HANDLERS
// =============================================================================

/**
 * Reply to a slash command, or null for a command this bot does not own.
 */
export function handleCommand(name: string, userId: string, ctx: DashboardContext): InteractionReply | null {
  switch (name) {
    case 'monitor':
      try {
        return reply(renderDashboard(ctx.engine, userId));
      } catch (err) {
        logger.error({ err, userId }, 'Failed to render dashboard');
        return reply(ephemeral(FAILURE_REPLY));
      }

    case 'status':
      return reply(renderStatus(ctx.engine.snapshot()));

    case 'check':
      if (userId !== ctx.adminId) return reply(ephemeral(ADMIN_ONLY_REPLY));
      ctx.engine.checkNow();
      logger.info({ userId }, 'Manual check requested');
      return reply(ephemeral(CHECK_STARTED_REPLY));

    default:
      return null;
  }
}

/**
 * Reply to a dashboard button. Subscription changes update the dashboard in
 * place and confirm with an ephemeral follow-up.
 */
export function handleButton(customId: string, userId: string, ctx: DashboardContext): InteractionReply | null {
  switch (customId) {
    case BUTTON_IDS.status:
      return reply(renderStatus(ctx.engine.snapshot()));

    case BUTTON_IDS.subscribe:
    case BUTTON_IDS.unsubscribe: {
      let text: string;
      try {
        text =
          customId === BUTTON_IDS.subscribe
            ? SUBSCRIBE_REPLIES[ctx.engine.subscribe(userId)]
            : UNSUBSCRIBE_REPLIES[ctx.engine.unsubscribe(userId)];
      } catch (err) {
        return reply(ephemeral(errorReply(err, customId, userId)));
      }

      let dashboard: InteractionMessage;
      try {
        dashboard = renderDashboard(ctx.engine, userId);
      } catch (err) {
        logger.error({ err, userId }, 'Failed to refresh dashboard');
        return reply(ephemeral(text));
      }

      return {
        response: { type: InteractionResponseType.UpdateMessage, data: dashboard },
        followup: ephemeral(text),
      };
    }

    default:
      return null;
  }
}
