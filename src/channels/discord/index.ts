/**
 * Discord bot front end
 *
 * Uses the raw Discord REST API + Gateway WebSocket (no discord.js).
 *
 * - Registers /monitor, /status and /check on the first READY
 * - Answers slash commands and dashboard buttons from the dashboard module
 * - Direct-message delivery lives in rest.ts (createDirectMessageChannel)
 */

import { z } from 'zod';
import { handleButton, handleCommand, SLASH_COMMANDS, type DashboardEngine, type InteractionReply } from '../../dashboard';
import { createLogger } from '../../utils/logger';
import { DiscordGateway, type GatewayOptions } from './gateway';
import { DiscordRestClient, InteractionResponseType } from './rest';

const logger = createLogger('discord');

// =============================================================================
// TYPES
// =============================================================================

export interface DiscordBotConfig {
  token: string;
  adminId: string;
  /** Taken from the READY event when not configured */
  applicationId?: string;
}

export type BotRestClient = Pick<
  DiscordRestClient,
  'getGatewayUrl' | 'registerCommands' | 'respondToInteraction' | 'createFollowup'
>;

export type BotGateway = Pick<DiscordGateway, 'connect' | 'close'>;

export interface DiscordBotDeps {
  engine: DashboardEngine;
  rest: BotRestClient;
  createGateway?: (options: GatewayOptions) => BotGateway;
}

const InteractionType = {
  Ping: 1,
  ApplicationCommand: 2,
  MessageComponent: 3,
} as const;

const userSchema = z.object({ id: z.string(), username: z.string().optional() });

const interactionSchema = z.object({
  id: z.string(),
  application_id: z.string(),
  type: z.number(),
  token: z.string(),
  guild_id: z.string().optional(),
  member: z.object({ user: userSchema }).optional(),
  user: userSchema.optional(),
  data: z
    .object({
      name: z.string().optional(),
      custom_id: z.string().optional(),
    })
    .optional(),
});

type Interaction = z.infer<typeof interactionSchema>;

const readyApplicationSchema = z.object({ application: z.object({ id: z.string() }) });

// =============================================================================
// BOT
// =============================================================================

export class DiscordBot {
  private readonly config: DiscordBotConfig;
  private readonly engine: DashboardEngine;
  private readonly rest: BotRestClient;
  private readonly gateway: BotGateway;
  private commandsRegistered = false;

  constructor(config: DiscordBotConfig, deps: DiscordBotDeps) {
    this.config = config;
    this.engine = deps.engine;
    this.rest = deps.rest;
    const createGateway = deps.createGateway ?? ((options: GatewayOptions) => new DiscordGateway(options));
    this.gateway = createGateway({
      token: config.token,
      getGatewayUrl: () => this.rest.getGatewayUrl(),
      onDispatch: (event, data) => this.onDispatch(event, data),
    });
  }

  /** Resolves once the gateway session is ready. */
  async start(): Promise<void> {
    await this.gateway.connect();
  }

  stop(): void {
    this.gateway.close();
    logger.info('Discord bot stopped');
  }

  onDispatch(event: string, data: unknown): void {
    if (event === 'READY') {
      const ready = readyApplicationSchema.safeParse(data);
      const applicationId = this.config.applicationId ?? (ready.success ? ready.data.application.id : undefined);
      this.registerCommands(applicationId).catch((err: unknown) => {
        logger.error({ err }, 'Failed to register slash commands');
      });
      return;
    }

    if (event === 'INTERACTION_CREATE') {
      this.handleInteraction(data).catch((err: unknown) => {
        logger.error({ err }, 'Failed to answer interaction');
      });
    }
  }

  async registerCommands(applicationId: string | undefined): Promise<void> {
    if (this.commandsRegistered) return;
    if (!applicationId) {
      logger.warn('No application id known, skipping slash command registration');
      return;
    }
    await this.rest.registerCommands(applicationId, SLASH_COMMANDS);
    this.commandsRegistered = true;
  }

  /**
   * Answer one INTERACTION_CREATE payload. Interactions this bot does not
   * own are ignored.
   */
  async handleInteraction(raw: unknown): Promise<void> {
    const parsed = interactionSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, 'Malformed interaction');
      return;
    }

    const interaction = parsed.data;
    if (interaction.type === InteractionType.Ping) {
      await this.rest.respondToInteraction(interaction.id, interaction.token, { type: InteractionResponseType.Pong });
      return;
    }

    const user = interaction.member?.user ?? interaction.user;
    if (!user) return;

    const reply = this.route(interaction, user.id);
    if (!reply) {
      logger.debug({ type: interaction.type, data: interaction.data }, 'Ignoring unhandled interaction');
      return;
    }

    await this.rest.respondToInteraction(interaction.id, interaction.token, reply.response);
    if (reply.followup) {
      await this.rest.createFollowup(interaction.application_id, interaction.token, reply.followup);
    }
  }

  private route(interaction: Interaction, userId: string): InteractionReply | null {
    const ctx = { engine: this.engine, adminId: this.config.adminId };
    if (interaction.type === InteractionType.ApplicationCommand && interaction.data?.name) {
      logger.info({ userId, command: interaction.data.name }, 'Slash command');
      return handleCommand(interaction.data.name, userId, ctx);
    }
    if (interaction.type === InteractionType.MessageComponent && interaction.data?.custom_id) {
      return handleButton(interaction.data.custom_id, userId, ctx);
    }
    return null;
  }
}

/**
 * Create the Discord bot. Pass the engine and a REST client sharing the bot token.
 */
export function createDiscordBot(config: DiscordBotConfig, deps: DiscordBotDeps): DiscordBot {
  return new DiscordBot(config, deps);
}

export { DiscordRestClient, createDiscordRestClient, createDirectMessageChannel } from './rest';
