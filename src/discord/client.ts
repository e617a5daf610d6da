import {
  Client,
  Events,
  GatewayIntentBits,
  Interaction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { Config } from '../config';
import { TextGenerator } from '../llm/geminiService';
import { createLogger } from '../logger';
import { PersonalityRegistry } from '../personalities';
import { UsageTracker } from '../usage/usageTracker';
import { AskCommand, ASK_COMMAND_NAME, buildAskCommand, FOLLOWUP_MODAL_PREFIX } from './askCommand';
import { AskHandler } from './askHandler';
import { ExchangeStore } from './exchangeStore';
import { REPLY_BUTTON_ID } from './responseRenderer';
import { buildUsageCommand, UsageCommand, USAGE_COMMAND_NAME } from './usageCommand';

const log = createLogger('discord');

export interface BotServices {
  generator: TextGenerator;
  tracker: UsageTracker;
  personalities: PersonalityRegistry;
}

export class DiscordBot {
  private client: Client;
  private askCommand: AskCommand;
  private usageCommand: UsageCommand;
  private commands: RESTPostAPIChatInputApplicationCommandsJSONBody[];

  constructor(
    private readonly config: Config,
    private readonly services: BotServices
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });

    const handler = new AskHandler({
      generator: services.generator,
      tracker: services.tracker,
      personalities: services.personalities,
      exchanges: new ExchangeStore(config.bot.followUpTtlMs),
      defaultModel: config.gemini.defaultModel,
      chunkSize: config.bot.chunkSize,
      dailyLimit: config.usage.dailyLimit,
    });

    this.askCommand = new AskCommand(handler);
    this.usageCommand = new UsageCommand(services.tracker, config.usage.dailyLimit);
    this.commands = [
      buildAskCommand(services.personalities, config.gemini.defaultModel),
      buildUsageCommand(),
    ];

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, async (readyClient) => {
      try {
        const count = await this.services.tracker.load();
        log.info(`Logged in as ${readyClient.user.tag} (ID: ${readyClient.user.id})`);
        log.info(`Bot is ready. API calls today: ${count}`);
        await this.registerCommands(readyClient);
      } catch (error) {
        log.error('Failed to finish startup:', error);
      }
    });

    this.client.on(Events.InteractionCreate, async (interaction) => {
      try {
        await this.handleInteraction(interaction);
      } catch (error) {
        log.error('Error handling interaction:', error);
      }
    });

    this.client.on(Events.MessageCreate, async (message) => {
      try {
        await this.askCommand.handleMessageReply(message);
      } catch (error) {
        log.error('Error in message handler:', error);
      }
    });

    this.client.on(Events.Error, (error) => {
      log.error('Discord client error:', error);
    });

    this.client.on(Events.Warn, (warning) => {
      log.warn('Discord client warning:', warning);
    });
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      if (interaction.commandName === ASK_COMMAND_NAME) {
        await this.askCommand.handleCommand(interaction);
      } else if (interaction.commandName === USAGE_COMMAND_NAME) {
        await this.usageCommand.handleCommand(interaction);
      }
      return;
    }

    if (interaction.isButton() && interaction.customId === REPLY_BUTTON_ID) {
      await this.askCommand.handleReplyButton(interaction);
      return;
    }

    if (interaction.isModalSubmit() && interaction.customId.startsWith(FOLLOWUP_MODAL_PREFIX)) {
      await this.askCommand.handleFollowUpModal(interaction);
    }
  }

  /**
   * A testing guild gets the commands immediately; global registration can
   * take up to an hour to show up.
   */
  private async registerCommands(readyClient: Client<true>): Promise<void> {
    const guildId = this.config.discord.testingGuildId;
    const names = this.commands.map((c) => c.name).join(', ');

    if (guildId) {
      const guild = await readyClient.guilds.fetch(guildId);
      await guild.commands.set(this.commands);
      log.info(`Synced commands (${names}) to Guild ID: ${guildId}`);
      return;
    }

    await readyClient.application.commands.set(this.commands);
    log.info(`Registered global commands: ${names}`);
  }

  async start(): Promise<void> {
    log.info('Starting Discord bot...');
    try {
      await this.client.login(this.config.discord.token);
    } catch (error) {
      log.error('Failed to log in. Check DISCORD_TOKEN:', error);
      throw error;
    }
  }

  async stop(): Promise<void> {
    log.info('Stopping Discord bot...');
    await this.client.destroy();
  }
}
