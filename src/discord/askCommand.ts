import {
  ActionRowBuilder,
  ButtonInteraction,
  ChatInputCommandInteraction,
  MessageReplyOptions,
  ModalBuilder,
  ModalSubmitInteraction,
  RepliableInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
  SlashCommandBuilder,
  TextInputBuilder,
  TextInputStyle,
} from 'discord.js';
import { DEFAULT_MODEL, getModelChoices } from '../config/models';
import { PersonalityRegistry } from '../personalities';
import { AskHandler, EXPIRED_FOLLOWUP_MESSAGE, ReplyTarget } from './askHandler';
import { truncate } from './chunking';
import { ResponseRenderer } from './responseRenderer';

export const ASK_COMMAND_NAME = 'ask_gemini';
export const FOLLOWUP_MODAL_PREFIX = 'ask_gemini_followup:';
export const FOLLOWUP_INPUT_ID = 'followup_prompt';
export const FOLLOWUP_MAX_LENGTH = 1500;

export function buildAskCommand(
  personalities: PersonalityRegistry,
  defaultModel: string = DEFAULT_MODEL
): RESTPostAPIChatInputApplicationCommandsJSONBody {
  return new SlashCommandBuilder()
    .setName(ASK_COMMAND_NAME)
    .setDescription('Ask Gemini a question!')
    .addStringOption((option) =>
      option
        .setName('prompt')
        .setDescription('The question you want to ask')
        .setRequired(true)
    )
    .addStringOption((option) => {
      option
        .setName('personality')
        .setDescription(truncate(`The personality for the AI (default: ${personalities.defaultName ?? 'none'})`, 100))
        .setRequired(false);
      const choices = personalities.getChoices();
      return choices.length > 0 ? option.addChoices(...choices) : option;
    })
    .addStringOption((option) =>
      option
        .setName('model')
        .setDescription(`The AI model to use (default: ${defaultModel})`)
        .setRequired(false)
        .addChoices(...getModelChoices())
    )
    .addStringOption((option) =>
      option
        .setName('context')
        .setDescription('Optional: Relevant text/context from a previous message to include')
        .setRequired(false)
    )
    .toJSON();
}

export function buildFollowUpModal(parentMessageId: string): ModalBuilder {
  const input = new TextInputBuilder()
    .setCustomId(FOLLOWUP_INPUT_ID)
    .setLabel('Your Follow-up Question')
    .setPlaceholder('Enter your next question here...')
    .setStyle(TextInputStyle.Paragraph)
    .setRequired(true)
    .setMaxLength(FOLLOWUP_MAX_LENGTH);

  return new ModalBuilder()
    .setCustomId(`${FOLLOWUP_MODAL_PREFIX}${parentMessageId}`)
    .setTitle('Ask a Follow-up Question')
    .addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
}

/**
 * Answers go out as follow-ups; the first one replaces the deferred
 * "thinking" state.
 */
export function interactionTarget(interaction: RepliableInteraction): ReplyTarget {
  return {
    send: async (message) => {
      const sent = await interaction.followUp({
        embeds: message.embeds,
        components: message.components,
      });
      return { id: sent.id };
    },
    sendError: async (message) => {
      await interaction.followUp({ embeds: message.embeds, ephemeral: true });
    },
  };
}

/**
 * The parts of an incoming Discord message that a reply follow-up reads.
 */
export interface IncomingReply {
  author: { bot: boolean; username: string };
  reference: { messageId?: string } | null;
  content: string;
  reply(options: MessageReplyOptions): Promise<{ id: string }>;
}

export function messageTarget(message: IncomingReply): ReplyTarget {
  return {
    send: async (outgoing) => {
      const sent = await message.reply({
        embeds: outgoing.embeds,
        components: outgoing.components,
      });
      return { id: sent.id };
    },
    sendError: async (outgoing) => {
      await message.reply({ embeds: outgoing.embeds });
    },
  };
}

/**
 * Discord entry points for /ask_gemini and its follow-ups.
 */
export class AskCommand {
  constructor(private readonly handler: AskHandler) {}

  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    await interaction.deferReply();

    await this.handler.ask(
      {
        prompt: interaction.options.getString('prompt', true),
        personality: interaction.options.getString('personality'),
        model: interaction.options.getString('model'),
        context: interaction.options.getString('context'),
        userTag: interaction.user.username,
      },
      interactionTarget(interaction)
    );
  }

  async handleReplyButton(interaction: ButtonInteraction): Promise<void> {
    if (!this.handler.getExchange(interaction.message.id)) {
      await interaction.reply({
        embeds: [ResponseRenderer.createErrorEmbed(EXPIRED_FOLLOWUP_MESSAGE)],
        ephemeral: true,
      });
      return;
    }
    await interaction.showModal(buildFollowUpModal(interaction.message.id));
  }

  async handleFollowUpModal(interaction: ModalSubmitInteraction): Promise<void> {
    const parentMessageId = interaction.customId.slice(FOLLOWUP_MODAL_PREFIX.length);
    const prompt = interaction.fields.getTextInputValue(FOLLOWUP_INPUT_ID);

    await interaction.deferReply();
    await this.handler.askFollowUp(
      parentMessageId,
      prompt,
      interaction.user.username,
      interactionTarget(interaction)
    );
  }

  /**
   * A plain reply to one of the bot's answers continues that exchange.
   * Returns false when the message is not such a reply.
   */
  async handleMessageReply(message: IncomingReply): Promise<boolean> {
    if (message.author.bot) return false;
    const parentMessageId = message.reference?.messageId;
    if (!parentMessageId || !this.handler.getExchange(parentMessageId)) return false;

    await this.handler.askFollowUp(
      parentMessageId,
      message.content,
      message.author.username,
      messageTarget(message)
    );
    return true;
  }
}
