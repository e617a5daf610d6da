import {
  ChatInputCommandInteraction,
  EmbedBuilder,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
  SlashCommandBuilder,
} from 'discord.js';
import { UsageTracker } from '../usage/usageTracker';
import { ANSWER_COLOR } from './responseRenderer';

export const USAGE_COMMAND_NAME = 'usage';

export function buildUsageCommand(): RESTPostAPIChatInputApplicationCommandsJSONBody {
  return new SlashCommandBuilder()
    .setName(USAGE_COMMAND_NAME)
    .setDescription("Show today's Gemini API call count")
    .toJSON();
}

export function buildUsageEmbed(count: number, date: string, dailyLimit: number): EmbedBuilder {
  const lines = [`**Calls today:** ${count}`];
  if (dailyLimit > 0) {
    lines.push(`**Daily limit:** ${dailyLimit} (${Math.max(0, dailyLimit - count)} remaining)`);
  }
  return new EmbedBuilder()
    .setTitle('Gemini usage')
    .setDescription(lines.join('\n'))
    .setColor(ANSWER_COLOR)
    .setFooter({ text: `Day: ${date}` });
}

export class UsageCommand {
  constructor(
    private readonly tracker: UsageTracker,
    private readonly dailyLimit: number
  ) {}

  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const count = await this.tracker.peek();
    await interaction.reply({
      embeds: [buildUsageEmbed(count, this.tracker.today(), this.dailyLimit)],
      ephemeral: true,
    });
  }
}
