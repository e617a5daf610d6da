/**
 * Response Renderer
 *
 * Turns an answer into the embeds posted back to Discord:
 * - First part carries the prompt as its title
 * - Later parts are titled "Part i/n"
 * - The final part carries the footer (model + daily call number) and the
 *   Reply button used for follow-up questions
 */

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from 'discord.js';
import { EMBED_TITLE_LIMIT, truncate } from './chunking';

export const ANSWER_COLOR = 0x3498db;
export const ERROR_COLOR = 0xe74c3c;

export const REPLY_BUTTON_ID = 'ask_gemini_reply';

export interface OutgoingMessage {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<ButtonBuilder>[];
}

export interface AnswerView {
  prompt: string;
  personalityName: string;
  modelDisplayName: string;
  callNumber: number;
  chunks: string[];
}

export class ResponseRenderer {
  static createErrorEmbed(message: string): EmbedBuilder {
    return new EmbedBuilder().setDescription(message).setColor(ERROR_COLOR);
  }

  static errorMessage(message: string): OutgoingMessage {
    return { embeds: [this.createErrorEmbed(message)], components: [] };
  }

  static buildReplyButton(): ActionRowBuilder<ButtonBuilder> {
    const replyButton = new ButtonBuilder()
      .setCustomId(REPLY_BUTTON_ID)
      .setLabel('Reply')
      .setEmoji('↪️')
      .setStyle(ButtonStyle.Primary);

    return new ActionRowBuilder<ButtonBuilder>().addComponents(replyButton);
  }

  static formatFooter(view: AnswerView, part: number): string {
    const total = view.chunks.length;
    const base = `Model: ${view.modelDisplayName} | API Call #${view.callNumber}`;
    return total > 1 ? `${base} | Part ${part}/${total}` : base;
  }

  /**
   * One message per chunk, in order.
   */
  static renderAnswer(view: AnswerView): OutgoingMessage[] {
    const total = view.chunks.length;

    return view.chunks.map((chunk, index) => {
      const part = index + 1;
      const isLast = part === total;
      const title = index === 0
        ? truncate(`Prompt: ${view.prompt}`, EMBED_TITLE_LIMIT)
        : `Part ${part}/${total}`;

      const embed = new EmbedBuilder()
        .setTitle(title)
        .setDescription(chunk)
        .setColor(ANSWER_COLOR)
        .setAuthor({ name: `Responding as: ${view.personalityName}` });

      if (isLast) {
        embed.setFooter({ text: this.formatFooter(view, part) });
      }

      return {
        embeds: [embed],
        components: isLast ? [this.buildReplyButton()] : [],
      };
    });
  }
}
