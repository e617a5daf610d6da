import { getModelDisplayName, ModelDisplayName, resolveModel } from '../config/models';
import { describeError, QuotaExceededError, ValidationError } from '../errors';
import { GenerationRequest, GenerationResult, TextGenerator } from '../llm/geminiService';
import { createLogger } from '../logger';
import { PersonalityRegistry } from '../personalities';
import { UsageTracker } from '../usage/usageTracker';
import { chunkText } from './chunking';
import { Exchange, ExchangeStore, followUpContext } from './exchangeStore';
import { OutgoingMessage, ResponseRenderer } from './responseRenderer';

const log = createLogger('ask');

export const PROMPT_USAGE_HINT =
  'Please provide a prompt, e.g. `/ask_gemini prompt: What is 2+2?`';

export const EXPIRED_FOLLOWUP_MESSAGE =
  'This conversation has expired. Start a new one with `/ask_gemini`.';

export interface AskRequest {
  prompt: string;
  personality?: string | null;
  model?: string | null;
  context?: string | null;
  userTag: string;
}

/**
 * Where an answer goes: an interaction's follow-ups or a channel reply.
 */
export interface ReplyTarget {
  send(message: OutgoingMessage): Promise<{ id: string }>;
  sendError(message: OutgoingMessage): Promise<void>;
}

export type AskOutcome =
  | { status: 'answered'; callNumber: number; messageIds: string[] }
  | { status: 'failed'; error: unknown };

export interface AskHandlerOptions {
  generator: TextGenerator;
  tracker: UsageTracker;
  personalities: PersonalityRegistry;
  exchanges: ExchangeStore;
  defaultModel: ModelDisplayName;
  chunkSize: number;
  dailyLimit: number;
}

export function composePrompt(prompt: string, context?: string | null): string {
  if (context) {
    return `Previous Context Provided by User:\n${context}\n\nUser Question: ${prompt}`;
  }
  return prompt;
}

/**
 * Runs one /ask_gemini request end to end: validation, one Gemini call,
 * the usage count, and the chunked reply.
 */
export class AskHandler {
  /** Calls past the quota check that have not been counted yet. */
  private reserved = 0;

  constructor(private readonly options: AskHandlerOptions) {}

  async ask(request: AskRequest, target: ReplyTarget): Promise<AskOutcome> {
    try {
      const prompt = request.prompt.trim();
      if (!prompt) {
        throw new ValidationError(PROMPT_USAGE_HINT);
      }

      const personality = this.options.personalities.resolve(request.personality);
      const modelId = resolveModel(request.model, this.options.defaultModel);

      const context = request.context?.trim() || undefined;
      log.info(`Processing prompt for ${request.userTag} using model '${modelId}'`);

      const { result, callNumber } = await this.generateCounted({
        model: modelId,
        prompt: composePrompt(prompt, context),
        systemInstruction: personality.systemPrompt,
      });

      const messages = ResponseRenderer.renderAnswer({
        prompt,
        personalityName: personality.name,
        modelDisplayName: getModelDisplayName(modelId),
        callNumber,
        chunks: [...chunkText(result.text, this.options.chunkSize)],
      });

      const messageIds: string[] = [];
      for (const message of messages) {
        const sent = await target.send(message);
        messageIds.push(sent.id);
      }

      const lastId = messageIds[messageIds.length - 1];
      if (lastId) {
        this.options.exchanges.remember(lastId, {
          prompt,
          answer: result.text,
          modelId,
          personalityName: personality.name,
        });
      }

      return { status: 'answered', callNumber, messageIds };
    } catch (error) {
      if (error instanceof ValidationError || error instanceof QuotaExceededError) {
        log.info(`Rejected request from ${request.userTag}: ${error.message}`);
      } else {
        log.error(`Request from ${request.userTag} failed:`, error);
      }
      await this.reportFailure(target, describeError(error));
      return { status: 'failed', error };
    }
  }

  /**
   * Continues the exchange behind `parentMessageId`, one level deep.
   */
  async askFollowUp(
    parentMessageId: string,
    prompt: string,
    userTag: string,
    target: ReplyTarget
  ): Promise<AskOutcome> {
    const exchange = this.options.exchanges.get(parentMessageId);
    if (!exchange) {
      await this.reportFailure(target, EXPIRED_FOLLOWUP_MESSAGE);
      return { status: 'failed', error: new ValidationError(EXPIRED_FOLLOWUP_MESSAGE) };
    }

    return this.ask(
      {
        prompt,
        personality: exchange.personalityName,
        model: exchange.modelId,
        context: followUpContext(exchange),
        userTag,
      },
      target
    );
  }

  getExchange(messageId: string): Exchange | undefined {
    return this.options.exchanges.get(messageId);
  }

  /**
   * One Gemini call, counted once it succeeds. With a daily limit set, a
   * slot is held from the quota check until the count is written, so
   * concurrent requests cannot overshoot the limit.
   */
  private async generateCounted(
    request: GenerationRequest
  ): Promise<{ result: GenerationResult; callNumber: number }> {
    const release = await this.reserveQuota();
    try {
      const result = await this.options.generator.generate(request);
      const callNumber = await this.options.tracker.getAndIncrement();
      return { result, callNumber };
    } finally {
      release();
    }
  }

  private async reserveQuota(): Promise<() => void> {
    const limit = this.options.dailyLimit;
    if (limit <= 0) return () => undefined;
    const used = await this.options.tracker.peek();
    if (used + this.reserved >= limit) {
      throw new QuotaExceededError(limit);
    }
    this.reserved++;
    return () => {
      this.reserved--;
    };
  }

  private async reportFailure(target: ReplyTarget, message: string): Promise<void> {
    try {
      await target.sendError(ResponseRenderer.errorMessage(message));
    } catch (error) {
      log.error('Could not deliver error message:', error);
    }
  }
}
