import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { GeminiApiError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('gemini');

export interface GenerationRequest {
  model: string;
  prompt: string;
  systemInstruction?: string;
}

export interface TokenUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface GenerationResult {
  text: string;
  model: string;
  finishReason?: string;
  usage?: TokenUsage;
  latencyMs: number;
}

/**
 * Anything that turns a prompt into text. The ask handler depends on this
 * rather than on the HTTP client.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface GeminiServiceOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(z.object({ text: z.string().optional(), thought: z.boolean().optional() }))
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

type GenerateContentResponse = z.infer<typeof generateContentResponseSchema>;

const apiErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

const BLOCKING_FINISH_REASONS = new Set([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
  'IMAGE_SAFETY',
]);

/**
 * Client for the Generative Language `generateContent` REST endpoint.
 * One request per call; failures are never retried here.
 */
export class GeminiService implements TextGenerator {
  private client: AxiosInstance;

  constructor(options: GeminiServiceOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'x-goog-api-key': options.apiKey,
        'Content-Type': 'application/json',
      },
      ...(options.adapter !== undefined && { adapter: options.adapter }),
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const requestTimestamp = Date.now();
    log.info(`Request: model=${request.model}, prompt=${request.prompt.length} chars`);
    log.debug('Prompt preview:', request.prompt.substring(0, 100));

    const body = {
      contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
      ...(request.systemInstruction !== undefined && {
        systemInstruction: { parts: [{ text: request.systemInstruction }] },
      }),
    };

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        `/models/${encodeURIComponent(request.model)}:generateContent`,
        body
      );
      data = response.data;
    } catch (error) {
      throw this.toApiError(error);
    }

    const latencyMs = Date.now() - requestTimestamp;
    const parsed = generateContentResponseSchema.safeParse(data);
    if (!parsed.success) {
      log.error('Invalid API response structure:', JSON.stringify(data).substring(0, 500));
      throw new GeminiApiError('empty', 'Invalid response structure from Gemini API');
    }

    const result = this.toResult(parsed.data, request.model, latencyMs);
    log.info(`Response received in ${latencyMs} ms (length ${result.text.length})`);
    return result;
  }

  private toResult(response: GenerateContentResponse, model: string, latencyMs: number): GenerationResult {
    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GeminiApiError('blocked', `Prompt blocked: ${blockReason}`);
    }

    const candidate = response.candidates?.[0];
    if (!candidate) {
      throw new GeminiApiError('empty', 'The model returned no candidates');
    }

    const text = (candidate.content?.parts ?? [])
      .filter((part) => !part.thought)
      .map((part) => part.text ?? '')
      .join('');

    if (!text) {
      const finishReason = candidate.finishReason ?? 'UNKNOWN';
      log.warn(`Response had no text. Finish Reason: ${finishReason}`);
      if (BLOCKING_FINISH_REASONS.has(finishReason)) {
        throw new GeminiApiError('blocked', `Response blocked: ${finishReason}`);
      }
      throw new GeminiApiError('empty', `No text in response (finish reason ${finishReason})`);
    }

    const usage = response.usageMetadata;
    return {
      text,
      model: response.modelVersion ?? model,
      finishReason: candidate.finishReason,
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount,
            completionTokens: usage.candidatesTokenCount,
            totalTokens: usage.totalTokenCount,
          }
        : undefined,
      latencyMs,
    };
  }

  private toApiError(error: unknown): GeminiApiError {
    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new GeminiApiError('request', message);
    }

    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      log.warn('Gemini request timed out');
      return new GeminiApiError('timeout', 'Gemini API timeout');
    }

    const status = error.response?.status;
    const apiBody = apiErrorBodySchema.safeParse(error.response?.data);
    const detail = apiBody.success ? apiBody.data.error.message : error.message;

    if (status === 429) {
      log.warn(`Gemini rate limit hit: ${detail}`);
      return new GeminiApiError('rate_limit', `Gemini API quota exceeded: ${detail}`, status);
    }

    log.error(`Gemini request failed${status ? ` (HTTP ${status})` : ''}: ${detail}`);
    return new GeminiApiError('request', `Gemini API error: ${detail}`, status);
  }
}
