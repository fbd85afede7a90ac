import { Inject, Injectable, Logger } from '@nestjs/common';
import { LLM_CONFIG, LlmConfig } from '../../../config/llm.config';
import { describeError } from '../../../common/errors/http-exception.util';
import { UpstreamServiceError } from '../../../common/errors/service.errors';
import { GeminiKeyRotator } from '../../../common/utils/gemini-key-rotator';
import { buildSummaryPrompt, MEETING_MINUTES_SYSTEM_PROMPT } from '../prompts/meeting-minutes.prompt';
import { GeneratedSummary, Summarizer, SummaryRequest } from '../summarizer.interface';

interface GeminiCompletion {
  text: string;
  tokensUsed: number;
  blockReason?: string;
  finishReason?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Gemini `generateContent` client. One request per summary; no queue, no
 * retry. Provider failures surface as UpstreamServiceError with Gemini's
 * own message.
 */
@Injectable()
export class LlmClientService implements Summarizer {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly keys: GeminiKeyRotator;

  constructor(@Inject(LLM_CONFIG) private readonly config: LlmConfig) {
    this.keys = new GeminiKeyRotator(config.apiKeys);
    if (this.keys.size === 0) {
      this.logger.warn('GEMINI_API_KEY not found in environment variables');
    } else {
      this.logger.log(`✅ Gemini client ready (${config.model}, ${this.keys.size} key(s))`);
    }
  }

  async summarize(request: SummaryRequest, signal?: AbortSignal): Promise<GeneratedSummary> {
    const completion = await this.callGeminiAPI(buildSummaryPrompt(request), signal);

    if (!completion.text) {
      const reason = completion.blockReason ?? completion.finishReason;
      throw new UpstreamServiceError(
        'gemini',
        reason ? `Gemini returned no summary (${reason})` : 'Gemini returned no summary',
      );
    }

    return {
      summary: completion.text,
      model: this.config.model,
      tokensUsed: completion.tokensUsed,
    };
  }

  private async callGeminiAPI(prompt: string, signal?: AbortSignal): Promise<GeminiCompletion> {
    const apiKey = this.keys.next();
    const url = `${this.config.apiBaseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`;

    // Caller cancellation and our own timeout share one controller
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.requestTimeoutMs);

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Goog-Api-Key': apiKey,
        },
        body: JSON.stringify({
          systemInstruction: {
            parts: [{ text: MEETING_MINUTES_SYSTEM_PROMPT }],
          },
          contents: [
            {
              role: 'user',
              parts: [{ text: prompt }],
            },
          ],
          generationConfig: {
            temperature: this.config.temperature,
            maxOutputTokens: this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });

      const payload = await this.readJson(response);

      if (!response.ok) {
        const message = this.extractErrorMessage(payload) || response.statusText || `HTTP ${response.status}`;
        this.logger.error(`Gemini API error (${response.status}): ${message}`);
        throw new UpstreamServiceError('gemini', `Gemini API error: ${message}`);
      }

      return this.parseCompletion(payload);
    } catch (error) {
      if (error instanceof UpstreamServiceError) {
        throw error;
      }
      if (controller.signal.aborted) {
        const message = timedOut
          ? `Gemini request timed out after ${this.config.requestTimeoutMs}ms`
          : 'Gemini request was cancelled';
        this.logger.warn(message);
        throw new UpstreamServiceError('gemini', message);
      }
      this.logger.error('Gemini API call failed:', error);
      throw new UpstreamServiceError('gemini', `Gemini request failed: ${describeError(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    const body = await response.text();
    if (!body) {
      return undefined;
    }
    try {
      return JSON.parse(body);
    } catch {
      this.logger.debug(`Non-JSON response from Gemini: ${body.slice(0, 200)}`);
      return body;
    }
  }

  private extractErrorMessage(payload: unknown): string | undefined {
    if (isObject(payload) && isObject(payload.error) && typeof payload.error.message === 'string') {
      return payload.error.message;
    }
    return typeof payload === 'string' && payload.trim() ? payload.trim() : undefined;
  }

  private parseCompletion(payload: unknown): GeminiCompletion {
    if (!isObject(payload)) {
      throw new UpstreamServiceError('gemini', 'Unexpected response format from Gemini API');
    }

    const [candidate] = asArray(payload.candidates);
    const parts = isObject(candidate) && isObject(candidate.content) ? asArray(candidate.content.parts) : [];
    const text = parts
      .map((part) => (isObject(part) && typeof part.text === 'string' ? part.text : ''))
      .join('')
      .trim();

    const usage = payload.usageMetadata;
    const feedback = payload.promptFeedback;

    return {
      text,
      tokensUsed: isObject(usage) && typeof usage.totalTokenCount === 'number' ? usage.totalTokenCount : 0,
      blockReason: isObject(feedback) && typeof feedback.blockReason === 'string' ? feedback.blockReason : undefined,
      finishReason:
        isObject(candidate) && typeof candidate.finishReason === 'string' ? candidate.finishReason : undefined,
    };
  }
}
