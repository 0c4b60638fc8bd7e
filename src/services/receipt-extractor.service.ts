import { z } from 'zod';
import { CircuitBreaker, type CircuitBreakerState } from '../utils/circuit-breaker.ts';
import { getEnv } from '../config/env.ts';
import { SYSTEM_PROMPT, buildImagePrompt, buildTextPrompt, buildUpdatePrompt } from '../config/prompts.ts';
import { extractJsonPayload } from '../parsers/ai-output.parser.ts';
import {
  MalformedOutputError,
  OperationCancelledError,
  ServiceError,
  errorMessage,
  throwIfAborted,
} from '../utils/errors.ts';
import { redactSecrets } from '../utils/redact.ts';
import type { ReceiptExtractor } from '../types/ai.types.ts';

const OPENROUTER_URL = 'https://openrouter.ai/api/v1/chat/completions';

interface ReceiptExtractorConfig {
  primaryModel: string;
  fallbackModel: string;
  visionModel: string;
  openRouterApiKey: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerCooldownMs: number;
  now: () => Date;
}

type MessageContent =
  | string
  | Array<
      | { type: 'text'; text: string }
      | { type: 'image_url'; image_url: { url: string } }
    >;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .optional(),
});

export function formatPromptDate(date: Date): string {
  const dd = String(date.getDate()).padStart(2, '0');
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  return `${dd}-${mm}-${date.getFullYear()}`;
}

/**
 * OpenRouter-backed receipt extraction. The primary model sits behind a
 * circuit breaker; the fallback model is tried whenever the primary fails
 * or returns something that is not a JSON object.
 */
export class ReceiptExtractorService implements ReceiptExtractor {
  private circuitBreaker: CircuitBreaker;
  private config: ReceiptExtractorConfig;

  constructor(config: Partial<ReceiptExtractorConfig> = {}) {
    const env = getEnv();
    this.config = {
      primaryModel: env.AI_PRIMARY_MODEL,
      fallbackModel: env.AI_FALLBACK_MODEL,
      visionModel: env.AI_VISION_MODEL,
      openRouterApiKey: env.OPENROUTER_API_KEY,
      temperature: 0.05,
      maxTokens: 4000,
      timeoutMs: env.AI_TIMEOUT_MS,
      circuitBreakerThreshold: 3,
      circuitBreakerCooldownMs: 600000, // 10 minutes
      now: () => new Date(),
      ...config,
    };

    this.circuitBreaker = new CircuitBreaker({
      name: 'openrouter',
      threshold: this.config.circuitBreakerThreshold,
      cooldownMs: this.config.circuitBreakerCooldownMs,
    });
  }

  async extractFromImage(
    image: Uint8Array,
    mimeType: string,
    caption?: string,
    signal?: AbortSignal
  ): Promise<string> {
    const prompt = buildImagePrompt(this.currentDate(), caption);
    const dataUrl = `data:${mimeType};base64,${Buffer.from(image).toString('base64')}`;

    return this.complete(
      [
        { type: 'text', text: prompt },
        { type: 'image_url', image_url: { url: dataUrl } },
      ],
      true,
      signal
    );
  }

  async extractFromText(text: string, signal?: AbortSignal): Promise<string> {
    return this.complete(buildTextPrompt(this.currentDate(), text), false, signal);
  }

  async applyComment(originalJson: string, comment: string, signal?: AbortSignal): Promise<string> {
    return this.complete(buildUpdatePrompt(this.currentDate(), originalJson, comment), false, signal);
  }

  getCircuitState(): CircuitBreakerState {
    return this.circuitBreaker.getState();
  }

  private currentDate(): string {
    return formatPromptDate(this.config.now());
  }

  private async complete(content: MessageContent, isVision: boolean, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const model = isVision ? this.config.visionModel : this.config.primaryModel;
    let lastError: unknown = null;

    // Try primary model if circuit is closed
    if (this.circuitBreaker.isAllowed()) {
      try {
        const response = await this.callOpenRouter(model, content, signal);
        this.circuitBreaker.recordSuccess();
        return extractJsonPayload(response);
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        if (!(error instanceof MalformedOutputError)) {
          this.circuitBreaker.recordFailure();
        }
        lastError = error;
        console.error(`[ReceiptExtractor] Primary model failed: ${redactSecrets(errorMessage(error))}`);
      }
    }

    // Fallback to secondary model
    try {
      console.log('[ReceiptExtractor] Using fallback model');
      const response = await this.callOpenRouter(this.config.fallbackModel, content, signal);
      return extractJsonPayload(response);
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      console.error(`[ReceiptExtractor] Fallback model failed: ${redactSecrets(errorMessage(error))}`);
      if (error instanceof MalformedOutputError) throw error;
      if (lastError instanceof MalformedOutputError) throw lastError;
      throw new ServiceError('openrouter', 'Both primary and fallback AI models failed', {
        status: error instanceof ServiceError && error.status !== null ? error.status : undefined,
        cause: error,
      });
    }
  }

  private async callOpenRouter(model: string, content: MessageContent, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    console.log(`[ReceiptExtractor] Calling ${model}`);

    let response: Response;
    try {
      response = await fetch(OPENROUTER_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.openRouterApiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content },
          ],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        }),
        signal: combined,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('AI request cancelled', { cause: error });
      }
      if (timeout.aborted) {
        throw new ServiceError('openrouter', `Request timed out after ${this.config.timeoutMs}ms`, { cause: error });
      }
      throw new ServiceError('openrouter', redactSecrets(errorMessage(error)), { cause: error });
    }

    if (!response.ok) {
      const error = await response.text();
      throw new ServiceError('openrouter', `OpenRouter API error: ${response.status} - ${redactSecrets(error.slice(0, 300))}`, {
        status: response.status,
      });
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = completionSchema.safeParse(body);
    const responseContent = parsed.success ? parsed.data.choices?.[0]?.message?.content : undefined;

    if (!responseContent) {
      throw new MalformedOutputError('Empty response from AI', '');
    }

    return responseContent;
  }
}
