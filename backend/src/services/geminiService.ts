import { FinishReason, GoogleGenAI } from '@google/genai';
import type { GeminiConfig } from '../config.js';
import { ServiceUnavailableError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { CONFIGURATION_MESSAGE } from './modelErrors.js';

const log = createLogger('Gemini');

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
  model: string;
}

/**
 * The external text-generation call: prompt in, raw reply text out.
 * Anything that satisfies this signature can stand in for Gemini.
 */
export type TextGenerator = (prompt: string, options: GenerationOptions) => Promise<string>;

const PLACEHOLDER_KEYS = new Set(['', 'your_api_key_here', 'your-gemini-api-key']);

export function hasUsableApiKey(config: GeminiConfig): boolean {
  return !PLACEHOLDER_KEYS.has(config.apiKey);
}

/**
 * Build a TextGenerator backed by the Gemini API.
 *
 * A missing key does not fail here so the server can still start; every call
 * is then rejected as a configuration problem. Each call is bounded by
 * `config.timeoutMs`.
 */
export function createGeminiTextGenerator(config: GeminiConfig): TextGenerator {
  if (!hasUsableApiKey(config)) {
    log.warn('GEMINI_API_KEY is not set; generation requests will be rejected');
    return async () => {
      throw new ServiceUnavailableError(CONFIGURATION_MESSAGE);
    };
  }

  const ai = new GoogleGenAI({ apiKey: config.apiKey });

  return async (prompt, options) => {
    const startedAt = Date.now();

    const response = await withTimeout(
      ai.models.generateContent({
        model: options.model,
        contents: prompt,
        config: {
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
        },
      }),
      config.timeoutMs
    );

    if (response.candidates?.[0]?.finishReason === FinishReason.MAX_TOKENS) {
      log.warn('Response was truncated due to max tokens limit', { model: options.model });
    }

    const text = response.text;
    if (!text) {
      throw new Error('No response from Gemini');
    }

    log.info(`Got response from ${options.model}`, {
      chars: text.length,
      elapsedMs: Date.now() - startedAt,
    });
    return text;
  };
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Gemini request timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
