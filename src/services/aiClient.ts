import { GoogleGenAI } from '@google/genai';
import OpenAI from 'openai';
import { PROVIDER_BASE_URLS, type AIConfig, type GenerationDefaults } from '../config.js';
import { TIMEOUTS } from '../config/timeouts.js';
import { createMockBackend } from './mockBackend.js';

export type GenerationPurpose = 'arc_brief' | 'chapter' | 'recap' | 'compress' | 'ping';

export type GenerateOptions = {
  purpose: GenerationPurpose;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  signal?: AbortSignal;
};

/**
 * The only capability the engine needs from a text model.
 */
export interface GenerationBackend {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

/**
 * Failure reported by a backend. `transient` marks failures the provider
 * itself considers temporary (rate limits, 5xx, timeouts, network).
 */
export class BackendCallError extends Error {
  constructor(
    message: string,
    readonly transient: boolean,
    readonly quota: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BackendCallError';
  }
}

export function classifyBackendError(error: unknown): BackendCallError {
  if (error instanceof BackendCallError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);
  const quota = status === 429 || /quota|rate.?limit|429/i.test(message);
  const transient =
    quota ||
    (status !== undefined && status >= 500) ||
    /timeout|timed out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|socket hang up|network/i.test(message);

  return new BackendCallError(message, transient, quota, { cause: error });
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Builds the backend for the configured provider.
 */
export function createBackend(config: AIConfig, defaults: GenerationDefaults): GenerationBackend {
  if (config.provider === 'mock') {
    return createMockBackend();
  }
  if (config.provider === 'gemini') {
    return createGeminiBackend(config, defaults);
  }
  return createOpenAIBackend(config, defaults);
}

/**
 * Gemini through @google/genai
 */
function createGeminiBackend(config: AIConfig, defaults: GenerationDefaults): GenerationBackend {
  const client = new GoogleGenAI({
    apiKey: config.apiKey,
    httpOptions: { timeout: TIMEOUTS.AI_REQUEST },
  });

  return {
    name: `gemini:${config.model}`,
    async generate(prompt, options) {
      try {
        const response = await client.models.generateContent({
          model: config.model,
          config: {
            systemInstruction: options.system,
            temperature: options.temperature ?? defaults.temperature,
            maxOutputTokens: options.maxTokens ?? defaults.maxTokens,
            topP: options.topP ?? defaults.topP,
            abortSignal: options.signal,
          },
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
        });

        // Extract text from response
        let text = response.text ?? '';
        if (!text) {
          const parts = response.candidates?.[0]?.content?.parts ?? [];
          text = parts.map((part) => part.text ?? '').join('');
        }
        return requireText(text);
      } catch (error) {
        throw classifyBackendError(error);
      }
    },
  };
}

/**
 * OpenAI-compatible APIs (OpenAI, DeepSeek, Ollama, custom)
 */
function createOpenAIBackend(config: AIConfig, defaults: GenerationDefaults): GenerationBackend {
  const client = new OpenAI({
    // Ollama ignores the key but the SDK requires one
    apiKey: config.apiKey || config.provider,
    baseURL: config.baseUrl || PROVIDER_BASE_URLS[config.provider],
    timeout: TIMEOUTS.AI_REQUEST,
    // Retries belong to the engine's RetryPolicy
    maxRetries: 0,
  });

  return {
    name: `${config.provider}:${config.model}`,
    async generate(prompt, options) {
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
      if (options.system) {
        messages.push({ role: 'system', content: options.system });
      }
      messages.push({ role: 'user', content: prompt });

      try {
        const response = await client.chat.completions.create(
          {
            model: config.model,
            messages,
            temperature: options.temperature ?? defaults.temperature,
            max_tokens: options.maxTokens ?? defaults.maxTokens,
            top_p: options.topP ?? defaults.topP,
          },
          { signal: options.signal }
        );
        return requireText(response.choices[0]?.message?.content ?? '');
      } catch (error) {
        throw classifyBackendError(error);
      }
    },
  };
}

function requireText(text: string): string {
  if (!text.trim()) {
    throw new BackendCallError('Empty model response', true, false);
  }
  return text.trim();
}

/**
 * Test a backend with a one-word prompt
 */
export async function testConnection(
  backend: GenerationBackend
): Promise<{ success: boolean; message: string; backend: string }> {
  try {
    const reply = await backend.generate('Say "Hello" in one word.', {
      purpose: 'ping',
      system: 'You are a helpful assistant.',
      temperature: 0,
      maxTokens: 16,
      signal: AbortSignal.timeout(TIMEOUTS.TEST_CONNECTION),
    });
    return { success: true, message: `Connected. Reply: "${reply}"`, backend: backend.name };
  } catch (error) {
    return {
      success: false,
      message: `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
      backend: backend.name,
    };
  }
}
