import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

export type AIProvider = 'gemini' | 'openai' | 'deepseek' | 'ollama' | 'custom' | 'mock';

export interface AIConfig {
  provider: AIProvider;
  model: string;
  apiKey: string;
  baseUrl?: string; // for custom/openai-compatible providers
}

/**
 * Default sampling options for generation calls
 */
export type GenerationDefaults = {
  maxTokens: number;
  temperature: number;
  topP: number;
};

export type AppConfig = {
  ai: AIConfig;
  generation: GenerationDefaults;
  continuity: {
    windowSize: number;
    maxSummaryChars: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  /** Directory for the file store; in-memory store when empty */
  dataDir: string;
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
};

// Provider base URLs
export const PROVIDER_BASE_URLS: Partial<Record<AIProvider, string>> = {
  openai: 'https://api.openai.com/v1',
  deepseek: 'https://api.deepseek.com/v1',
  ollama: 'http://localhost:11434/v1',
};

// Providers that work without an API key
const KEYLESS_PROVIDERS: AIProvider[] = ['ollama', 'mock'];

const numberFromEnv = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().finite().default(fallback)
  );

const EnvSchema = z.object({
  AI_PROVIDER: z.enum(['gemini', 'openai', 'deepseek', 'ollama', 'custom', 'mock']).optional(),
  AI_MODEL: z.string().optional(),
  AI_API_KEY: z.string().optional(),
  AI_BASE_URL: z.string().url().optional(),
  MAX_TOKENS: numberFromEnv(2000),
  TEMPERATURE: numberFromEnv(0.8),
  TOP_P: numberFromEnv(0.9),
  CONTINUITY_WINDOW: numberFromEnv(10),
  MAX_SUMMARY_CHARS: numberFromEnv(2400),
  RETRY_MAX_ATTEMPTS: numberFromEnv(3),
  RETRY_BASE_DELAY_MS: numberFromEnv(1000),
  DATA_DIR: z.string().default(''),
  PORT: numberFromEnv(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const FileConfigSchema = z.object({
  provider: z.enum(['gemini', 'openai', 'deepseek', 'ollama', 'custom', 'mock']).optional(),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
});

const DEFAULT_MODELS: Record<AIProvider, string> = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  deepseek: 'deepseek-chat',
  ollama: 'llama3.1',
  custom: 'gpt-4o-mini',
  mock: 'mock-storyteller',
};

const CONFIG_PATH = path.join(process.cwd(), 'config.json');

let cachedConfig: AppConfig | null = null;

/**
 * Builds the configuration from environment variables, with `config.json`
 * (if present) overriding the AI provider settings.
 */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = CONFIG_PATH
): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = EnvSchema.parse(env);
  const fileConfig = await readFileConfig(configPath);

  const apiKey = fileConfig.apiKey ?? parsed.AI_API_KEY ?? '';
  const requested = fileConfig.provider ?? parsed.AI_PROVIDER ?? 'gemini';
  // Without a key the only providers that can answer are local ones
  const provider: AIProvider =
    apiKey || KEYLESS_PROVIDERS.includes(requested) ? requested : 'mock';

  cachedConfig = {
    ai: {
      provider,
      model: fileConfig.model ?? parsed.AI_MODEL ?? DEFAULT_MODELS[provider],
      apiKey,
      baseUrl: fileConfig.baseUrl ?? parsed.AI_BASE_URL,
    },
    generation: {
      maxTokens: parsed.MAX_TOKENS,
      temperature: parsed.TEMPERATURE,
      topP: parsed.TOP_P,
    },
    continuity: {
      windowSize: Math.max(1, Math.floor(parsed.CONTINUITY_WINDOW)),
      maxSummaryChars: Math.max(240, Math.floor(parsed.MAX_SUMMARY_CHARS)),
    },
    retry: {
      maxAttempts: Math.max(1, Math.floor(parsed.RETRY_MAX_ATTEMPTS)),
      baseDelayMs: Math.max(0, parsed.RETRY_BASE_DELAY_MS),
    },
    dataDir: parsed.DATA_DIR,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
  };
  return cachedConfig;
}

async function readFileConfig(configPath: string): Promise<z.infer<typeof FileConfigSchema>> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch {
    // No config.json: environment only
    return {};
  }
  return FileConfigSchema.parse(JSON.parse(content));
}

/**
 * Get config with API key masked for client
 */
export function maskApiKey(config: AIConfig): AIConfig & { apiKeyMasked: string } {
  const masked = config.apiKey
    ? `${config.apiKey.slice(0, 8)}...${config.apiKey.slice(-4)}`
    : '';
  return {
    ...config,
    apiKey: '', // Don't send actual key to client
    apiKeyMasked: masked,
  };
}

/**
 * Clear cached config (useful when config is updated)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
