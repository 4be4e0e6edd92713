import path from 'path';
import { PitchDeckError } from './errors.js';
import type { Credentials, ModelConfig, ModelProvider } from './types.js';

export const MODEL_PRESETS: Record<ModelProvider, ModelConfig> = {
  novita: {
    provider: 'novita',
    baseURL: 'https://api.novita.ai/v3/openai',
    model: 'meta-llama/llama-4-maverick-17b-128e-instruct-fp8',
    label: 'LLaMA 4 Maverick (Novita AI)',
  },
  openrouter: {
    provider: 'openrouter',
    baseURL: 'https://openrouter.ai/api/v1',
    model: 'openai/gpt-4o',
    label: 'GPT-4o (OpenRouter)',
  },
};

/**
 * Values shipped in .env.example; treated the same as a missing key
 */
export const PLACEHOLDER_KEYS = {
  novita: 'YOUR_NOVITA_API_KEY',
  openrouter: 'YOUR_OPENROUTER_API_KEY',
  unsplash: 'YOUR_UNSPLASH_API_KEY',
} as const;

const KEY_ENV_VARS: Record<ModelProvider, string> = {
  novita: 'NOVITA_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
};

type Env = Record<string, string | undefined>;

function readVar(env: Env, name: string): string | undefined {
  const value = env[name]?.replace(/"/g, '').trim(); // Remove quotes if present
  return value ? value : undefined;
}

/**
 * A key is usable when it is non-blank and not the documented placeholder
 */
export function isUsableKey(key: string | undefined, placeholder?: string): key is string {
  if (!key || key.trim() === '') return false;
  return key.trim() !== placeholder;
}

export function isModelProvider(value: string): value is ModelProvider {
  return value === 'novita' || value === 'openrouter';
}

export function modelKeyEnvVar(provider: ModelProvider): string {
  return KEY_ENV_VARS[provider];
}

/**
 * Resolve the model endpoint from LLM_PROVIDER, LLM_MODEL and LLM_BASE_URL
 */
export function readModelConfig(env: Env = process.env): ModelConfig {
  const requested = readVar(env, 'LLM_PROVIDER')?.toLowerCase() ?? 'novita';
  if (!isModelProvider(requested)) {
    throw new PitchDeckError(`Unknown LLM_PROVIDER "${requested}" (expected "novita" or "openrouter")`);
  }

  const preset = MODEL_PRESETS[requested];
  const model = readVar(env, 'LLM_MODEL') ?? preset.model;
  return {
    ...preset,
    model,
    baseURL: readVar(env, 'LLM_BASE_URL') ?? preset.baseURL,
    label: model === preset.model ? preset.label : model,
  };
}

/**
 * Read both API keys. LLM_API_KEY wins over the provider-specific variable.
 */
export function readCredentials(provider: ModelProvider, env: Env = process.env): Credentials {
  return {
    modelApiKey: readVar(env, 'LLM_API_KEY') ?? readVar(env, KEY_ENV_VARS[provider]),
    imageAccessKey: readVar(env, 'UNSPLASH_ACCESS_KEY'),
  };
}

export function readOutputDirectory(env: Env = process.env): string {
  return path.resolve(readVar(env, 'OUTPUT_DIR') ?? process.cwd());
}
