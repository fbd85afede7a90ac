import { Env, readFloat, readInt, readString } from './env.util';

export const LLM_CONFIG = Symbol('LLM_CONFIG');

export interface LlmConfig {
  apiKeys: string[];
  apiBaseUrl: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  requestTimeoutMs: number;
}

const GEMINI_KEY_ENV_VARS = [
  'GEMINI_API_KEY',
  'GEMINI_API_KEY_2',
  'GEMINI_API_KEY_3',
  'GEMINI_API_KEY_4',
  'GEMINI_API_KEY_5',
];

export function loadLlmConfig(env: Env = process.env): LlmConfig {
  return {
    apiKeys: GEMINI_KEY_ENV_VARS.map((name) => readString(env, name)).filter(Boolean),
    apiBaseUrl: readString(env, 'GEMINI_API_URL', 'https://generativelanguage.googleapis.com/v1beta').replace(/\/+$/, ''),
    model: readString(env, 'GEMINI_MODEL', 'gemini-2.0-flash-lite'),
    temperature: readFloat(env, 'LLM_TEMPERATURE', 0.7),
    maxOutputTokens: readInt(env, 'LLM_MAX_OUTPUT_TOKENS', 2048),
    requestTimeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 60_000),
  };
}

export function isLlmConfigured(config: LlmConfig): boolean {
  return config.apiKeys.length > 0;
}
