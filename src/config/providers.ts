/**
 * Provider configuration.
 * Built once from the environment and passed explicitly to the provider client.
 */

import { env, type Env } from './env';

export type ProviderKind = 'gemini' | 'chatgpt' | 'local';

export interface ProviderConfig {
  readonly kind: ProviderKind;
  readonly apiKey?: string;
  readonly model: string;
  /** Base URL for OpenAI-compatible variants */
  readonly endpoint?: string;
  readonly timeoutMs: number;
}

type ProviderEnv = Pick<
  Env,
  | 'ANALYSIS_PROVIDER'
  | 'GEMINI_API_KEY'
  | 'GEMINI_MODEL'
  | 'OPENAI_API_KEY'
  | 'OPENAI_MODEL'
  | 'OPENAI_BASE_URL'
  | 'LOCAL_AI_ENDPOINT'
  | 'LOCAL_AI_MODEL'
  | 'LOCAL_AI_API_KEY'
  | 'PROVIDER_TIMEOUT_MS'
>;

const CHAT_COMPLETIONS_SUFFIX = /\/chat\/completions\/?$/;

/** Reduce a full chat-completions URL to the base URL the SDK expects */
export function normalizeEndpoint(endpoint: string): string {
  return endpoint.trim().replace(CHAT_COMPLETIONS_SUFFIX, '').replace(/\/+$/, '');
}

export function isProviderKind(value: string): value is ProviderKind {
  return value === 'gemini' || value === 'chatgpt' || value === 'local';
}

export function loadProviderConfig(
  kind: ProviderKind = env.ANALYSIS_PROVIDER,
  source: ProviderEnv = env,
): ProviderConfig {
  const timeoutMs = source.PROVIDER_TIMEOUT_MS;

  switch (kind) {
    case 'gemini':
      return Object.freeze({
        kind,
        apiKey: source.GEMINI_API_KEY || undefined,
        model: source.GEMINI_MODEL,
        timeoutMs,
      });
    case 'chatgpt':
      return Object.freeze({
        kind,
        apiKey: source.OPENAI_API_KEY || undefined,
        model: source.OPENAI_MODEL,
        endpoint: normalizeEndpoint(source.OPENAI_BASE_URL),
        timeoutMs,
      });
    case 'local':
      return Object.freeze({
        kind,
        apiKey: source.LOCAL_AI_API_KEY || undefined,
        model: source.LOCAL_AI_MODEL,
        endpoint: normalizeEndpoint(source.LOCAL_AI_ENDPOINT),
        timeoutMs,
      });
  }
}
