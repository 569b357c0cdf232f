/**
 * Chat-completions backends: the hosted ChatGPT API and self-hosted
 * OpenAI-compatible servers. Only the base URL and key requirement differ.
 */

import OpenAI, { APIConnectionError } from 'openai';
import type { ChatCompletion } from 'openai/resources/chat/completions';
import {
  OPENAI_MAX_TOKENS,
  RETRY_POLICY,
  SAMPLING_TEMPERATURE,
  SAMPLING_TOP_P,
} from '../../config/constants';
import type { ProviderConfig } from '../../config/providers';
import { SYSTEM_INSTRUCTION } from '../../prompts/analysis';
import { delay } from '../../utils/delay';
import {
  AnalysisError,
  NoApiKeyError,
  NoNetworkError,
  ProviderError,
  getErrorMessage,
  getErrorStatus,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { AnalysisProvider, GenerationResult } from './provider.interface';
import { requestWithTimeout } from './request';

const { maxAttempts, rateLimitDelayMs } = RETRY_POLICY.openaiCompatible;

/** Self-hosted servers usually ignore the key, but the SDK insists on one */
const LOCAL_PLACEHOLDER_KEY = 'not-needed';

const clients = new Map<string, OpenAI>();

function getClient(endpoint: string | undefined, apiKey: string): OpenAI {
  const cacheKey = `${endpoint ?? ''}|${apiKey}`;
  let client = clients.get(cacheKey);
  if (!client) {
    // Retries are handled here, not by the SDK
    client = new OpenAI({ apiKey, baseURL: endpoint, maxRetries: 0 });
    clients.set(cacheKey, client);
  }
  return client;
}

export function interpretCompletion(completion: ChatCompletion): GenerationResult {
  const choice = completion.choices[0];
  if (!choice) {
    throw new ProviderError(200, 'Reply contained no choices');
  }

  if (choice.finish_reason === 'content_filter') {
    return { status: 'blocked', reason: 'content_filter' };
  }
  if (choice.message.refusal) {
    return { status: 'blocked', reason: `refusal: ${choice.message.refusal}` };
  }

  const text = choice.message.content;
  if (!text?.trim()) {
    return { status: 'blocked', reason: 'empty response content' };
  }

  return { status: 'ok', text };
}

function createOpenAICompatibleProvider(
  name: 'chatgpt' | 'local',
  requiresApiKey: boolean,
): AnalysisProvider {
  return {
    name,
    requiresApiKey,

    async generate(prompt: string, config: ProviderConfig): Promise<GenerationResult> {
      if (requiresApiKey && !config.apiKey) throw new NoApiKeyError(name);
      const client = getClient(config.endpoint, config.apiKey ?? LOCAL_PLACEHOLDER_KEY);

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
          const completion = await requestWithTimeout(config.timeoutMs, (signal) =>
            client.chat.completions.create(
              {
                model: config.model,
                messages: [
                  { role: 'system', content: SYSTEM_INSTRUCTION },
                  { role: 'user', content: prompt },
                ],
                temperature: SAMPLING_TEMPERATURE,
                top_p: SAMPLING_TOP_P,
                max_tokens: OPENAI_MAX_TOKENS,
                response_format: { type: 'json_object' },
              },
              { signal },
            ),
          );

          return interpretCompletion(completion);
        } catch (error) {
          // Timeouts and our own classification pass through unchanged
          if (error instanceof AnalysisError) throw error;

          if (error instanceof APIConnectionError) {
            throw new NoNetworkError(
              `Could not reach ${config.endpoint ?? name}: ${getErrorMessage(error)}`,
            );
          }

          const status = getErrorStatus(error);
          if (status === 429 && attempt < maxAttempts) {
            logger.warn(
              { provider: name, attempt, delayMs: rateLimitDelayMs },
              'Rate limited, retrying',
            );
            await delay(rateLimitDelayMs);
            continue;
          }
          if (status !== undefined) {
            throw new ProviderError(status, getErrorMessage(error));
          }

          throw new ProviderError(0, getErrorMessage(error));
        }
      }

      throw new ProviderError(429, `Still rate limited after ${maxAttempts} attempts`);
    },
  };
}

export const chatgptProvider = createOpenAICompatibleProvider('chatgpt', true);
export const localProvider = createOpenAICompatibleProvider('local', false);
