/**
 * Cloud provider backed by the Gemini API.
 * Retries transport failures, timeouts and 503/504 with a fixed pause.
 */

import {
  FinishReason,
  type GenerateContentResponse,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
} from '@google/genai';
import {
  GEMINI_TOP_K,
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
  ProviderError,
  ProviderTimeoutError,
  getErrorMessage,
  getErrorStatus,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { AnalysisProvider, GenerationResult } from './provider.interface';
import { requestWithTimeout } from './request';

const { maxAttempts, delayMs } = RETRY_POLICY.gemini;
const RETRYABLE_STATUSES: ReadonlySet<number> = new Set(RETRY_POLICY.gemini.retryableStatuses);

const BLOCKED_FINISH_REASONS: ReadonlySet<string> = new Set([
  FinishReason.SAFETY,
  FinishReason.PROHIBITED_CONTENT,
  FinishReason.BLOCKLIST,
  FinishReason.SPII,
]);

const SAFETY_SETTINGS = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

// One client per API key
const clients = new Map<string, GoogleGenAI>();

function getClient(apiKey: string): GoogleGenAI {
  let client = clients.get(apiKey);
  if (!client) {
    client = new GoogleGenAI({ apiKey });
    clients.set(apiKey, client);
  }
  return client;
}

/**
 * Classify a 2xx reply: usable text, a safety block, or no candidates at all.
 */
export function interpretGeminiResponse(response: GenerateContentResponse): GenerationResult {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason) {
    return { status: 'blocked', reason: `prompt blocked: ${blockReason}` };
  }

  const candidate = response.candidates?.[0];
  if (!candidate) {
    throw new ProviderError(200, 'Reply contained no candidates');
  }

  if (candidate.finishReason && BLOCKED_FINISH_REASONS.has(candidate.finishReason)) {
    return { status: 'blocked', reason: `response blocked: ${candidate.finishReason}` };
  }

  const text = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');
  if (!text.trim()) {
    return { status: 'blocked', reason: 'empty response text' };
  }

  return { status: 'ok', text };
}

function isRetryable(error: unknown): boolean {
  if (error instanceof ProviderTimeoutError) return true;
  if (error instanceof AnalysisError) return false;
  const status = getErrorStatus(error);
  return status === undefined || RETRYABLE_STATUSES.has(status);
}

export const geminiProvider: AnalysisProvider = {
  name: 'gemini',
  requiresApiKey: true,

  async generate(prompt: string, config: ProviderConfig): Promise<GenerationResult> {
    if (!config.apiKey) throw new NoApiKeyError('gemini');
    const client = getClient(config.apiKey);

    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await requestWithTimeout(config.timeoutMs, (abortSignal) =>
          client.models.generateContent({
            model: config.model,
            contents: prompt,
            config: {
              systemInstruction: SYSTEM_INSTRUCTION,
              temperature: SAMPLING_TEMPERATURE,
              topP: SAMPLING_TOP_P,
              topK: GEMINI_TOP_K,
              responseMimeType: 'application/json',
              safetySettings: SAFETY_SETTINGS,
              abortSignal,
            },
          }),
        );

        return interpretGeminiResponse(response);
      } catch (error) {
        if (!isRetryable(error)) {
          if (error instanceof AnalysisError) throw error;
          const status = getErrorStatus(error);
          throw new ProviderError(status ?? 0, getErrorMessage(error));
        }

        lastError = error;
        logger.warn(
          {
            attempt,
            maxAttempts,
            status: getErrorStatus(error),
            error: getErrorMessage(error),
          },
          'Gemini attempt failed',
        );

        if (attempt < maxAttempts) {
          await delay(delayMs);
        }
      }
    }

    throw new ProviderTimeoutError(
      `Gemini request failed after ${maxAttempts} attempts: ${getErrorMessage(lastError)}`,
    );
  },
};
