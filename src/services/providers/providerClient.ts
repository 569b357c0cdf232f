/**
 * Uniform entry point over every analysis backend.
 * Prechecks credentials and connectivity, absorbs safety blocks,
 * and hands back normalized extractions.
 */

import type { ProviderConfig, ProviderKind } from '../../config/providers';
import type { Extraction } from '../../types/analysis';
import { NoApiKeyError, NoNetworkError, getErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { emptyExtraction, normalizeExtraction } from '../entityMerger';
import { hasInternetConnection, isLocalEndpoint } from './connectivity';
import { getAnalysisProvider } from './factory';
import type { AnalysisProvider, GenerationResult } from './provider.interface';
import { parseResponse } from './responseParser';

export interface ProviderClientOptions {
  resolveProvider?: (kind: ProviderKind) => AnalysisProvider;
  checkConnectivity?: () => Promise<boolean>;
}

export interface VerifyResult {
  ok: boolean;
  message: string;
}

const VERIFY_PROMPT = 'Reply with exactly this JSON object: {"status": "ok"}';

export class ProviderClient {
  private readonly resolveProvider: (kind: ProviderKind) => AnalysisProvider;
  private readonly checkConnectivity: () => Promise<boolean>;

  constructor(options: ProviderClientOptions = {}) {
    this.resolveProvider = options.resolveProvider ?? getAnalysisProvider;
    this.checkConnectivity = options.checkConnectivity ?? (() => hasInternetConnection());
  }

  /**
   * Send one prompt and return what it extracted.
   * A safety-blocked prompt yields an empty extraction, not an error.
   */
  async analyze(prompt: string, config: ProviderConfig): Promise<Extraction> {
    const result = await this.generate(prompt, config);

    if (result.status === 'blocked') {
      logger.warn(
        { provider: config.kind, reason: result.reason },
        'Provider safety filter blocked the request, continuing with empty result',
      );
      return emptyExtraction();
    }

    return normalizeExtraction(parseResponse(result.text));
  }

  /** Check that a configuration can reach its provider. Never throws. */
  async verify(config: ProviderConfig): Promise<VerifyResult> {
    try {
      const result = await this.generate(VERIFY_PROMPT, config);
      if (result.status === 'blocked') {
        return { ok: true, message: `${config.kind} (${config.model}) reachable, reply filtered: ${result.reason}` };
      }
      parseResponse(result.text);
      return { ok: true, message: `${config.kind} (${config.model}) is working` };
    } catch (error) {
      logger.warn({ provider: config.kind, error: getErrorMessage(error) }, 'Provider verification failed');
      return { ok: false, message: getErrorMessage(error) };
    }
  }

  private async generate(prompt: string, config: ProviderConfig): Promise<GenerationResult> {
    const provider = this.resolveProvider(config.kind);

    if (provider.requiresApiKey && !config.apiKey) {
      throw new NoApiKeyError(config.kind);
    }

    if (!isLocalEndpoint(config.endpoint) && !(await this.checkConnectivity())) {
      throw new NoNetworkError();
    }

    logger.debug(
      { provider: config.kind, model: config.model, promptLength: prompt.length },
      'Sending analysis request',
    );
    return provider.generate(prompt, config);
  }
}
