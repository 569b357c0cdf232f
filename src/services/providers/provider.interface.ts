import type { ProviderConfig, ProviderKind } from '../../config/providers';

/** What a backend produced for one prompt */
export type GenerationResult =
  | { status: 'ok'; text: string }
  | { status: 'blocked'; reason: string };

export interface AnalysisProvider {
  readonly name: ProviderKind;
  /** Whether this backend refuses to run without an API key */
  readonly requiresApiKey: boolean;
  generate(prompt: string, config: ProviderConfig): Promise<GenerationResult>;
}
