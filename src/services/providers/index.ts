export { hasInternetConnection, isLocalEndpoint } from './connectivity';
export { getAnalysisProvider } from './factory';
export { geminiProvider, interpretGeminiResponse } from './gemini.provider';
export {
  chatgptProvider,
  interpretCompletion,
  localProvider,
} from './openaiCompatible.provider';
export type { AnalysisProvider, GenerationResult } from './provider.interface';
export {
  ProviderClient,
  type ProviderClientOptions,
  type VerifyResult,
} from './providerClient';
export { parseResponse } from './responseParser';
