import type { ProviderKind } from '../../config/providers';
import { geminiProvider } from './gemini.provider';
import { chatgptProvider, localProvider } from './openaiCompatible.provider';
import type { AnalysisProvider } from './provider.interface';

export function getAnalysisProvider(kind: ProviderKind): AnalysisProvider {
  switch (kind) {
    case 'gemini':
      return geminiProvider;
    case 'chatgpt':
      return chatgptProvider;
    case 'local':
      return localProvider;
  }
}
