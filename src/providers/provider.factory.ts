import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ILLMProvider, ProviderConfig } from './provider.interface.js';
import { OpenAIProvider } from './openai.provider.js';
import { OpenRouterProvider } from './openrouter.provider.js';

export const SUPPORTED_PROVIDERS = ['openai', 'openrouter'] as const;

export type SupportedProvider = (typeof SUPPORTED_PROVIDERS)[number];

export interface ChatModelOptions extends ProviderConfig {
  provider: SupportedProvider;
  apiKey?: string;
}

export function isSupportedProvider(value: string): value is SupportedProvider {
  return SUPPORTED_PROVIDERS.some((provider) => provider === value);
}

/**
 * Creates providers and chat models by name
 */
export class ProviderFactory {
  static createProvider(provider: SupportedProvider, apiKey?: string): ILLMProvider {
    switch (provider) {
      case 'openai':
        return new OpenAIProvider(apiKey);
      case 'openrouter':
        return new OpenRouterProvider(apiKey);
    }
  }

  static createChatModel(options: ChatModelOptions): BaseChatModel {
    const { provider, apiKey, ...config } = options;
    return this.createProvider(provider, apiKey).getChatModel(config);
  }
}
