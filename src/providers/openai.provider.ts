import { ChatOpenAI } from '@langchain/openai';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ILLMProvider, ProviderConfig } from './provider.interface.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../constants.js';

/**
 * OpenAI provider implementation
 */
export class OpenAIProvider implements ILLMProvider {
  public readonly name = 'openai';
  private readonly apiKey: string;

  constructor(apiKey?: string) {
    this.apiKey = apiKey || process.env.OPENAI_API_KEY || '';
  }

  public isConfigured(): boolean {
    return !!this.apiKey;
  }

  public getDefaultModel(): string {
    return 'gpt-4o-mini';
  }

  public getChatModel(config: ProviderConfig = {}): BaseChatModel {
    if (!this.isConfigured()) {
      throw new Error('OpenAI API key is not configured. Set OPENAI_API_KEY environment variable.');
    }

    return new ChatOpenAI({
      apiKey: this.apiKey,
      model: config.model || this.getDefaultModel(),
      temperature: config.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
      maxRetries: 0,
    });
  }
}
