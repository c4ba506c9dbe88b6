import { ChatOpenAI } from '@langchain/openai';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ILLMProvider, ProviderConfig } from './provider.interface.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, OPENROUTER_BASE_URL } from '../constants.js';

/**
 * OpenRouter provider; speaks the OpenAI chat API at a different base URL
 */
export class OpenRouterProvider implements ILLMProvider {
  public readonly name = 'openrouter';
  private readonly apiKey: string;

  constructor(apiKey?: string) {
    this.apiKey = apiKey || process.env.OPENROUTER_API_KEY || '';
  }

  public isConfigured(): boolean {
    return !!this.apiKey;
  }

  /** Vendor-prefixed, as OpenRouter routes by `<vendor>/<model>` */
  public getDefaultModel(): string {
    return 'openai/gpt-4o-mini';
  }

  public getChatModel(config: ProviderConfig = {}): BaseChatModel {
    if (!this.isConfigured()) {
      throw new Error('OpenRouter API key is not configured. Set OPENROUTER_API_KEY environment variable.');
    }

    return new ChatOpenAI({
      apiKey: this.apiKey,
      model: config.model || this.getDefaultModel(),
      temperature: config.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
      maxRetries: 0,
      configuration: {
        baseURL: OPENROUTER_BASE_URL,
        defaultHeaders: { 'X-Title': 'PR Lint Reviewer' },
      },
    });
  }
}
