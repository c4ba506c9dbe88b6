import { BaseChatModel } from '@langchain/core/language_models/chat_models';

export interface ProviderConfig {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * A language-model vendor that can hand out a LangChain chat model
 */
export interface ILLMProvider {
  readonly name: string;
  isConfigured(): boolean;
  getDefaultModel(): string;
  getChatModel(config?: ProviderConfig): BaseChatModel;
}
