/**
 * Language-model completion client
 */

import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import { ProviderFactory, type ChatModelOptions, type SupportedProvider } from '../providers/index.js';

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  model?: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Rejects with the SDK's own error so callers can tell connection,
 * rate-limit and API failures apart.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export type ChatModelCreator = (options: ChatModelOptions) => BaseChatModel;

export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export class LangChainCompletionClient implements CompletionClient {
  constructor(
    private readonly provider: SupportedProvider,
    private readonly apiKey: string,
    private readonly createModel: ChatModelCreator = (options) => ProviderFactory.createChatModel(options),
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const model = this.createModel({
      provider: this.provider,
      apiKey: this.apiKey,
      model: request.model,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    });

    const response = await model.invoke([
      new SystemMessage(request.systemPrompt),
      new HumanMessage(request.userPrompt),
    ]);

    return contentToText(response.content);
  }
}
