export * from './provider.interface.js';
export * from './provider.factory.js';
export { OpenAIProvider } from './openai.provider.js';
export { OpenRouterProvider } from './openrouter.provider.js';
