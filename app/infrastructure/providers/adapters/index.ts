export { OpenAICompatibleAdapter } from './openai-compatible.adapter';
export { AnthropicAdapter } from './anthropic.adapter';
