export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type {
  AgentConfig,
  AgentHandle,
  CallOptions,
  GenerationInput,
  IModelProvider,
  QualityInput,
} from './IModelProvider.js';
export { BaseModelProvider } from './BaseModelProvider.js';
export type { BaseModelProviderOptions, CompletionRequest } from './BaseModelProvider.js';
export { OpenAICompatibleProvider } from './OpenAICompatibleProvider.js';
export { AnthropicProvider } from './AnthropicProvider.js';
export { ProviderRegistry, createProviderRegistry, isModelProvider } from './ProviderRegistry.js';
export { ProviderCallError, withRetry } from './retry.js';
