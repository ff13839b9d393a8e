export type { ICompletionProvider } from './ICompletionProvider.js';
export { OpenAICompletionProvider, type OpenAICompletionProviderOptions } from './OpenAICompletionProvider.js';
export { RetryingCompletionProvider, type Sleep } from './RetryingCompletionProvider.js';
export type { IProfileProvider, ExternalProfile } from './IProfileProvider.js';
export { SimulatedProfileProvider } from './SimulatedProfileProvider.js';
export type { ILogProvider, LogEvent, LogFields, LogLevel } from './ILogProvider.js';
export { LOG_LEVELS, LOG_LEVEL_RANK, isLogLevel } from './ILogProvider.js';
export {
  ConsoleLogProvider,
  formatLogLine,
  type ConsoleLogProviderOptions,
} from './ConsoleLogProvider.js';
