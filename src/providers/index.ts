export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export { VoyageEmbeddingProvider } from './VoyageEmbeddingProvider.js';
export { CachingEmbeddingProvider } from './CachingEmbeddingProvider.js';
export type { ITextGenerationProvider, TextGenerationRequest } from './ITextGenerationProvider.js';
export { OpenAITextGenerationProvider } from './OpenAITextGenerationProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
