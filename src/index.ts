export { THREE_STEP_TRANSLATION_PROMPT, DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE } from './prompts/prompts';
export { renderTemplate, listPlaceholders, MissingPlaceholderError } from './template';
export { checkPromptTemplate, REQUIRED_PLACEHOLDERS, WORKFLOW_STEPS } from './promptCheck';
export type { PromptIssue } from './promptCheck';
export { TextProcessor, loadRegexLibrary } from './processing/TextProcessor';
export type { TextProcessorOptions, ProcessingSnapshot, PreparedBatch } from './processing/TextProcessor';
export { buildSourceMessage, parseTranslationResponse, ResponseFormatError } from './translation/format';
export { AnthropicProvider, OpenAIProvider, createProvider, PROVIDER_NAMES } from './translation/providers';
export type { TranslationProvider, CompletionRequest, ProviderName } from './translation/providers';
export { Translator, loadPromptTemplate } from './translation/Translator';
export type { TranslatorOptions, TranslationRunSummary } from './translation/Translator';
export * from './state';
export { runCli, createRegistry } from './commands';
