/**
 * Library entry point.
 */
export * from './citations/index.js';
export * from './config/index.js';
export * from './agents/index.js';
export * from './tools/index.js';
export * from './errors.js';
export * from './models/research.js';
export { OllamaLlm } from './llm/ollama-llm.js';
export { formatReport, renderMarkdown } from './report/markdown.js';
export { VERSION } from './version.js';
