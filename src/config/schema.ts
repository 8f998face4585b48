/**
 * Configuration Schema
 *
 * Zod validation schemas for research_settings.yaml. Every section is
 * optional in the file; defaults fill in whatever is left out.
 *
 * Dependencies:
 * - zod: TypeScript-first schema validation with static type inference
 */
import { z } from 'zod';

export const SEARCH_PROVIDERS = ['tavily', 'brave'] as const;

export const AgentConfigSchema = z.object({
  model: z.string().min(1).default('gemini-2.5-flash'),
  temperature: z.number().min(0).max(2).default(0.3),
  max_iterations: z.number().int().positive().default(10),
});

export const SearchConfigSchema = z.object({
  provider: z.enum(SEARCH_PROVIDERS).default('tavily'),
  tavily_api_key: z.string().optional(),
  brave_search_api_key: z.string().optional(),
  max_results: z.number().int().min(1).max(10).default(5),
});

export const FetchConfigSchema = z.object({
  timeout_seconds: z.number().positive().default(30),
  user_agent: z.string().default('Mozilla/5.0 (compatible; ResearchAssistant/1.0)'),
  max_content_length: z.number().int().positive().default(5000),
});

export const OllamaConfigSchema = z.object({
  host: z.string().url().default('http://localhost:11434'),
});

export const PromptsConfigSchema = z.object({
  research_agent: z.string().optional(),
});

export const AppSettingsSchema = z.object({
  agent: AgentConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  fetch: FetchConfigSchema.default({}),
  ollama: OllamaConfigSchema.default({}),
  prompts: PromptsConfigSchema.default({}),
});

export type SearchProviderName = (typeof SEARCH_PROVIDERS)[number];
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type AppSettings = z.infer<typeof AppSettingsSchema>;
