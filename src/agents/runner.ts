/**
 * Research Runner (ADK)
 *
 * Orchestrates one research run: builds a fresh citation manager and the
 * tools around it, runs the research agent through ADK's InMemoryRunner,
 * and assembles the agent's findings with the rendered bibliography.
 *
 * Features:
 * - Per-run citation manager; nothing carries over between runs
 * - Iteration cap on tool-calling turns
 * - Ollama models ('ollama/...') through OllamaLlm, Gemini models by name
 *
 * Dependencies:
 * - @google/adk: InMemoryRunner for session-based agent execution
 * - @google/genai: Content type for message formatting
 */
import { randomUUID } from 'node:crypto';
import { InMemoryRunner, isFinalResponse } from '@google/adk';
import type { BaseLlm } from '@google/adk';
import type { Content } from '@google/genai';
import { CitationManager } from '../citations/index.js';
import { isOllamaModel, type AppSettings } from '../config/index.js';
import { ResearchAssistantError } from '../errors.js';
import { OllamaLlm } from '../llm/ollama-llm.js';
import {
  ResearchQuerySchema,
  type ResearchQueryInput,
  type ResearchResult,
} from '../models/research.js';
import {
  createResearchTools,
  createSearchProvider,
  type FetchLike,
  type SearchProvider,
} from '../tools/index.js';
import { agentLogger } from '../utils/logger.js';
import { buildResearchPrompt, createResearchAgent } from './research.js';

const APP_NAME = 'research_assistant';
const USER_ID = 'default_user';

export const INCOMPLETE_MESSAGE = 'Research incomplete due to iteration limit.';

export interface ResearchAssistantOptions {
  /** Overrides agent.model; a BaseLlm instance is used as-is. */
  model?: string | BaseLlm;
  searchProvider?: SearchProvider;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

export interface ResearchRunOptions {
  /** Called for every tool call the agent requests. */
  onToolCall?: (name: string, args: Record<string, unknown>) => void;
}

/**
 * Creates a Content object from text for use with the runner
 */
export function createUserContent(text: string): Content {
  return {
    role: 'user',
    parts: [{ text }],
  };
}

export class ResearchAssistant {
  constructor(
    private readonly settings: AppSettings,
    private readonly options: ResearchAssistantOptions = {}
  ) {}

  async research(input: ResearchQueryInput, runOptions: ResearchRunOptions = {}): Promise<ResearchResult> {
    const parsed = ResearchQuerySchema.safeParse(input);
    if (!parsed.success) {
      throw new ResearchAssistantError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const query = parsed.data;
    const now = this.options.now ?? (() => new Date());
    const maxIterations = this.settings.agent.max_iterations;

    agentLogger.info({ query: query.query, depth: query.depth, maxSources: query.maxSources }, 'Starting research');

    const citations = new CitationManager({ now });
    const sourcesConsulted: string[] = [];

    const tools = createResearchTools({
      citations,
      settings: this.settings,
      searchProvider: this.options.searchProvider ?? createSearchProvider(this.settings.search, this.options.fetchImpl),
      fetchImpl: this.options.fetchImpl,
      onPageFetched: (page) => {
        if (!sourcesConsulted.includes(page.url)) {
          sourcesConsulted.push(page.url);
        }
      },
    });

    const agent = createResearchAgent({
      model: this.resolveModel(),
      tools: Object.values(tools),
      instruction: this.settings.prompts.research_agent,
      temperature: this.settings.agent.temperature,
    });

    const runner = new InMemoryRunner({ agent, appName: APP_NAME });
    const sessionId = randomUUID();
    await runner.sessionService.createSession({ appName: APP_NAME, userId: USER_ID, sessionId });

    let iterations = 0;
    let limitReached = false;
    let lastText = '';
    let finalText: string | undefined;

    for await (const event of runner.runAsync({
      userId: USER_ID,
      sessionId,
      newMessage: createUserContent(buildResearchPrompt(query)),
    })) {
      if (event.author === 'user') continue;

      if (event.errorCode) {
        const message = event.errorMessage ?? event.errorCode;
        agentLogger.error({ errorCode: event.errorCode, error: message }, 'Model call failed');
        throw new ResearchAssistantError(`Model call failed: ${message}`);
      }

      const parts = event.content?.parts ?? [];
      const calls = parts.flatMap((part) => (part.functionCall ? [part.functionCall] : []));

      if (calls.length > 0) {
        if (iterations >= maxIterations) {
          limitReached = true;
          agentLogger.warn({ iterations }, 'Max iterations reached');
          break;
        }
        iterations++;
        agentLogger.info({ iteration: iterations, maxIterations }, 'Agent requested tools');
        for (const call of calls) {
          agentLogger.debug({ tool: call.name, args: call.args }, 'Tool call');
          runOptions.onToolCall?.(call.name ?? '', call.args ?? {});
        }
      }

      const text = parts
        .map((part) => part.text ?? '')
        .join('')
        .trim();
      if (text && !event.partial) {
        lastText = text;
      }

      // ADK may yield empty events that look final; keep going until one carries text
      if (isFinalResponse(event) && text) {
        finalText = text;
        break;
      }
    }

    const findings = limitReached ? lastText || INCOMPLETE_MESSAGE : finalText ?? lastText;
    const bibliography = citations.formatBibliography();
    const summary = [findings, citations.renderBibliography()].filter(Boolean).join('\n\n');

    agentLogger.info(
      { iterations, sources: citations.size, consulted: sourcesConsulted.length, completed: !limitReached },
      'Research complete'
    );

    return {
      query: query.query,
      depth: query.depth,
      findings,
      bibliography,
      summary,
      citations: citations.entries(),
      sourcesConsulted,
      iterations,
      completed: !limitReached,
      timestamp: now(),
    };
  }

  private resolveModel(): string | BaseLlm {
    const model = this.options.model ?? this.settings.agent.model;
    if (typeof model === 'string' && isOllamaModel(model)) {
      return new OllamaLlm({ model, host: this.settings.ollama.host });
    }
    return model;
  }
}
