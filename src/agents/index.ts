/**
 * Agents Module (ADK)
 *
 * The research agent definition and the runner that executes one research
 * run per query.
 */
export {
  DEFAULT_INSTRUCTION,
  RESEARCH_AGENT_NAME,
  buildResearchPrompt,
  createResearchAgent,
  type ResearchAgentOptions,
} from './research.js';
export {
  INCOMPLETE_MESSAGE,
  ResearchAssistant,
  createUserContent,
  type ResearchAssistantOptions,
  type ResearchRunOptions,
} from './runner.js';
