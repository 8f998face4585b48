/**
 * UI Entry Points
 *
 * Renders the Ink apps for the `research` and `interactive` commands and
 * resolves once they exit.
 *
 * Dependencies:
 * - ink: React for CLIs - builds terminal UIs with React components
 */
import { render } from 'ink';
import type { ResearchQuery } from '../models/research.js';
import { uiLogger } from '../utils/logger.js';
import { InteractiveApp } from './app.js';
import type { Researcher, ResearchOutcome } from './components/index.js';
import { ResearchCommandApp } from './research-app.js';

/**
 * Runs one research query with live progress and returns its outcome.
 */
export async function runResearchCommand(researcher: Researcher, query: ResearchQuery): Promise<ResearchOutcome> {
  let outcome: ResearchOutcome = { ok: false, error: new Error('Research was interrupted') };

  const instance = render(
    <ResearchCommandApp
      researcher={researcher}
      query={query}
      onOutcome={(value) => {
        outcome = value;
      }}
    />
  );
  await instance.waitUntilExit();
  uiLogger.info({ ok: outcome.ok }, 'Research command finished');
  return outcome;
}

export async function runInteractiveSession(researcher: Researcher): Promise<void> {
  uiLogger.info('Starting interactive session');
  const instance = render(<InteractiveApp researcher={researcher} />);
  await instance.waitUntilExit();
}

export { InteractiveApp } from './app.js';
export { ResearchCommandApp } from './research-app.js';
export { sessionReducer, initialSessionState, describeToolCall, QUIT_COMMANDS } from './session.js';
export type { SessionState, SessionAction, CompletedResearch } from './session.js';
