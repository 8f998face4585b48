#!/usr/bin/env node
import 'dotenv/config';
import { InvalidArgumentError, Option, program } from 'commander';
import { LogLevel, setLogLevel } from '@google/adk';
import { ResearchAssistant } from './agents/index.js';
import { finishResearchCommand } from './commands/research.js';
import { loadSettings, validateRequiredKeys, type AppSettings } from './config/index.js';
import { ConfigError } from './errors.js';
import { RESEARCH_DEPTHS, ResearchQuerySchema } from './models/research.js';
import { runInteractiveSession, runResearchCommand } from './ui/index.js';
import { cliLogger, setupErrorHandlers } from './utils/logger.js';
import { VERSION } from './version.js';

// Keep ADK's console output out of the terminal UI
setLogLevel(LogLevel.ERROR);
setupErrorHandlers(cliLogger);

function parseMaxSources(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 20) {
    throw new InvalidArgumentError('Must be an integer between 1 and 20.');
  }
  return parsed;
}

function prepareSettings(configPath: string | undefined): AppSettings {
  const settings = loadSettings({ path: configPath });
  validateRequiredKeys(settings);
  return settings;
}

function reportError(error: unknown): void {
  const err = error instanceof Error ? error : new Error(String(error));
  if (err instanceof ConfigError) {
    console.error(`Configuration Error: ${err.message}`);
    console.error('Set the required keys in your environment or in a .env file (see .env.example).');
  } else {
    console.error(`Error: ${err.message}`);
  }
  cliLogger.error({ error: err.message, stack: err.stack }, 'Command failed');
  process.exitCode = 1;
}

interface ResearchCommandOptions {
  depth: string;
  maxSources: number;
  output?: string;
  config?: string;
}

program
  .name('research-assistant')
  .description('AI research assistant that searches the web and cites its sources')
  .version(VERSION);

program
  .command('research')
  .description('Research a topic and print a cited summary')
  .argument('<query...>', 'Research query')
  .addOption(
    new Option('-d, --depth <depth>', 'Research depth').choices([...RESEARCH_DEPTHS]).default('standard')
  )
  .option('-m, --max-sources <number>', 'Maximum number of sources (1-20)', parseMaxSources, 5)
  .option('-o, --output <file>', 'Save the report as markdown')
  .option('-c, --config <path>', 'Path to research_settings.yaml')
  .action(async (words: string[], options: ResearchCommandOptions) => {
    try {
      const settings = prepareSettings(options.config);
      const parsed = ResearchQuerySchema.safeParse({
        query: words.join(' '),
        depth: options.depth,
        maxSources: options.maxSources,
      });
      if (!parsed.success) {
        reportError(new Error(parsed.error.issues.map((issue) => issue.message).join('; ')));
        return;
      }
      const query = parsed.data;
      cliLogger.info({ query: query.query, depth: query.depth }, 'Research command');

      const outcome = await runResearchCommand(new ResearchAssistant(settings), query);
      await finishResearchCommand(outcome, options.output);
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('interactive')
  .description('Start an interactive research session')
  .option('-c, --config <path>', 'Path to research_settings.yaml')
  .action(async (options: { config?: string }) => {
    try {
      const settings = prepareSettings(options.config);
      await runInteractiveSession(new ResearchAssistant(settings));
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('version')
  .description('Show version information')
  .action(() => {
    console.log(`Research Assistant v${VERSION}`);
  });

await program.parseAsync();
