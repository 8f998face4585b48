/**
 * Settings Loader
 *
 * Loads configuration from research_settings.yaml, searching from the
 * current directory up to the root, then applies environment variable
 * overrides and validates the result. A missing settings file is not an
 * error: defaults plus environment are a complete configuration.
 *
 * Dependencies:
 * - yaml: YAML parser for reading configuration files
 */
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../errors.js';
import { AppSettingsSchema, type AppSettings } from './schema.js';

export const DEFAULT_SETTINGS_FILENAME = 'research_settings.yaml';

export const OLLAMA_MODEL_PREFIX = 'ollama/';

type Env = Record<string, string | undefined>;

interface EnvOverride {
  variable: string;
  section: keyof AppSettings;
  key: string;
  numeric?: boolean;
}

const ENV_OVERRIDES: EnvOverride[] = [
  { variable: 'AGENT_MODEL', section: 'agent', key: 'model' },
  { variable: 'AGENT_TEMPERATURE', section: 'agent', key: 'temperature', numeric: true },
  { variable: 'AGENT_MAX_ITERATIONS', section: 'agent', key: 'max_iterations', numeric: true },
  { variable: 'SEARCH_PROVIDER', section: 'search', key: 'provider' },
  { variable: 'TAVILY_API_KEY', section: 'search', key: 'tavily_api_key' },
  { variable: 'BRAVE_SEARCH_API_KEY', section: 'search', key: 'brave_search_api_key' },
  { variable: 'MAX_SEARCH_RESULTS', section: 'search', key: 'max_results', numeric: true },
  { variable: 'REQUEST_TIMEOUT', section: 'fetch', key: 'timeout_seconds', numeric: true },
  { variable: 'OLLAMA_HOST', section: 'ollama', key: 'host' },
];

export interface LoadSettingsOptions {
  /** Explicit settings file; skips the directory search and must exist. */
  path?: string;
  env?: Env;
  cwd?: string;
}

export function findSettingsFile(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = resolve(dir, DEFAULT_SETTINGS_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export function loadSettings(options: LoadSettingsOptions = {}): AppSettings {
  const env = options.env ?? process.env;
  const configPath = options.path ?? findSettingsFile(options.cwd);

  if (options.path && !existsSync(options.path)) {
    throw new ConfigError(`Configuration file not found: ${options.path}`);
  }

  const raw = configPath ? readSettingsFile(configPath) : {};
  applyEnvOverrides(raw, env);

  const result = AppSettingsSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${configPath ?? 'environment'}:\n${errors}`);
  }

  return result.data;
}

/**
 * Checks the credentials a research run needs: the selected search
 * provider's key, and a Gemini key unless the model is served by Ollama.
 */
export function validateRequiredKeys(settings: AppSettings, env: Env = process.env): void {
  const { search, agent } = settings;

  if (search.provider === 'tavily' && !search.tavily_api_key) {
    throw new ConfigError('TAVILY_API_KEY environment variable is required');
  }
  if (search.provider === 'brave' && !search.brave_search_api_key) {
    throw new ConfigError('BRAVE_SEARCH_API_KEY environment variable is required');
  }

  if (!isOllamaModel(agent.model) && !env['GOOGLE_GENAI_API_KEY'] && !env['GEMINI_API_KEY']) {
    throw new ConfigError(
      `GOOGLE_GENAI_API_KEY or GEMINI_API_KEY environment variable is required for model ${agent.model}`
    );
  }
}

export function isOllamaModel(model: string): boolean {
  return model.startsWith(OLLAMA_MODEL_PREFIX);
}

function readSettingsFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read ${configPath}: ${message}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid configuration in ${configPath}: expected a mapping`);
  }
  return parsed;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): void {
  for (const { variable, section, key, numeric } of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === '') continue;

    const current = raw[section];
    const target = isRecord(current) ? current : {};
    target[key] = numeric ? Number(value) : value;
    raw[section] = target;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
