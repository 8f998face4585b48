export * from './schema.js';
export {
  DEFAULT_SETTINGS_FILENAME,
  OLLAMA_MODEL_PREFIX,
  findSettingsFile,
  isOllamaModel,
  loadSettings,
  validateRequiredKeys,
  type LoadSettingsOptions,
} from './settings.js';
