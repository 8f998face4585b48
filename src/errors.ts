/**
 * Error Types
 *
 * Every error the assistant raises on purpose derives from
 * ResearchAssistantError so callers can tell them apart from runtime
 * and network failures.
 */

export class ResearchAssistantError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A source was offered to the citation manager without a usable URL. */
export class InvalidSourceError extends ResearchAssistantError {}

/** A citation index was requested that the manager never assigned. */
export class NotFoundError extends ResearchAssistantError {
  constructor(readonly index: number) {
    super(`No citation with index ${index}`);
  }
}

export class ConfigError extends ResearchAssistantError {}

export class SearchProviderError extends ResearchAssistantError {
  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number
  ) {
    super(`${provider}: ${message}`);
  }
}
