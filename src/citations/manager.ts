/**
 * Citation Manager
 *
 * Run-scoped registry of the sources a research run discovered. Each unique
 * URL gets one entry and a stable 1-based index; re-adding a URL returns the
 * index it already has. A manager is created per run and handed to the tools
 * that record into it, then read once to render the bibliography.
 *
 * add() is synchronous, so its lookup and insert can never interleave with
 * another tool call even when the runtime awaits several tools at once.
 */
import { InvalidSourceError, NotFoundError } from '../errors.js';
import { MERGEABLE_FIELDS, type CitationEntry, type Source } from './types.js';

export interface CitationManagerOptions {
  /** Clock used to stamp sources that arrive without accessedAt. */
  now?: () => Date;
}

export class CitationManager {
  private readonly sources: Source[] = [];
  private readonly urlToIndex = new Map<string, number>();
  private readonly now: () => Date;

  constructor(options: CitationManagerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sources.length;
  }

  /**
   * Records a source and returns its citation index.
   *
   * Known URLs keep their index; non-empty fields the stored source lacks are
   * filled in from the new one, fields it already has are left alone.
   */
  add(source: Source): number {
    const url = typeof source.url === 'string' ? source.url.trim() : '';
    if (!url) {
      throw new InvalidSourceError('Source URL must be a non-empty string');
    }

    const existing = this.urlToIndex.get(url);
    if (existing !== undefined) {
      this.mergeInto(existing, source);
      return existing;
    }

    this.sources.push({
      ...compact(source),
      url,
      accessedAt: new Date(source.accessedAt ?? this.now()),
    });
    const index = this.sources.length;
    this.urlToIndex.set(url, index);
    return index;
  }

  get(index: number): Source {
    return copySource(this.sourceAt(index));
  }

  indexOf(url: string): number | undefined {
    return this.urlToIndex.get(url.trim());
  }

  /** Inline marker for an assigned index, e.g. `[3]`. */
  marker(index: number): string {
    this.sourceAt(index);
    return `[${index}]`;
  }

  /** Inline marker for a recorded URL, or undefined if it was never added. */
  cite(url: string): string | undefined {
    const index = this.indexOf(url);
    return index === undefined ? undefined : `[${index}]`;
  }

  entries(): CitationEntry[] {
    return this.sources.map((source, i) => ({ index: i + 1, source: copySource(source) }));
  }

  formatBibliography(): string[] {
    return this.sources.map((source, i) => formatCitation(i + 1, source));
  }

  renderBibliography(): string {
    const lines = this.formatBibliography();
    if (lines.length === 0) {
      return '';
    }
    return ['## Sources', '', ...lines].join('\n');
  }

  private sourceAt(index: number): Source {
    const source = Number.isInteger(index) ? this.sources[index - 1] : undefined;
    if (!source) {
      throw new NotFoundError(index);
    }
    return source;
  }

  private mergeInto(index: number, incoming: Source): void {
    const stored = this.sourceAt(index);
    for (const field of MERGEABLE_FIELDS) {
      const value = incoming[field]?.trim();
      if (value && !stored[field]) {
        stored[field] = value;
      }
    }
  }
}

/**
 * `[n] Title by Author - URL (Accessed: YYYY-MM-DD)`; the title falls back
 * to the URL, author and accessed date appear only when known.
 */
export function formatCitation(index: number, source: Source): string {
  const parts = [`[${index}]`, source.title || source.url];

  if (source.author) {
    parts.push(`by ${source.author}`);
  }

  parts.push(`- ${source.url}`);

  if (source.accessedAt) {
    parts.push(`(Accessed: ${formatDate(source.accessedAt)})`);
  }

  return parts.join(' ');
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// Dates are mutable; stored sources never share one with a caller.
function copySource(source: Source): Source {
  const copy: Source = { ...source };
  if (source.accessedAt) {
    copy.accessedAt = new Date(source.accessedAt);
  }
  return copy;
}

function compact(source: Source): Source {
  const result: Source = { url: source.url };
  for (const field of MERGEABLE_FIELDS) {
    const value = source[field]?.trim();
    if (value) {
      result[field] = value;
    }
  }
  return result;
}
