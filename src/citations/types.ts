/**
 * Citation Types
 *
 * A Source is a piece of evidence a tool discovered while researching.
 * The citation manager keys sources by URL and numbers them in the order
 * they were first seen.
 */

export interface Source {
  url: string;
  title?: string;
  snippet?: string;
  author?: string;
  publishedDate?: string;
  accessedAt?: Date;
}

export interface CitationEntry {
  /** 1-based, assignment order */
  index: number;
  source: Source;
}

/** Fields a later add() for a known URL may fill in when still missing. */
export const MERGEABLE_FIELDS = ['title', 'snippet', 'author', 'publishedDate'] as const;

export type MergeableField = (typeof MERGEABLE_FIELDS)[number];
