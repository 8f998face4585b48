/**
 * Report Rendering
 *
 * Turns a research result into terminal output and into the markdown file
 * written by `research --output`.
 *
 * Dependencies:
 * - marked: Markdown parser
 * - marked-terminal: Terminal-friendly renderer for markdown output
 */
import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import type { ResearchResult } from '../models/research.js';

const terminalMarked = new Marked(markedTerminal({ reflowText: true, width: 80 }));

export function renderMarkdown(content: string): string {
  try {
    const rendered = terminalMarked.parse(content);
    // parse can return string or Promise<string>, we only use sync
    if (typeof rendered === 'string') {
      return rendered.trim();
    }
    return content;
  } catch {
    return content;
  }
}

export function formatReport(result: ResearchResult): string {
  return [
    '# Research Results',
    '',
    `**Query:** ${result.query}`,
    '',
    `**Depth:** ${result.depth}`,
    '',
    `**Timestamp:** ${result.timestamp.toISOString()}`,
    '',
    '---',
    '',
    result.summary,
    '',
  ].join('\n');
}
