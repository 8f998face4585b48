import { describe, it, expect } from 'vitest';
import type { ResearchResult } from '../../src/models/research.js';
import { formatReport, renderMarkdown } from '../../src/report/markdown.js';

const result: ResearchResult = {
  query: 'ocean tides',
  depth: 'quick',
  findings: 'Tides follow the moon [1].',
  bibliography: ['[1] Tides 101 - https://a.example (Accessed: 2024-03-05)'],
  summary:
    'Tides follow the moon [1].\n\n## Sources\n\n[1] Tides 101 - https://a.example (Accessed: 2024-03-05)',
  citations: [],
  sourcesConsulted: [],
  iterations: 1,
  completed: true,
  timestamp: new Date('2024-03-05T10:00:00Z'),
};

describe('formatReport', () => {
  it('writes the header block followed by the summary', () => {
    expect(formatReport(result).split('\n')).toEqual([
      '# Research Results',
      '',
      '**Query:** ocean tides',
      '',
      '**Depth:** quick',
      '',
      '**Timestamp:** 2024-03-05T10:00:00.000Z',
      '',
      '---',
      '',
      'Tides follow the moon [1].',
      '',
      '## Sources',
      '',
      '[1] Tides 101 - https://a.example (Accessed: 2024-03-05)',
      '',
    ]);
  });
});

describe('renderMarkdown', () => {
  it('renders emphasis without the markdown markers', () => {
    const rendered = renderMarkdown('Tides are **predictable**.');

    expect(rendered).toContain('predictable');
    expect(rendered).not.toContain('**');
  });

  it('keeps plain text', () => {
    expect(renderMarkdown('Tides follow the moon.')).toContain('Tides follow the moon.');
  });
});
