/**
 * Webpage Fetcher Tool
 *
 * Fetches a page and extracts its title, main text, author and published
 * date. Navigation, scripts and other page chrome are dropped; the text is
 * truncated to stay within LLM context limits. A successfully read page is
 * recorded in the run's citation manager.
 *
 * Dependencies:
 * - cheerio: HTML parsing and selection
 */
import { load, type CheerioAPI } from 'cheerio';
import type { WebpageContent } from '../models/research.js';
import { toolLogger } from '../utils/logger.js';
import type { ResearchToolContext } from './context.js';

const SNIPPET_LENGTH = 200;

const REMOVED_ELEMENTS = 'script, style, noscript, nav, header, footer, aside';

const BLOCK_ELEMENTS = [
  'address', 'article', 'blockquote', 'dd', 'div', 'dl', 'dt', 'figcaption', 'figure',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'li', 'main', 'ol', 'p', 'pre', 'section',
  'table', 'td', 'th', 'tr', 'ul',
].join(', ');

const PUBLISHED_DATE_META = [
  'meta[property="article:published_time"]',
  'meta[name="publishdate"]',
  'meta[name="date"]',
  'meta[itemprop="datePublished"]',
];

export type FetchWebpageArgs = {
  url: string;
};

export type FetchWebpageResponse =
  | {
      success: true;
      url: string;
      title: string;
      content: string;
      author: string | null;
      published_date: string | null;
      extracted_at: string;
      citation: number;
    }
  | { success: false; error: string; url?: string };

export async function fetchWebpage(
  args: FetchWebpageArgs,
  context: ResearchToolContext
): Promise<FetchWebpageResponse> {
  const url = args.url?.trim() ?? '';
  if (!url) {
    return { success: false, error: 'URL cannot be empty' };
  }
  if (!isHttpUrl(url)) {
    return { success: false, error: 'Invalid URL', url };
  }

  const { fetch: fetchConfig } = context.settings;
  const fetchImpl = context.fetchImpl ?? fetch;

  try {
    toolLogger.info({ url }, 'Fetching webpage');

    const response = await fetchImpl(url, {
      headers: { 'User-Agent': fetchConfig.user_agent },
      redirect: 'follow',
      signal: AbortSignal.timeout(fetchConfig.timeout_seconds * 1000),
    });

    if (!response.ok) {
      toolLogger.error({ url, status: response.status }, 'HTTP error fetching webpage');
      return { success: false, error: `HTTP ${response.status}`, url };
    }

    const page = extractWebpage(await response.text(), url, {
      maxContentLength: fetchConfig.max_content_length,
    });

    const citation = context.citations.add({
      url,
      title: page.title,
      snippet: page.content.slice(0, SNIPPET_LENGTH) || undefined,
      author: page.author,
      publishedDate: page.publishedDate,
    });
    context.onPageFetched?.(page, citation);

    toolLogger.info({ url, citation, length: page.content.length }, 'Extracted webpage content');

    return {
      success: true,
      url,
      title: page.title,
      content: page.content,
      author: page.author ?? null,
      published_date: page.publishedDate ?? null,
      extracted_at: page.extractedAt.toISOString(),
      citation,
    };
  } catch (error) {
    if (isTimeout(error)) {
      toolLogger.error({ url }, 'Timeout fetching webpage');
      return { success: false, error: 'Request timeout', url };
    }
    const message = error instanceof Error ? error.message : String(error);
    toolLogger.error({ url, error: message }, 'Error fetching webpage');
    return { success: false, error: message, url };
  }
}

export interface ExtractOptions {
  maxContentLength?: number;
  now?: () => Date;
}

export function extractWebpage(html: string, url: string, options: ExtractOptions = {}): WebpageContent {
  const $ = load(html);
  const { maxContentLength = 5000, now = () => new Date() } = options;

  // Title and metadata first; header removal below can take the <h1> with it.
  const title = extractTitle($);
  const author = extractAuthor($);
  const publishedDate = extractPublishedDate($);

  return {
    url,
    title,
    content: truncate(extractContent($), maxContentLength),
    author,
    publishedDate,
    extractedAt: now(),
  };
}

function extractTitle($: CheerioAPI): string {
  const title = $('title').first().text().trim();
  if (title) return title;

  const heading = collapseWhitespace($('h1').first().text());
  return heading || 'Untitled';
}

function extractAuthor($: CheerioAPI): string | undefined {
  const meta = $('meta[name="author"]').attr('content')?.trim();
  if (meta) return meta;

  const itemprop = collapseWhitespace($('[itemprop="author"]').first().text());
  return itemprop || undefined;
}

function extractPublishedDate($: CheerioAPI): string | undefined {
  for (const selector of PUBLISHED_DATE_META) {
    const content = $(selector).attr('content')?.trim();
    if (content) return content;
  }

  const datetime = $('time[datetime]').first().attr('datetime')?.trim();
  return datetime || undefined;
}

function extractContent($: CheerioAPI): string {
  $(REMOVED_ELEMENTS).remove();

  const main = [
    $('main').first(),
    $('article').first(),
    $('div')
      .filter((_, el) => ($(el).attr('class') ?? '').toLowerCase().includes('content'))
      .first(),
    $('body').first(),
  ].find((candidate) => candidate.length > 0);

  if (!main) {
    return '';
  }

  // Block boundaries become line breaks so paragraphs don't run together.
  main.find('br').replaceWith('\n');
  main.find(BLOCK_ELEMENTS).prepend('\n').append('\n');

  return main
    .text()
    .split('\n')
    .map(collapseWhitespace)
    .filter((line) => line.length > 0)
    .join('\n');
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
