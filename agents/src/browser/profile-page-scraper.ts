/**
 * Profile page scraper - fetches a public profile page (LinkedIn or any personal
 * site) and reduces it to readable text for the navigator prompts.
 *
 * Never throws: failures come back as a string starting with "Error scraping",
 * which callers detect with isScrapeError().
 */

import { parse, type HTMLElement } from 'node-html-parser';

export const SCRAPE_ERROR_PREFIX = 'Error scraping';

const DEFAULT_MAX_CHARS = 8000;
const DEFAULT_TIMEOUT_MS = 15000;

// Chrome; the profile sites reject obvious bot agents outright
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const NOISE_SELECTOR = [
  'script',
  'noscript',
  'style',
  'svg',
  'iframe',
  'template',
  'nav',
  'footer',
  'form',
  'button',
  'img',
].join(', ');

export interface ScrapeOptions {
  timeout?: number;
  maxChars?: number;
}

export interface PageText {
  title: string | null;
  description: string | null;
  text: string;
}

/** Accepts "linkedin.com/in/x" as well as full URLs. Only http(s) is allowed. */
export function normalizeProfileUrl(raw: string): URL | null {
  const s = raw.trim();
  if (!s) return null;
  try {
    const url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(s) ? s : `https://${s}`);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
  } catch {
    return null;
  }
}

function metaContent(root: HTMLElement, selector: string): string | null {
  const value = root.querySelector(selector)?.getAttribute('content')?.trim();
  return value ? value : null;
}

function normalizeLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .filter((line, i, all) => line !== all[i - 1])
    .join('\n');
}

/**
 * Reduce an HTML document to its title, description and visible text.
 */
export function extractPageText(html: string): PageText {
  const root = parse(html, {
    comment: false,
    blockTextElements: {
      script: false,
      noscript: false,
      style: false,
    },
  });

  const title =
    metaContent(root, 'meta[property="og:title"]') ??
    root.querySelector('title')?.text.trim() ??
    null;
  const description =
    metaContent(root, 'meta[property="og:description"]') ??
    metaContent(root, 'meta[name="description"]');

  for (const el of root.querySelectorAll(NOISE_SELECTOR)) {
    el.remove();
  }

  const container = root.querySelector('main') ?? root.querySelector('body') ?? root;
  return {
    title: title || null,
    description,
    text: normalizeLines(container.structuredText),
  };
}

export function isScrapeError(text: string): boolean {
  return text.startsWith(SCRAPE_ERROR_PREFIX);
}

/**
 * Fetch a page and return its readable text (title, description, body), capped at maxChars.
 */
export async function scrapeWebContent(url: string, options: ScrapeOptions = {}): Promise<string> {
  const target = normalizeProfileUrl(url);
  if (!target) {
    return `${SCRAPE_ERROR_PREFIX} ${url}: invalid URL`;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout ?? DEFAULT_TIMEOUT_MS);

  try {
    const response = await fetch(target.toString(), {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      return `${SCRAPE_ERROR_PREFIX} ${url}: HTTP ${response.status}`;
    }

    const page = extractPageText(await response.text());
    const parts = [page.title, page.description, page.text].filter(
      (part, i, all): part is string => !!part && all.indexOf(part) === i,
    );
    const text = parts.join('\n');
    if (!text) {
      return `${SCRAPE_ERROR_PREFIX} ${url}: page has no readable text`;
    }
    return text.slice(0, options.maxChars ?? DEFAULT_MAX_CHARS);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return `${SCRAPE_ERROR_PREFIX} ${url}: ${message}`;
  } finally {
    clearTimeout(timeoutId);
  }
}
