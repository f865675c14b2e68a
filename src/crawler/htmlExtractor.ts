import { JSDOM } from 'jsdom';
import { ExtractionError, type Result, err, errorMessage, ok } from '../errors';
import type { CrawledPage } from './types';

const REMOVED_SELECTOR = 'script, style, nav, footer, header, noscript';
const INVISIBLE_TAGS = new Set(['SCRIPT', 'STYLE', 'NOSCRIPT', 'TEMPLATE']);
const BLOCK_SELECTOR =
  'div, section, li, td, pre, blockquote, h1, h2, h3, h4, h5, h6';

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

const PLACEHOLDER_PREFIX = '[No content extracted from ';

export function placeholderContent(url: string): string {
  return `${PLACEHOLDER_PREFIX}${url}]`;
}

export function isPlaceholderContent(content: string): boolean {
  return content.startsWith(PLACEHOLDER_PREFIX) && content.endsWith(']');
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of every visible text node under `root`, each piece trimmed and
 * joined with one space (block boundaries never glue words together)
 */
export function collectText(root: Node): string {
  const parts: string[] = [];
  const walk = (node: Node): void => {
    if (node.nodeType === TEXT_NODE) {
      const text = normalizeWhitespace(node.nodeValue ?? '');
      if (text) {
        parts.push(text);
      }
      return;
    }
    if (node.nodeType === ELEMENT_NODE && INVISIBLE_TAGS.has(node.nodeName)) {
      return;
    }
    node.childNodes.forEach(walk);
  };
  walk(root);
  return parts.join(' ');
}

function textOfAll(elements: Iterable<Element>): string {
  return normalizeWhitespace(
    [...elements].map(el => collectText(el)).join(' ')
  );
}

/**
 * Absolute http(s) URL without its fragment, or null when `href` is not one
 */
export function normalizeUrl(href: string, base?: string): string | null {
  let url: URL;
  try {
    url = new URL(href, base);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }
  url.hash = '';
  return url.toString();
}

export interface ExtractOptions {
  /** URL the HTML was served from, when it differs from `url` (redirects) */
  baseUrl?: string;
}

/**
 * Extracts readable content and metadata from a page.
 *
 * Content ladder, first non-empty wins:
 *   1. `main`, else `article`, else `body`, after dropping scripts, styles and
 *      navigation, header and footer elements
 *   2. all `p` elements
 *   3. outermost block-level containers
 *   4. every visible text node of the untouched page
 *   5. a placeholder naming the URL
 */
export function extractPage(
  html: string,
  url: string,
  options: ExtractOptions = {}
): Result<CrawledPage, ExtractionError> {
  let dom: JSDOM;
  try {
    dom = new JSDOM(html, { url: options.baseUrl ?? url });
  } catch (error) {
    return err(
      new ExtractionError(
        `Cannot parse HTML from ${url}: ${errorMessage(error)}`,
        url,
        'invalid-html',
        { cause: error }
      )
    );
  }

  try {
    const document = dom.window.document;

    const rawText = normalizeWhitespace(
      collectText(document.body ?? document.documentElement)
    );
    const title = normalizeWhitespace(document.title);
    const description =
      document
        .querySelector('meta[name="description"]')
        ?.getAttribute('content')
        ?.trim() ?? '';

    const links: string[] = [];
    const seen = new Set<string>();
    document.querySelectorAll('a[href]').forEach(anchor => {
      const href = anchor.getAttribute('href') ?? '';
      const link = normalizeUrl(href, document.baseURI);
      if (link && !seen.has(link)) {
        seen.add(link);
        links.push(link);
      }
    });

    document.querySelectorAll(REMOVED_SELECTOR).forEach(el => el.remove());

    const main =
      document.querySelector('main') ??
      document.querySelector('article') ??
      document.body;

    let content = main ? normalizeWhitespace(collectText(main)) : '';
    if (!content) {
      content = textOfAll(document.querySelectorAll('p'));
    }
    if (!content) {
      const outermost = [...document.querySelectorAll(BLOCK_SELECTOR)].filter(
        el => el.parentElement?.closest(BLOCK_SELECTOR) == null
      );
      content = textOfAll(outermost);
    }
    if (!content) {
      content = rawText;
    }
    if (!content) {
      content = placeholderContent(url);
    }

    return ok({ content, metadata: { url, title, description, links } });
  } finally {
    dom.window.close();
  }
}
