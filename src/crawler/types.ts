import type { FetchError, Result } from '../errors';

export interface PageMetadata {
  url: string;
  title: string;
  description: string;
  links: string[]; // Absolute http(s) URLs in document order, fragments dropped
}

export interface CrawledPage {
  content: string;
  metadata: PageMetadata;
}

export interface FetchedPage {
  url: string; // As requested
  finalUrl: string; // After redirects
  status: number;
  html: string;
}

export interface FetchContext {
  // Hosts the crawl may reach; a rendered page loads subresources only from these
  allowedHosts?: ReadonlySet<string>;
}

/**
 * One way of turning a URL into HTML. Failures come back as values so the
 * crawler can skip the page and move on.
 */
export interface PageFetcher {
  readonly name: string;
  fetchPage(
    url: string,
    context?: FetchContext
  ): Promise<Result<FetchedPage, FetchError>>;
}
