import { setTimeout as delay } from 'timers/promises';
import type { ConfigManager } from '../ConfigManager';
import { type ExtractionError, FetchError } from '../errors';
import { WithLogging } from '../WithLogging';
import { extractPage, normalizeUrl } from './htmlExtractor';
import type { CrawledPage, PageFetcher } from './types';

export interface CrawlOptions {
  maxPages?: number;
  /** Hosts the crawl may fetch from; defaults to the start URL's host */
  allowedDomains?: string[];
  delayMs?: number;
}

export interface CrawlFailure {
  url: string;
  error: FetchError | ExtractionError;
}

export interface CrawlResult {
  pages: CrawledPage[];
  failures: CrawlFailure[];
}

export interface CrawlerOptions {
  fetcher: PageFetcher;
  configManager: ConfigManager;
  sleep?: (ms: number) => Promise<void>;
}

function hostOf(url: string): string {
  return new URL(url).host.toLowerCase();
}

/**
 * Breadth-first crawl from a start URL, bounded by a page budget and a set
 * of allowed hosts.
 *
 * A URL is fetched at most once per crawl. Links to other hosts are dropped
 * without being fetched or marked visited, and a page that fails to fetch or
 * parse is recorded in `failures` and skipped.
 */
export class Crawler extends WithLogging {
  protected readonly componentName = 'Crawler';
  protected readonly configManager: ConfigManager;
  private readonly fetcher: PageFetcher;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: CrawlerOptions) {
    super();
    this.fetcher = options.fetcher;
    this.configManager = options.configManager;
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  async crawl(
    startUrl: string,
    options: CrawlOptions = {}
  ): Promise<CrawlResult> {
    const maxPages = options.maxPages ?? this.configManager.get('maxPages');
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`);
    }
    const delayMs = options.delayMs ?? this.configManager.get('crawlDelayMs');

    const pages: CrawledPage[] = [];
    const failures: CrawlFailure[] = [];

    const start = normalizeUrl(startUrl);
    if (start === null) {
      const error = new FetchError('not an http(s) URL', startUrl, 'invalid-url');
      this.error(error.message);
      return { pages, failures: [{ url: startUrl, error }] };
    }

    const configured =
      options.allowedDomains ?? this.configManager.get('allowedDomains');
    const allowed = new Set(
      (configured.length > 0 ? configured : [hostOf(start)]).map(domain =>
        domain.toLowerCase()
      )
    );
    const isAllowed = (url: string): boolean => allowed.has(hostOf(url));

    const frontier: string[] = [start];
    const visited = new Set<string>();
    const failed = new Set<string>();
    let fetches = 0;

    this.log(
      `Crawling ${start} (max ${maxPages} page(s), hosts: ${[...allowed].join(', ')})`
    );

    while (frontier.length > 0 && pages.length < maxPages) {
      const url = frontier.shift();
      if (url === undefined || visited.has(url) || failed.has(url)) {
        continue;
      }
      if (!isAllowed(url)) {
        this.verbose(`Skipping ${url}: host not allowed`);
        continue;
      }

      if (fetches > 0 && delayMs > 0) {
        await this.sleep(delayMs);
      }
      fetches++;

      const fetched = await this.fetcher.fetchPage(url, {
        allowedHosts: allowed,
      });
      if (!fetched.ok) {
        this.warn(fetched.error.message);
        failures.push({ url, error: fetched.error });
        failed.add(url);
        continue;
      }

      const extracted = extractPage(fetched.value.html, url, {
        baseUrl: fetched.value.finalUrl,
      });
      if (!extracted.ok) {
        this.warn(extracted.error.message);
        failures.push({ url, error: extracted.error });
        failed.add(url);
        continue;
      }

      const page = extracted.value;
      visited.add(url);
      pages.push(page);
      this.verbose(
        `Crawled ${url} (${pages.length}/${maxPages}, ${page.metadata.links.length} link(s))`
      );

      for (const link of page.metadata.links) {
        if (!visited.has(link) && isAllowed(link)) {
          frontier.push(link);
        }
      }
    }

    this.log(
      `Crawl finished: ${pages.length} page(s), ${failures.length} failure(s)`
    );
    return { pages, failures };
  }
}
