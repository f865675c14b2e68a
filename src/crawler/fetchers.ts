import {
  type AbortablePromise,
  type FetchOptions,
  JSDOM,
  ResourceLoader,
  VirtualConsole,
} from 'jsdom';
import type { ConfigManager } from '../ConfigManager';
import { FetchError, type Result, err, errorMessage, ok } from '../errors';
import {
  type ComponentLogger,
  createComponentLogger,
} from '../WithLogging';
import { normalizeUrl } from './htmlExtractor';
import type { FetchContext, FetchedPage, PageFetcher } from './types';

export type FetchImpl = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

// AbortSignal.timeout() rejects with a DOMException, so match on the name
function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export interface StaticFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchImpl;
}

/**
 * Plain HTTP GET; the page is returned exactly as served
 */
export class StaticFetcher implements PageFetcher {
  readonly name = 'static';
  private readonly fetchImpl: FetchImpl;

  constructor(private readonly options: StaticFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchPage(url: string): Promise<Result<FetchedPage, FetchError>> {
    if (normalizeUrl(url) === null) {
      return err(new FetchError('not an http(s) URL', url, 'invalid-url'));
    }

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        return err(
          new FetchError(`HTTP ${response.status}`, url, 'http', {
            status: response.status,
          })
        );
      }

      const contentType = response.headers.get('content-type');
      if (
        contentType &&
        !HTML_CONTENT_TYPES.some(type => contentType.includes(type))
      ) {
        return err(
          new FetchError(
            `unsupported content type ${contentType}`,
            url,
            'content-type',
            { status: response.status }
          )
        );
      }

      const html = await response.text();
      return ok({
        url,
        finalUrl: response.url || url,
        status: response.status,
        html,
      });
    } catch (error) {
      if (isTimeout(error)) {
        return err(
          new FetchError(
            `timed out after ${this.options.timeoutMs}ms`,
            url,
            'timeout',
            { cause: error }
          )
        );
      }
      return err(
        new FetchError(errorMessage(error), url, 'network', { cause: error })
      );
    }
  }
}

function waitForLoad(window: JSDOM['window'], timeoutMs: number): Promise<void> {
  return new Promise(resolve => {
    if (window.document.readyState === 'complete') {
      resolve();
      return;
    }
    const timer = setTimeout(resolve, timeoutMs);
    window.addEventListener('load', () => {
      clearTimeout(timer);
      resolve();
    });
  });
}

function hostOf(url: string): string | null {
  const normalized = normalizeUrl(url);
  return normalized === null ? null : new URL(normalized).host.toLowerCase();
}

/**
 * Subresource loader for rendered pages. Scripts, stylesheets and frames are
 * requested only from the crawl's hosts, each within the fetch timeout.
 */
export class AllowListResourceLoader extends ResourceLoader {
  constructor(
    private readonly allowedHosts: ReadonlySet<string>,
    private readonly timeoutMs: number,
    userAgent: string,
    private readonly logger?: ComponentLogger
  ) {
    super({ userAgent });
  }

  fetch(url: string, options: FetchOptions): AbortablePromise<Buffer> | null {
    const host = hostOf(url);
    if (host === null || !this.allowedHosts.has(host)) {
      this.logger?.verbose(`Not loading ${url}: host not allowed`);
      return null;
    }

    const request = super.fetch(url, options);
    if (request === null) {
      return null;
    }
    const timer = setTimeout(() => request.abort(), this.timeoutMs);
    const clear = () => clearTimeout(timer);
    void request.then(clear, clear);
    return request;
  }
}

export interface RenderingFetcherOptions {
  renderTimeoutMs: number;
  // Budget for each script or stylesheet the page pulls in
  resourceTimeoutMs: number;
  userAgent: string;
  // Hosts for subresources when the caller names none; empty means the page's own host
  allowedDomains?: readonly string[];
  // On a rendering failure, return the page as served instead of an error
  fallbackToSource?: boolean;
  logger?: ComponentLogger;
}

/**
 * Runs the page's scripts in jsdom and returns the DOM as it stands once the
 * page has loaded (or the render budget ran out).
 *
 * jsdom is not a sandbox: inline scripts run with the privileges of this
 * process. Only crawl sites you trust with this fetcher.
 */
export class RenderingFetcher implements PageFetcher {
  readonly name: string;

  constructor(
    private readonly source: PageFetcher,
    private readonly options: RenderingFetcherOptions
  ) {
    this.name = options.fallbackToSource ? 'auto' : 'rendering';
  }

  async fetchPage(
    url: string,
    context?: FetchContext
  ): Promise<Result<FetchedPage, FetchError>> {
    const fetched = await this.source.fetchPage(url, context);
    if (!fetched.ok) {
      return fetched;
    }
    const page = fetched.value;

    const result = await this.render(
      page,
      context?.allowedHosts ?? this.defaultHosts(page)
    );
    if (result.ok || !this.options.fallbackToSource) {
      return result;
    }
    this.options.logger?.verbose(
      `${result.error.message}; using the page as served`
    );
    return ok(page);
  }

  private defaultHosts(page: FetchedPage): ReadonlySet<string> {
    const configured = this.options.allowedDomains ?? [];
    const hosts =
      configured.length > 0 ? configured : [new URL(page.finalUrl).host];
    return new Set(hosts.map(host => host.toLowerCase()));
  }

  private async render(
    page: FetchedPage,
    allowedHosts: ReadonlySet<string>
  ): Promise<Result<FetchedPage, FetchError>> {
    const { logger } = this.options;
    const virtualConsole = new VirtualConsole();
    virtualConsole.on('jsdomError', error => {
      logger?.verbose(`Script error on ${page.url}: ${error.message}`);
    });

    let dom: JSDOM;
    try {
      dom = new JSDOM(page.html, {
        url: page.finalUrl,
        runScripts: 'dangerously',
        resources: new AllowListResourceLoader(
          allowedHosts,
          this.options.resourceTimeoutMs,
          this.options.userAgent,
          logger
        ),
        pretendToBeVisual: true,
        virtualConsole,
      });
    } catch (error) {
      return err(
        new FetchError(`rendering failed: ${errorMessage(error)}`, page.url, 'render', {
          cause: error,
        })
      );
    }

    try {
      await waitForLoad(dom.window, this.options.renderTimeoutMs);
      return ok({ ...page, html: dom.serialize() });
    } catch (error) {
      return err(
        new FetchError(`rendering failed: ${errorMessage(error)}`, page.url, 'render', {
          cause: error,
        })
      );
    } finally {
      dom.window.close();
    }
  }
}

/**
 * Fetcher for the configured strategy: 'static', 'rendering', or 'auto'
 * (rendering, with the page as served when rendering fails). Every strategy
 * requests a URL once.
 */
export function createFetcher(
  configManager: ConfigManager,
  fetchImpl?: FetchImpl
): PageFetcher {
  const logger = createComponentLogger(configManager, 'Fetcher');
  const staticFetcher = new StaticFetcher({
    timeoutMs: configManager.get('fetchTimeoutMs'),
    userAgent: configManager.get('userAgent'),
    fetchImpl,
  });

  const strategy = configManager.get('fetchStrategy');
  if (strategy === 'static') {
    return staticFetcher;
  }
  return new RenderingFetcher(staticFetcher, {
    renderTimeoutMs: configManager.get('renderTimeoutMs'),
    resourceTimeoutMs: configManager.get('fetchTimeoutMs'),
    userAgent: configManager.get('userAgent'),
    allowedDomains: configManager.get('allowedDomains'),
    fallbackToSource: strategy === 'auto',
    logger,
  });
}
