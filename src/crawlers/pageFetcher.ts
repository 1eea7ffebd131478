import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import * as cheerio from 'cheerio';
import { DEFAULT_USER_AGENT } from '../config';
import { FetchError, errorMessage } from '../errors/http-error';
import { logger } from '../utils/logger';
import { normalizeUrl } from '../utils/url';

const MAX_REDIRECTS = 10;

export interface ExtractedLink {
  /** Absolute URL resolved against the page it was found on. */
  url: string;
  normalizedUrl: string;
  anchor: string;
}

export interface FetchedLinks {
  requestedUrl: string;
  finalUrl: string;
  links: ExtractedLink[];
}

export interface FetchedPage {
  finalUrl: string;
  html: string;
}

export interface PageFetcher {
  fetchLinks(url: string, timeoutMs: number): Promise<FetchedLinks>;
}

export function extractLinks(html: string, baseUrl: string): ExtractedLink[] {
  const $ = cheerio.load(html);
  const links: ExtractedLink[] = [];

  $('a[href]').each((_, element) => {
    const href = ($(element).attr('href') ?? '').trim();
    let resolved: string;
    try {
      resolved = new URL(href, baseUrl).href;
    } catch {
      logger.debug('Skipping unresolvable href', { href, baseUrl });
      return;
    }

    links.push({
      url: resolved,
      normalizedUrl: normalizeUrl(resolved),
      anchor: $(element).text().replace(/\s+/g, ' ').trim(),
    });
  });

  return links;
}

function resolveFinalUrl(response: AxiosResponse<string>, fallback: string): string {
  // follow-redirects records the last hop on the underlying response
  const responseUrl: unknown = response.request?.res?.responseUrl;
  return typeof responseUrl === 'string' && responseUrl ? responseUrl : fallback;
}

function toFetchError(error: unknown, url: string, timeoutMs: number): FetchError {
  if (axios.isCancel(error)) {
    return new FetchError(`Timeout after ${timeoutMs}ms`, url, undefined, { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, statusText } = error.response;
      return new FetchError(`HTTP ${status} ${statusText}`.trim(), url, status, { cause: error });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new FetchError(`Timeout after ${timeoutMs}ms`, url, undefined, { cause: error });
    }
  }

  return new FetchError(errorMessage(error), url, undefined, { cause: error });
}

export class HttpPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;

  constructor(userAgent: string = DEFAULT_USER_AGENT) {
    this.client = axios.create({
      maxRedirects: MAX_REDIRECTS,
      responseType: 'text',
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      },
    });
  }

  /** One GET with redirects followed; the body is empty when it is not text. */
  async fetchPage(url: string, timeoutMs: number): Promise<FetchedPage> {
    let response: AxiosResponse<string>;
    try {
      response = await this.client.get<string>(url, {
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw toFetchError(error, url, timeoutMs);
    }

    const finalUrl = resolveFinalUrl(response, url);
    logger.debug('Fetched page', { url, finalUrl, status: response.status });
    return { finalUrl, html: typeof response.data === 'string' ? response.data : '' };
  }

  async fetchLinks(url: string, timeoutMs: number): Promise<FetchedLinks> {
    const { finalUrl, html } = await this.fetchPage(url, timeoutMs);
    return { requestedUrl: url, finalUrl, links: extractLinks(html, finalUrl) };
  }
}
