import { HttpPageFetcher, type ExtractedLink, type PageFetcher } from '../crawlers/pageFetcher';
import { ConflictError, ValidationError, errorMessage, truncateMessage } from '../errors/http-error';
import type { CheckOptions, JobAccepted, JobStatusView, PageQuery, Paginated } from '../types/jobs';
import type {
  ExpectedLinkRow,
  LinkCheckJobStatus,
  LinkCheckResult,
  LinkCheckStatusCode,
  LinkResultFilter,
} from '../types/linkCheck';
import { logger } from '../utils/logger';
import { paginate } from '../utils/paginate';
import { ensureScheme, normalizeUrl } from '../utils/url';
import { runJobs } from './jobRunner';
import { JobStatusStore, type RunToken } from './jobStatus.store';

type SiteGroup = [site: string, rows: ExpectedLinkRow[]];

interface SiteCheck {
  results: LinkCheckResult[];
  error: string | null;
}

function createIdleStatus(): LinkCheckJobStatus {
  return {
    running: false,
    total: 0,
    checked: 0,
    totalSites: 0,
    checkedSites: 0,
    results: [],
    counts: countLinkStatuses([]),
    log: [],
    startedAt: null,
    finishedAt: null,
  };
}

/** Groups rows by site in first-seen order; each site is fetched once. */
export function groupBySite(rows: readonly ExpectedLinkRow[]): SiteGroup[] {
  const groups = new Map<string, ExpectedLinkRow[]>();
  for (const row of rows) {
    const site = ensureScheme(row.site);
    const group = groups.get(site);
    if (group) {
      group.push(row);
    } else {
      groups.set(site, [row]);
    }
  }
  return [...groups.entries()];
}

export function classifyRows(
  site: string,
  rows: readonly ExpectedLinkRow[],
  links: readonly ExtractedLink[],
): LinkCheckResult[] {
  const anchorsByUrl = new Map<string, string[]>();
  for (const link of links) {
    const anchors = anchorsByUrl.get(link.normalizedUrl);
    if (anchors) {
      anchors.push(link.anchor);
    } else {
      anchorsByUrl.set(link.normalizedUrl, [link.anchor]);
    }
  }

  return rows.map((row): LinkCheckResult => {
    const expectedAnchor = row.anchor.trim();
    const foundAnchors = anchorsByUrl.get(normalizeUrl(row.link));

    let status: LinkCheckStatusCode;
    if (!foundAnchors) {
      status = 'link_not_found';
    } else if (
      !expectedAnchor ||
      foundAnchors.some((anchor) => anchor.toLowerCase() === expectedAnchor.toLowerCase())
    ) {
      status = 'ok';
    } else {
      status = 'anchor_mismatch';
    }

    return {
      rowNum: row.rowNum,
      site,
      expectedLink: row.link,
      expectedAnchor,
      status,
      foundAnchors: foundAnchors ? [...foundAnchors] : [],
      error: null,
    };
  });
}

export function failedRows(site: string, rows: readonly ExpectedLinkRow[], error: string): LinkCheckResult[] {
  return rows.map((row): LinkCheckResult => ({
    rowNum: row.rowNum,
    site,
    expectedLink: row.link,
    expectedAnchor: row.anchor.trim(),
    status: 'fetch_error',
    foundAnchors: [],
    error,
  }));
}

function failedCheck(site: string, rows: readonly ExpectedLinkRow[], error: unknown): SiteCheck {
  const message = truncateMessage(errorMessage(error));
  return { results: failedRows(site, rows, message), error: message };
}

export function countLinkStatuses(
  results: readonly LinkCheckResult[],
): Record<LinkCheckStatusCode, number> {
  const counts: Record<LinkCheckStatusCode, number> = {
    ok: 0,
    anchor_mismatch: 0,
    link_not_found: 0,
    fetch_error: 0,
  };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

export class LinkCheckService {
  private readonly store = new JobStatusStore<LinkCheckJobStatus>(createIdleStatus);
  private currentRun: Promise<void> = Promise.resolve();

  constructor(private readonly fetcher: PageFetcher = new HttpPageFetcher()) {}

  /**
   * Accepts a batch and returns immediately; the batch runs as a detached task
   * that owns every write to the status.
   */
  start(rows: readonly ExpectedLinkRow[], options: CheckOptions): JobAccepted {
    if (rows.length === 0) {
      throw new ValidationError('No valid rows found');
    }

    const groups = groupBySite(rows);
    const token = this.store.tryBegin({ total: rows.length, totalSites: groups.length });
    if (!token) {
      throw new ConflictError('Link check already in progress');
    }

    logger.info('Link check started', {
      rows: rows.length,
      sites: groups.length,
      concurrency: options.concurrency,
    });

    this.currentRun = this.runBatch(token, groups, options);
    return { accepted: true, count: rows.length };
  }

  /** Resolves once the most recently started batch has published its results. */
  waitForIdle(): Promise<void> {
    return this.currentRun;
  }

  stop(): JobStatusView<LinkCheckJobStatus> {
    if (this.store.isRunning()) {
      logger.warn('Link check stop requested; in-flight fetches will still complete');
    }
    this.store.stop();
    return this.store.view();
  }

  getStatus(): JobStatusView<LinkCheckJobStatus> {
    return this.store.view();
  }

  getResults(filter: LinkResultFilter, query: PageQuery): Paginated<LinkCheckResult> {
    const results = this.store.results();
    const filtered = filter === 'all' ? results : results.filter((result) => result.status === filter);
    return paginate(filtered, query);
  }

  private async checkSite(site: string, rows: ExpectedLinkRow[], timeoutMs: number): Promise<SiteCheck> {
    try {
      const page = await this.fetcher.fetchLinks(site, timeoutMs);
      return { results: classifyRows(site, rows, page.links), error: null };
    } catch (error) {
      const check = failedCheck(site, rows, error);
      logger.warn('Site fetch failed', { site, error: check.error });
      return check;
    }
  }

  private async runBatch(token: RunToken, groups: SiteGroup[], options: CheckOptions): Promise<void> {
    const collected: LinkCheckResult[] = [];
    const timeoutMs = options.timeoutSeconds * 1000;

    try {
      const outcomes = runJobs(groups, {
        concurrency: options.concurrency,
        worker: ([site, rows]) => this.checkSite(site, rows, timeoutMs),
      });

      for await (const outcome of outcomes) {
        const [site, rows] = outcome.unit;
        const check = outcome.ok ? outcome.value : failedCheck(site, rows, outcome.error);

        collected.push(...check.results);
        this.store.update(token, (status) => {
          status.checkedSites += 1;
          status.checked += rows.length;
          status.log.push({
            site,
            status: check.error ? 'error' : 'ok',
            ...(check.error ? { error: check.error } : {}),
            rowCount: rows.length,
            ts: new Date().toISOString(),
          });
        });
      }

      collected.sort((a, b) => a.rowNum - b.rowNum);
      const counts = countLinkStatuses(collected);
      this.store.publish(token, collected, counts);
      logger.info('Link check completed', { rows: collected.length, ...counts });
    } catch (error) {
      logger.error('Link check batch failed', { error: errorMessage(error) });
    } finally {
      this.store.finish(token);
    }
  }
}
