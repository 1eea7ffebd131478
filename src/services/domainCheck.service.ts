import { HttpPageFetcher, type ExtractedLink, type PageFetcher } from '../crawlers/pageFetcher';
import { ConflictError, ValidationError, errorMessage, truncateMessage } from '../errors/http-error';
import type {
  DomainCheckJobStatus,
  DomainCheckResult,
  DomainCheckStatusCode,
  DomainResultFilter,
  TargetMatch,
} from '../types/domainCheck';
import type { CheckOptions, JobAccepted, JobStatusView, PageQuery, Paginated } from '../types/jobs';
import { logger } from '../utils/logger';
import { paginate } from '../utils/paginate';
import { getDomain, hostKey } from '../utils/url';
import { runJobs } from './jobRunner';
import { JobStatusStore, type RunToken } from './jobStatus.store';

export const NO_ANCHOR = '[no anchor]';

export interface ExternalLinks {
  linksCount: number;
  anchorsByDomain: Map<string, string[]>;
}

function createIdleStatus(): DomainCheckJobStatus {
  return {
    running: false,
    total: 0,
    checked: 0,
    results: [],
    counts: countDomainStatuses([]),
    log: [],
    startedAt: null,
    finishedAt: null,
  };
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function emptyTargets(targets: readonly string[]): Record<string, TargetMatch> {
  return Object.fromEntries(targets.map((target) => [target, { found: false, anchors: [] }]));
}

/**
 * Groups cross-domain http(s) links by destination domain. Links to any of
 * `sourceDomains` are internal and not counted.
 */
export function collectExternalLinks(
  links: readonly ExtractedLink[],
  sourceDomains: ReadonlySet<string>,
): ExternalLinks {
  const anchorsByDomain = new Map<string, string[]>();
  let linksCount = 0;

  for (const link of links) {
    if (!link.url.startsWith('http://') && !link.url.startsWith('https://')) continue;
    const domain = getDomain(link.url);
    if (!domain || sourceDomains.has(domain)) continue;

    linksCount += 1;
    const anchor = link.anchor || NO_ANCHOR;
    const anchors = anchorsByDomain.get(domain);
    if (anchors) {
      anchors.push(anchor);
    } else {
      anchorsByDomain.set(domain, [anchor]);
    }
  }

  return { linksCount, anchorsByDomain };
}

export function matchTargets(
  external: ExternalLinks,
  targets: readonly string[],
): Record<string, TargetMatch> {
  const matches = emptyTargets(targets);
  for (const target of targets) {
    const anchors = external.anchorsByDomain.get(hostKey(target));
    if (anchors) {
      matches[target] = { found: true, anchors: [...anchors] };
    }
  }
  return matches;
}

export function failedDomain(domain: string, targets: readonly string[], error: unknown): DomainCheckResult {
  return {
    domain,
    status: 'error',
    error: truncateMessage(errorMessage(error)),
    linksCount: 0,
    targets: emptyTargets(targets),
  };
}

export function countDomainStatuses(
  results: readonly DomainCheckResult[],
): Record<DomainCheckStatusCode, number> {
  const counts: Record<DomainCheckStatusCode, number> = { ok: 0, error: 0 };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

function hasTarget(result: DomainCheckResult): boolean {
  return Object.values(result.targets).some((match) => match.found);
}

function matchesFilter(result: DomainCheckResult, filter: DomainResultFilter): boolean {
  switch (filter) {
    case 'all':
      return true;
    case 'has_target':
      return hasTarget(result);
    case 'no_target':
      return !hasTarget(result);
    default:
      return result.status === filter;
  }
}

export class DomainCheckService {
  private readonly store = new JobStatusStore<DomainCheckJobStatus>(createIdleStatus);
  private currentRun: Promise<void> = Promise.resolve();

  constructor(private readonly fetcher: PageFetcher = new HttpPageFetcher()) {}

  start(domains: readonly string[], targetDomains: readonly string[], options: CheckOptions): JobAccepted {
    const units = unique(domains.filter(Boolean));
    if (units.length === 0) {
      throw new ValidationError('No referring domains provided');
    }

    const targets = unique(targetDomains.filter(Boolean));
    const token = this.store.tryBegin({ total: units.length });
    if (!token) {
      throw new ConflictError('Domain check already in progress');
    }

    logger.info('Domain check started', {
      domains: units.length,
      targets: targets.length,
      concurrency: options.concurrency,
    });

    this.currentRun = this.runBatch(token, units, targets, options);
    return { accepted: true, count: units.length };
  }

  waitForIdle(): Promise<void> {
    return this.currentRun;
  }

  stop(): JobStatusView<DomainCheckJobStatus> {
    if (this.store.isRunning()) {
      logger.warn('Domain check stop requested; in-flight fetches will still complete');
    }
    this.store.stop();
    return this.store.view();
  }

  getStatus(): JobStatusView<DomainCheckJobStatus> {
    return this.store.view();
  }

  getResults(filter: DomainResultFilter, query: PageQuery): Paginated<DomainCheckResult> {
    const filtered = this.store.results().filter((result) => matchesFilter(result, filter));
    return paginate(filtered, query);
  }

  private async checkDomain(domain: string, targets: readonly string[], timeoutMs: number): Promise<DomainCheckResult> {
    const url = `https://${domain}/`;
    try {
      const page = await this.fetcher.fetchLinks(url, timeoutMs);
      const sourceDomains = new Set([getDomain(url), getDomain(page.finalUrl)]);
      const external = collectExternalLinks(page.links, sourceDomains);

      return {
        domain,
        status: 'ok',
        error: null,
        linksCount: external.linksCount,
        targets: matchTargets(external, targets),
      };
    } catch (error) {
      const result = failedDomain(domain, targets, error);
      logger.warn('Domain fetch failed', { domain, error: result.error });
      return result;
    }
  }

  private async runBatch(
    token: RunToken,
    domains: string[],
    targets: string[],
    options: CheckOptions,
  ): Promise<void> {
    const collected: DomainCheckResult[] = [];
    const timeoutMs = options.timeoutSeconds * 1000;

    try {
      const outcomes = runJobs(domains, {
        concurrency: options.concurrency,
        worker: (domain) => this.checkDomain(domain, targets, timeoutMs),
      });

      for await (const outcome of outcomes) {
        const result = outcome.ok ? outcome.value : failedDomain(outcome.unit, targets, outcome.error);

        collected.push(result);
        this.store.update(token, (status) => {
          status.checked += 1;
          status.log.push({
            domain: result.domain,
            status: result.status,
            linksCount: result.linksCount,
            ...(result.error ? { error: result.error } : {}),
            ts: new Date().toISOString(),
          });
        });
      }

      collected.sort((a, b) => (a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0));
      const counts = countDomainStatuses(collected);
      this.store.publish(token, collected, counts);
      logger.info('Domain check completed', { domains: collected.length, ...counts });
    } catch (error) {
      logger.error('Domain check batch failed', { error: errorMessage(error) });
    } finally {
      this.store.finish(token);
    }
  }
}
