import type { JobStatusBase } from './jobs';

export interface ExpectedLinkRow {
  readonly rowNum: number;
  readonly site: string;
  readonly link: string;
  readonly anchor: string;
}

export const LINK_CHECK_STATUSES = ['ok', 'anchor_mismatch', 'link_not_found', 'fetch_error'] as const;

export type LinkCheckStatusCode = (typeof LINK_CHECK_STATUSES)[number];

export type LinkResultFilter = (typeof LINK_RESULT_FILTERS)[number];

export interface LinkCheckResult {
  rowNum: number;
  site: string;
  expectedLink: string;
  expectedAnchor: string;
  status: LinkCheckStatusCode;
  foundAnchors: string[];
  error: string | null;
}

export interface LinkCheckLogEntry {
  site: string;
  status: 'ok' | 'error';
  error?: string;
  rowCount: number;
  ts: string;
}

export interface LinkCheckJobStatus
  extends JobStatusBase<LinkCheckResult, LinkCheckLogEntry, LinkCheckStatusCode> {
  totalSites: number;
  checkedSites: number;
}

export const LINK_RESULT_FILTERS = ['all', ...LINK_CHECK_STATUSES] as const;
