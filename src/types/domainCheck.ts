import type { JobStatusBase } from './jobs';

export const DOMAIN_CHECK_STATUSES = ['ok', 'error'] as const;

export type DomainCheckStatusCode = (typeof DOMAIN_CHECK_STATUSES)[number];

export type DomainResultFilter = (typeof DOMAIN_RESULT_FILTERS)[number];

export interface TargetMatch {
  found: boolean;
  anchors: string[];
}

export interface DomainCheckResult {
  domain: string;
  status: DomainCheckStatusCode;
  error: string | null;
  linksCount: number;
  targets: Record<string, TargetMatch>;
}

export interface DomainCheckLogEntry {
  domain: string;
  status: DomainCheckStatusCode;
  linksCount: number;
  error?: string;
  ts: string;
}

export type DomainCheckJobStatus = JobStatusBase<
  DomainCheckResult,
  DomainCheckLogEntry,
  DomainCheckStatusCode
>;

export const DOMAIN_RESULT_FILTERS = ['all', 'ok', 'error', 'has_target', 'no_target'] as const;
