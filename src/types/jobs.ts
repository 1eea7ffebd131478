export interface CheckOptions {
  concurrency: number;
  timeoutSeconds: number;
}

/**
 * Shared shape of an engine's pollable status. `checked` and `log` track
 * completed units while the batch runs; `results` and `counts` are only
 * filled once the whole batch has finished.
 */
export interface JobStatusBase<TResult, TLog, TCountKey extends string> {
  running: boolean;
  total: number;
  checked: number;
  results: TResult[];
  counts: Record<TCountKey, number>;
  log: TLog[];
  startedAt: string | null;
  finishedAt: string | null;
}

export type JobStatusView<TStatus extends JobStatusBase<unknown, unknown, string>> = Omit<
  TStatus,
  'results'
>;

export interface JobAccepted {
  accepted: true;
  count: number;
}

export interface PageQuery {
  page: number;
  pageSize: number;
}

export interface Paginated<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
