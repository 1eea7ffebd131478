import pLimit from 'p-limit';

export type JobOutcome<TUnit, TValue> =
  | { unit: TUnit; ok: true; value: TValue }
  | { unit: TUnit; ok: false; error: unknown };

export interface RunJobsOptions<TUnit, TValue> {
  concurrency: number;
  worker: (unit: TUnit) => Promise<TValue>;
}

function toSlotCount(concurrency: number): number {
  return Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
}

/**
 * Runs `worker` over every unit with at most `concurrency` in flight and yields
 * one outcome per unit in completion order. A throwing worker yields an error
 * outcome; nothing is retried.
 */
export async function* runJobs<TUnit, TValue>(
  units: readonly TUnit[],
  options: RunJobsOptions<TUnit, TValue>,
): AsyncGenerator<JobOutcome<TUnit, TValue>, void, undefined> {
  const limit = pLimit(toSlotCount(options.concurrency));
  const settled: JobOutcome<TUnit, TValue>[] = [];
  let wake: (() => void) | null = null;

  const settle = (outcome: JobOutcome<TUnit, TValue>) => {
    settled.push(outcome);
    const resume = wake;
    wake = null;
    resume?.();
  };

  for (const unit of units) {
    void limit(async () => {
      try {
        settle({ unit, ok: true, value: await options.worker(unit) });
      } catch (error) {
        settle({ unit, ok: false, error });
      }
    });
  }

  let delivered = 0;
  while (delivered < units.length) {
    const next = settled.shift();
    if (!next) {
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
      continue;
    }

    delivered += 1;
    yield next;
  }
}
