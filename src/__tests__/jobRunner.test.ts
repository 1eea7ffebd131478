import { describe, expect, it } from 'vitest';
import { runJobs, type JobOutcome } from '../services/jobRunner';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function collect<TUnit, TValue>(
  outcomes: AsyncIterable<JobOutcome<TUnit, TValue>>,
): Promise<JobOutcome<TUnit, TValue>[]> {
  const collected: JobOutcome<TUnit, TValue>[] = [];
  for await (const outcome of outcomes) {
    collected.push(outcome);
  }
  return collected;
}

describe('runJobs', () => {
  it('yields outcomes in completion order', async () => {
    const outcomes = await collect(
      runJobs([80, 10, 40], {
        concurrency: 3,
        worker: async (delay) => {
          await sleep(delay);
          return delay * 2;
        },
      }),
    );

    expect(outcomes.map((outcome) => outcome.unit)).toEqual([10, 40, 80]);
    expect(outcomes.map((outcome) => (outcome.ok ? outcome.value : null))).toEqual([20, 80, 160]);
  });

  it('never runs more than the concurrency bound at once', async () => {
    let active = 0;
    let maxActive = 0;
    const units = Array.from({ length: 10 }, (_, index) => index);

    const outcomes = await collect(
      runJobs(units, {
        concurrency: 3,
        worker: async (unit) => {
          active += 1;
          maxActive = Math.max(maxActive, active);
          await sleep(5 + (unit % 3) * 5);
          active -= 1;
          return unit;
        },
      }),
    );

    expect(maxActive).toBe(3);
    expect(outcomes).toHaveLength(10);
    expect(new Set(outcomes.map((outcome) => outcome.unit)).size).toBe(10);
  });

  it('turns a throwing worker into an error outcome without stopping the rest', async () => {
    const outcomes = await collect(
      runJobs(['a', 'boom', 'c'], {
        concurrency: 2,
        worker: async (unit) => {
          if (unit === 'boom') {
            throw new Error('worker failed');
          }
          return unit.toUpperCase();
        },
      }),
    );

    const failed = outcomes.find((outcome) => outcome.unit === 'boom');
    expect(failed?.ok).toBe(false);
    expect(failed && !failed.ok && failed.error instanceof Error ? failed.error.message : null).toBe(
      'worker failed',
    );
    expect(outcomes.filter((outcome) => outcome.ok)).toHaveLength(2);
  });

  it('treats a concurrency below one as a single slot', async () => {
    const outcomes = await collect(
      runJobs([40, 10], {
        concurrency: 0,
        worker: async (delay) => {
          await sleep(delay);
          return delay;
        },
      }),
    );

    expect(outcomes.map((outcome) => outcome.unit)).toEqual([40, 10]);
  });

  it('finishes immediately with no units', async () => {
    const outcomes = await collect(runJobs<number, number>([], { concurrency: 2, worker: async (unit) => unit }));
    expect(outcomes).toEqual([]);
  });
});
