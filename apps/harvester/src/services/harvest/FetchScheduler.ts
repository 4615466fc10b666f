import pLimit from 'p-limit';

export interface ScheduleOptions {
  concurrency: number;
  /** Called when a page actually takes a slot. */
  onStart?: (page: number) => void;
}

export function pageRange(startPage: number, endPage: number): number[] {
  const pages: number[] = [];
  for (let page = startPage; page <= endPage; page++) {
    pages.push(page);
  }
  return pages;
}

/**
 * Runs `task` once per page, ascending, with at most `concurrency` in flight.
 * A free slot picks up the next page right away instead of waiting for a
 * whole batch. Results come back in page order whatever the arrival order.
 */
export async function schedulePages<T>(
  startPage: number,
  endPage: number,
  task: (page: number) => Promise<T>,
  options: ScheduleOptions
): Promise<T[]> {
  const concurrency = Number.isFinite(options.concurrency) ? Math.max(1, Math.floor(options.concurrency)) : 1;
  const limit = pLimit(concurrency);

  return Promise.all(
    pageRange(startPage, endPage).map((page) =>
      limit(() => {
        options.onStart?.(page);
        return task(page);
      })
    )
  );
}
