/**
 * Run every task and wait for all of them, with at most `concurrency` in
 * flight at once. One task rejecting never cancels or affects the others.
 *
 * @param tasks Task factories, started in order
 * @param concurrency Maximum number of tasks running in parallel
 * @returns One settled result per task, in input order
 */
export async function settleAll<T>(
  tasks: (() => Promise<T>)[],
  concurrency = Number.POSITIVE_INFINITY,
): Promise<PromiseSettledResult<T>[]> {
  if (!tasks.length) {
    return [];
  }

  if (!(concurrency > 0)) {
    throw new Error("Concurrency must be a positive number");
  }

  if (concurrency >= tasks.length) {
    return Promise.allSettled(tasks.map((task) => task()));
  }

  const results: PromiseSettledResult<T>[] = new Array(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];

      try {
        results[index] = { status: "fulfilled", value: await task() };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  const workers = Array.from({ length: Math.floor(concurrency) }, () =>
    worker(),
  );
  await Promise.all(workers);

  return results;
}
