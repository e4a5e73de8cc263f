export const mapWithConcurrency = async <T, R>(
  values: readonly T[],
  limit: number,
  handler: (value: T, index: number) => Promise<R>,
): Promise<readonly R[]> => {
  const workerCount = Math.min(Math.max(1, limit), values.length);
  const results: R[] = new Array(values.length);
  let next = 0;

  const workers: Promise<void>[] = Array.from({ length: workerCount }, async () => {
    while (next < values.length) {
      const current = next;
      next += 1;

      const value = values[current];
      if (value !== undefined) {
        results[current] = await handler(value, current);
      }
    }
  });

  await Promise.all(workers);
  return results;
};
