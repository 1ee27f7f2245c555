export type MapLimitOptions = {
  concurrency: number;
};

// Preserves input order in the returned array. The first rejection stops
// scheduling new work and is rethrown once in-flight workers settle.
export async function mapLimit<T, R>(
  items: readonly T[],
  mapper: (item: T, index: number) => Promise<R>,
  options: MapLimitOptions,
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const out: R[] = [];
  if (items.length === 0) {
    return out;
  }

  const state: { nextIndex: number; failure: { error: unknown } | null } = {
    nextIndex: 0,
    failure: null,
  };

  async function worker(): Promise<void> {
    while (state.failure === null && state.nextIndex < items.length) {
      const index = state.nextIndex;
      state.nextIndex += 1;

      try {
        out[index] = await mapper(items[index], index);
      } catch (error) {
        state.failure = { error };
      }
    }
  }

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failure) {
    throw state.failure.error;
  }
  return out;
}
