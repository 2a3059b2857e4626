// Structured joins over concurrent tasks.

/**
 * Wait for every task to settle, then rethrow the first failure.
 *
 * Unlike Promise.all this never abandons a still-running sibling: callers
 * rely on all tasks having finished when it returns.
 */
export async function joinAll(tasks: Array<Promise<unknown>>): Promise<void> {
  const results = await Promise.allSettled(tasks);
  for (const result of results) {
    if (result.status === "rejected") {
      throw result.reason;
    }
  }
}
