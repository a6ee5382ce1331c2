/**
 * Drain an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Drain an async iterable of text chunks into one string
 */
export async function collectText(chunks: AsyncIterable<string>): Promise<string> {
  return (await collect(chunks)).join("");
}

/**
 * Capture the rejection of a promise, failing when it resolves
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

/**
 * Concatenate text chunks until the iterable ends or throws
 *
 * Returns what was produced before the failure alongside the error.
 */
export async function drainText(
  chunks: AsyncIterable<string>
): Promise<{ output: string; error: unknown }> {
  let output = "";
  try {
    for await (const chunk of chunks) {
      output += chunk;
    }
  } catch (error) {
    return { output, error };
  }
  return { output, error: undefined };
}
