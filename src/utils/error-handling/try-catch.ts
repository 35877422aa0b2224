/**
 * Executes a function with error handling and fallback value
 */
export async function tryWithFallback<T>(
  fn: () => T | Promise<T>,
  fallback: T,
  onError?: (error: unknown) => void
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (onError) {
      onError(error);
    }
    return fallback;
  }
}
